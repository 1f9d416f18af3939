import * as path from 'path';

/**
 * Expands "~/" to "$HOME/" as git does for paths like core.excludesFile.
 * Without HOME the path is returned unchanged. The rest is appended as is,
 * without normalization; an absolute rest ("~//x") replaces HOME.
 */
export function expandGitPath(pathStr: string, env: NodeJS.ProcessEnv = process.env): string {
  if (pathStr.startsWith('~/')) {
    const homeDir = env.HOME;
    if (homeDir !== undefined) {
      const rest = pathStr.slice(2);
      if (path.isAbsolute(rest)) {
        return rest;
      }
      return homeDir.endsWith(path.sep) ? `${homeDir}${rest}` : `${homeDir}${path.sep}${rest}`;
    }
  }
  return pathStr;
}
