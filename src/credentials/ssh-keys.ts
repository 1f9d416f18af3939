/**
 * SSH private key discovery.
 *
 * Looks for the default key files under ~/.ssh in preference order
 * (hardware-backed ed25519, ed25519, RSA). Only existing regular files are
 * returned; an unknown home directory yields an empty list.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { SSH_KEY_FILENAMES } from '../constants';
import { logger } from '../utils/logger';

export interface SshKeyOptions {
  /** Directory to search instead of ~/.ssh. */
  sshDir?: string;
  /** Home directory override; defaults to os.homedir(). */
  homeDir?: string;
}

function findHomeDir(): string | undefined {
  try {
    return os.homedir() || undefined;
  } catch (error) {
    logger.debug('Cannot determine home directory:', error);
    return undefined;
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * List candidate private key files. The username is accepted to match the
 * transport's callback signature; the default key files do not depend on it.
 */
export async function getSshKeys(username: string, options: SshKeyOptions = {}): Promise<string[]> {
  const paths: string[] = [];
  let sshDir = options.sshDir;
  if (!sshDir) {
    const homeDir = options.homeDir ?? findHomeDir();
    sshDir = homeDir ? path.join(homeDir, '.ssh') : undefined;
  }

  if (sshDir) {
    for (const filename of SSH_KEY_FILENAMES) {
      const keyPath = path.join(sshDir, filename);
      if (await isFile(keyPath)) {
        logger.debug('found ssh key', { path: keyPath, username });
        paths.push(keyPath);
      }
    }
  }
  if (paths.length === 0) {
    logger.debug('no ssh key found');
  }
  return paths;
}
