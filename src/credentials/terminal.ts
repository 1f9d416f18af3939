/**
 * Terminal prompts for credentials, drawn through the shared Ui.
 *
 * A failed prompt (no terminal, input closed) resolves to undefined; there
 * is nothing left to fall back to after the terminal.
 */

import type { Ui } from '../ui/ui';
import { logger } from '../utils/logger';

export async function terminalGetUsername(ui: Ui, url: string): Promise<string | undefined> {
  try {
    return await ui.prompt(`Username for ${url}`);
  } catch (error) {
    logger.debug('Username prompt failed:', error instanceof Error ? error.message : error);
    return undefined;
  }
}

export async function terminalGetPassword(ui: Ui, url: string): Promise<string | undefined> {
  try {
    return await ui.promptPassword(`Passphrase for ${url}: `);
  } catch (error) {
    logger.debug('Passphrase prompt failed:', error instanceof Error ? error.message : error);
    return undefined;
  }
}
