export const PROGRAM_NAME = 'refsync';

export const DEFAULT_PINENTRY_PROGRAM = 'pinentry';

/** Key files under ~/.ssh, most preferred first. */
export const SSH_KEY_FILENAMES = ['id_ed25519_sk', 'id_ed25519', 'id_rsa'] as const;

export const ENV_PINENTRY_PROGRAM = 'REFSYNC_PINENTRY';
export const ENV_PINENTRY_TIMEOUT = 'REFSYNC_PINENTRY_TIMEOUT';
export const ENV_SSH_DIR = 'REFSYNC_SSH_DIR';
