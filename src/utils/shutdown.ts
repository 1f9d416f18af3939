import chalk from 'chalk';

let isShuttingDown = false;
const cleanupHandlers = new Set<() => Promise<void> | void>();

/**
 * Register a cleanup handler. Returns a function that unregisters it.
 */
export function onShutdown(handler: () => Promise<void> | void): () => void {
  cleanupHandlers.add(handler);
  return () => {
    cleanupHandlers.delete(handler);
  };
}

/**
 * Run every registered handler once. Handler failures are logged in debug
 * mode and do not stop the remaining handlers.
 */
export async function runShutdownHandlers(): Promise<void> {
  if (isShuttingDown) {
    return;
  }

  isShuttingDown = true;

  for (const handler of [...cleanupHandlers]) {
    try {
      await handler();
    } catch (error) {
      if (process.env.DEBUG === 'true') {
        console.error(chalk.red('Cleanup error:'), error);
      }
    }
  }
}

/**
 * Kill helper processes on Ctrl+C or termination. Messages go to stderr.
 */
export function setupShutdownHandlers(): void {
  process.on('SIGINT', async () => {
    console.error(chalk.yellow('\nInterrupted'));
    await runShutdownHandlers();
    process.exit(130);
  });

  process.on('SIGTERM', async () => {
    await runShutdownHandlers();
    process.exit(143);
  });
}

export function isShuttingDownFlag(): boolean {
  return isShuttingDown;
}

/**
 * Forget all handlers and reset the shutdown flag (for tests).
 */
export function clearShutdownHandlers(): void {
  cleanupHandlers.clear();
  isShuttingDown = false;
}
