import {
  clearShutdownHandlers,
  isShuttingDownFlag,
  onShutdown,
  runShutdownHandlers,
} from './shutdown';

describe('shutdown handlers', () => {
  afterEach(() => {
    clearShutdownHandlers();
  });

  it('runs registered handlers once', async () => {
    const handler = jest.fn();
    onShutdown(handler);

    await runShutdownHandlers();
    await runShutdownHandlers();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(isShuttingDownFlag()).toBe(true);
  });

  it('skips handlers that were unregistered', async () => {
    const kept = jest.fn();
    const dropped = jest.fn();
    onShutdown(kept);
    const unregister = onShutdown(dropped);
    unregister();

    await runShutdownHandlers();

    expect(kept).toHaveBeenCalledTimes(1);
    expect(dropped).not.toHaveBeenCalled();
  });

  it('keeps going after a failing handler', async () => {
    const later = jest.fn();
    onShutdown(() => {
      throw new Error('boom');
    });
    onShutdown(later);

    await runShutdownHandlers();

    expect(later).toHaveBeenCalledTimes(1);
  });
});
