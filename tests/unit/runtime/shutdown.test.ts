import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createShutdown, registerShutdownHooks } from '../../../src/core/runtime/shutdown';

const processOnceMock = vi.spyOn(process, 'once').mockImplementation(() => process);
const processOnMock = vi.spyOn(process, 'on').mockImplementation(() => process);
const stdinOnceMock = vi.spyOn(process.stdin, 'once').mockImplementation(() => process.stdin);
const processExitMock = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never);

function listenerFor(calls: ReadonlyArray<ReadonlyArray<unknown>>, event: string): () => void {
  const listener = calls.find((call) => call[0] === event)?.[1];
  if (typeof listener !== 'function') {
    throw new Error(`No listener registered for ${event}`);
  }
  return () => {
    listener(event);
  };
}

describe('createShutdown', () => {
  it('closes the server once however often it is triggered', async () => {
    const server = { close: vi.fn(async () => {}) };
    const shutdown = createShutdown({ server });

    await Promise.all([shutdown('SIGINT'), shutdown('SIGTERM')]);

    expect(server.close).toHaveBeenCalledTimes(1);
  });

  it('completes when closing fails', async () => {
    const server = { close: vi.fn(async () => Promise.reject(new Error('transport gone'))) };
    const shutdown = createShutdown({ server });

    await expect(shutdown('SIGTERM')).resolves.toBeUndefined();
  });

  it('stops waiting on a close that never settles', async () => {
    const server = { close: vi.fn(() => new Promise<void>(() => {})) };
    const shutdown = createShutdown({ server, closeTimeoutMs: 10 });

    await expect(shutdown('SIGTERM')).resolves.toBeUndefined();
  });
});

describe('registerShutdownHooks', () => {
  beforeEach(() => {
    processOnceMock.mockClear();
    processOnMock.mockClear();
    stdinOnceMock.mockClear();
    processExitMock.mockClear();
  });

  it('closes the server and exits cleanly on SIGTERM', async () => {
    const server = { close: vi.fn(async () => {}) };

    registerShutdownHooks({ server });

    listenerFor(processOnceMock.mock.calls, 'SIGTERM')();
    await new Promise((resolve) => setImmediate(resolve));

    expect(server.close).toHaveBeenCalledTimes(1);
    expect(processExitMock).toHaveBeenCalledWith(0);
  });

  it('shuts down when the client closes stdin', async () => {
    const server = { close: vi.fn(async () => {}) };

    registerShutdownHooks({ server });

    listenerFor(stdinOnceMock.mock.calls, 'end')();
    await new Promise((resolve) => setImmediate(resolve));

    expect(server.close).toHaveBeenCalledTimes(1);
    expect(processExitMock).toHaveBeenCalledWith(0);
  });
});
