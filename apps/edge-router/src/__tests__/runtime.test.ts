import type {Server} from 'node:http';

import {describe, expect, it, vi} from 'vitest';

import {createServerRuntime} from '../runtime';

type Listener = (...args: unknown[]) => void;

const createMockServer = ({listening = true}: {listening?: boolean} = {}) => {
  const listeners = new Map<string, Listener>();

  const server = {
    listening,
    once: vi.fn((event: string, handler: Listener) => {
      listeners.set(event, handler);
      return server;
    }),
    off: vi.fn((event: string) => {
      listeners.delete(event);
      return server;
    }),
    listen: vi.fn((_port: number, _host: string, callback: () => void) => {
      callback();
      return server;
    }),
    close: vi.fn((callback: (error?: Error) => void) => {
      callback();
      return server;
    })
  };

  return {server, listeners, asServer: () => server as unknown as Server};
};

describe('server runtime', () => {
  it('listens and drops the temporary error listener once bound', async () => {
    const {server, listeners, asServer} = createMockServer();

    const runtime = createServerRuntime({server: asServer(), host: '127.0.0.1', port: 8787});

    await expect(runtime.start()).resolves.toBeUndefined();
    expect(server.once).toHaveBeenCalledWith('error', expect.any(Function));
    expect(server.listen).toHaveBeenCalledWith(8787, '127.0.0.1', expect.any(Function));
    expect(server.off).toHaveBeenCalledWith('error', expect.any(Function));
    expect(listeners.has('error')).toBe(false);
  });

  it('rejects startup when the server errors before binding', async () => {
    const {server, listeners, asServer} = createMockServer();
    server.listen.mockImplementation(() => {
      listeners.get('error')?.(new Error('listen EADDRINUSE'));
      return server;
    });

    const runtime = createServerRuntime({server: asServer(), host: '127.0.0.1', port: 8787});

    await expect(runtime.start()).rejects.toThrow('listen EADDRINUSE');
  });

  it('closes a listening server', async () => {
    const {server, asServer} = createMockServer();

    const runtime = createServerRuntime({server: asServer(), host: '127.0.0.1', port: 8787});

    await expect(runtime.stop()).resolves.toBeUndefined();
    expect(server.close).toHaveBeenCalledTimes(1);
  });

  it('surfaces close errors', async () => {
    const {server, asServer} = createMockServer();
    server.close.mockImplementation((callback: (error?: Error) => void) => {
      callback(new Error('close failed'));
      return server;
    });

    const runtime = createServerRuntime({server: asServer(), host: '127.0.0.1', port: 8787});

    await expect(runtime.stop()).rejects.toThrow('close failed');
  });

  it('treats stopping a server that never started as done', async () => {
    const {server, asServer} = createMockServer({listening: false});

    const runtime = createServerRuntime({server: asServer(), host: '127.0.0.1', port: 8787});

    await expect(runtime.stop()).resolves.toBeUndefined();
    expect(server.close).not.toHaveBeenCalled();
  });
});
