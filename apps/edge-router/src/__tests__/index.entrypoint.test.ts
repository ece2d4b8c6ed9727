import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

const originalArgv = [...process.argv];

const flushMicrotasks = async () => {
  await new Promise<void>(resolve => {
    setTimeout(() => resolve(), 0);
  });
};

beforeEach(() => {
  process.argv = [...originalArgv];
});

afterEach(() => {
  process.argv = [...originalArgv];
  vi.restoreAllMocks();
  vi.doUnmock('../app');
  vi.doUnmock('../config');
  vi.doUnmock('node:url');
  vi.resetModules();
});

const serviceLogger = {
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn()
};

const mockEntrypoint = ({
  entryFile,
  createEdgeRouterApp,
  loadConfig = vi.fn(() => ({}))
}: {
  entryFile: string;
  createEdgeRouterApp: (...args: never[]) => unknown;
  loadConfig?: (...args: never[]) => unknown;
}) => {
  vi.doMock('../app', () => ({
    SERVICE_NAME: 'edge-router',
    createEdgeRouterApp,
    createServiceLogger: vi.fn(() => serviceLogger)
  }));
  vi.doMock('../config', () => ({
    loadConfig
  }));
  vi.doMock('node:url', () => ({
    fileURLToPath: vi.fn(() => entryFile)
  }));
};

describe('edge router entrypoint', () => {
  it('does not start when imported as a library', async () => {
    const createEdgeRouterApp = vi.fn();
    const loadConfig = vi.fn();
    mockEntrypoint({entryFile: '/virtual/index.ts', createEdgeRouterApp, loadConfig});
    process.argv[1] = '/virtual/other-entry.js';

    const imported = await import('../index');
    await flushMicrotasks();

    expect(imported.appName).toBe('edge-router');
    expect(loadConfig).not.toHaveBeenCalled();
    expect(createEdgeRouterApp).not.toHaveBeenCalled();
  }, 15_000);

  it('starts as the entry module and stops on SIGINT', async () => {
    const start = vi.fn().mockResolvedValue(undefined);
    const stop = vi.fn().mockResolvedValue(undefined);
    const loadConfig = vi.fn().mockReturnValue({role: 'edge'});
    const createEdgeRouterApp = vi.fn().mockResolvedValue({start, stop});
    mockEntrypoint({entryFile: '/virtual/entry.js', createEdgeRouterApp, loadConfig});
    process.argv[1] = '/virtual/entry.js';

    const onSpy = vi.spyOn(process, 'on').mockImplementation(() => process);
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never);

    await import('../index');
    await flushMicrotasks();

    expect(loadConfig).toHaveBeenCalledTimes(1);
    expect(createEdgeRouterApp).toHaveBeenCalledWith({config: {role: 'edge'}, logger: serviceLogger});
    expect(start).toHaveBeenCalledTimes(1);

    const sigintHandler = onSpy.mock.calls.find(call => call[0] === 'SIGINT')?.[1];
    expect(typeof sigintHandler).toBe('function');
    if (typeof sigintHandler === 'function') {
      sigintHandler();
    }
    await flushMicrotasks();

    expect(stop).toHaveBeenCalledTimes(1);
    expect(exitSpy).toHaveBeenCalledWith(0);
    expect(serviceLogger.info).toHaveBeenCalledWith(
      expect.objectContaining({event: 'process.stopping', metadata: {signal: 'SIGINT'}})
    );
  });

  it('logs a fatal event and exits when startup fails', async () => {
    const createEdgeRouterApp = vi.fn().mockRejectedValue(new Error('startup failed'));
    mockEntrypoint({entryFile: '/virtual/failing-entry.js', createEdgeRouterApp});
    process.argv[1] = '/virtual/failing-entry.js';

    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never);

    await import('../index');
    await flushMicrotasks();

    expect(createEdgeRouterApp).toHaveBeenCalledTimes(1);
    expect(exitSpy).toHaveBeenCalledWith(1);

    const fatalLine = stderrSpy.mock.calls
      .map(call => String(call[0]))
      .find(line => line.includes('process.startup.failed'));
    expect(fatalLine).toBeDefined();
    expect(JSON.parse(fatalLine ?? '{}')).toMatchObject({
      level: 'fatal',
      service: 'edge-router',
      event: 'process.startup.failed',
      reason_code: 'startup_failed'
    });
  });
});
