import 'reflect-metadata';

import {fileURLToPath} from 'node:url';

import {createStructuredLogger} from '@edge-router/logging';

import {createEdgeRouterApp, createServiceLogger, SERVICE_NAME} from './app';
import {loadConfig} from './config';

export const appName = SERVICE_NAME;

export * from './app';
export * from './config';
export * from './errors';
export * from './http';
export * from './runtime';
export * from './server';

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

const main = async () => {
  const config = loadConfig(process.env);
  const logger = createServiceLogger(config);
  const app = await createEdgeRouterApp({config, logger});

  await app.start();

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, () => {
      logger.info({
        event: 'process.stopping',
        component: 'process.entrypoint',
        message: 'Shutting down',
        metadata: {signal}
      });
      void app.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({
            event: 'process.stop.failed',
            component: 'process.entrypoint',
            message: 'Shutdown failed',
            reason_code: 'shutdown_failed',
            metadata: {error}
          });
          process.exit(1);
        }
      );
    });
  }
};

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url);
  const entryFile = process.argv[1];
  if (!entryFile) {
    return false;
  }

  return currentFile === entryFile;
})();

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development';
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    });
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Edge router startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    });
    process.exit(1);
  });
}
