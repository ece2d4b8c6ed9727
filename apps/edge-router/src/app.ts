import 'reflect-metadata';

import type {Server} from 'node:http';

import {NestFactory} from '@nestjs/core';
import {ExpressAdapter} from '@nestjs/platform-express';
import express from 'express';
import helmet from 'helmet';

import type {FetchLike} from '@edge-router/forwarder';
import {createStructuredLogger, type StructuredLogger} from '@edge-router/logging';
import type {RegionalDispatchTarget} from '@edge-router/processor';

import type {ServiceConfig} from './config';
import {EdgeRouterNestModule} from './nest/edgeRouterNestModule';
import {createServerRuntime} from './runtime';

export const SERVICE_NAME = 'edge-router';

export const createServiceLogger = (config: ServiceConfig): StructuredLogger =>
  createStructuredLogger({
    service: SERVICE_NAME,
    env: config.nodeEnv,
    level: config.logging.level,
    extraSensitiveKeys: config.logging.redactExtraKeys
  });

export const createEdgeRouterApp = async ({
  config,
  logger = createServiceLogger(config),
  fetchImpl,
  dispatchTarget
}: {
  config: ServiceConfig;
  logger?: StructuredLogger;
  fetchImpl?: FetchLike;
  dispatchTarget?: RegionalDispatchTarget;
}) => {
  const expressApp = express();
  expressApp.disable('x-powered-by');
  expressApp.use(
    helmet({
      contentSecurityPolicy: false
    })
  );

  const nestApp = await NestFactory.create(
    EdgeRouterNestModule.register({
      config,
      logger,
      ...(fetchImpl ? {fetchImpl} : {}),
      ...(dispatchTarget ? {dispatchTarget} : {})
    }),
    new ExpressAdapter(expressApp),
    {
      bodyParser: false,
      logger: config.nodeEnv === 'test' ? false : ['error', 'warn']
    }
  );

  await nestApp.init();

  const server: Server = nestApp.getHttpServer();
  const runtime = createServerRuntime({server, host: config.host, port: config.port});

  const start = async () => {
    await runtime.start();
    logger.info({
      event: 'process.started',
      component: 'process.entrypoint',
      message: `Listening as ${config.role}`,
      metadata: {host: config.host, port: config.port, role: config.role, dispatch_mode: config.dispatch.mode}
    });
  };

  const stop = async () => {
    await runtime.stop();
    await nestApp.close();
  };

  return {
    server,
    start,
    stop
  };
};

export type EdgeRouterApp = Awaited<ReturnType<typeof createEdgeRouterApp>>;
