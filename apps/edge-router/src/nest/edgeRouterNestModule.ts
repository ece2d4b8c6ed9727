import {All, Controller, Inject, Module, Req, Res, type DynamicModule} from '@nestjs/common';
import type {Request, Response} from 'express';

import type {FetchLike} from '@edge-router/forwarder';
import type {StructuredLogger} from '@edge-router/logging';
import type {RegionalDispatchTarget} from '@edge-router/processor';

import type {ServiceConfig} from '../config';
import {createEdgeRouterRequestHandler, type RequestHandler} from '../server';
import {
  EDGE_ROUTER_CONFIG,
  EDGE_ROUTER_DISPATCH_TARGET,
  EDGE_ROUTER_FETCH_IMPL,
  EDGE_ROUTER_LOGGER,
  EDGE_ROUTER_REQUEST_HANDLER
} from './tokens';

export type EdgeRouterNestModuleOptions = {
  config: ServiceConfig;
  logger: StructuredLogger;
  fetchImpl?: FetchLike;
  dispatchTarget?: RegionalDispatchTarget;
};

@Controller()
class EdgeRouterController {
  public constructor(
    @Inject(EDGE_ROUTER_REQUEST_HANDLER)
    private readonly requestHandler: RequestHandler
  ) {}

  @All('*')
  public async handle(@Req() request: Request, @Res() response: Response): Promise<void> {
    await this.requestHandler(request, response);
  }
}

@Module({
  controllers: [EdgeRouterController]
})
export class EdgeRouterNestModule {
  public static register(options: EdgeRouterNestModuleOptions): DynamicModule {
    return {
      module: EdgeRouterNestModule,
      providers: [
        {
          provide: EDGE_ROUTER_CONFIG,
          useValue: options.config
        },
        {
          provide: EDGE_ROUTER_LOGGER,
          useValue: options.logger
        },
        {
          provide: EDGE_ROUTER_FETCH_IMPL,
          useValue: options.fetchImpl ?? null
        },
        {
          provide: EDGE_ROUTER_DISPATCH_TARGET,
          useValue: options.dispatchTarget ?? null
        },
        {
          provide: EDGE_ROUTER_REQUEST_HANDLER,
          inject: [EDGE_ROUTER_CONFIG, EDGE_ROUTER_LOGGER, EDGE_ROUTER_FETCH_IMPL, EDGE_ROUTER_DISPATCH_TARGET],
          useFactory: (
            config: ServiceConfig,
            logger: StructuredLogger,
            fetchImpl: FetchLike | null,
            dispatchTarget: RegionalDispatchTarget | null
          ) =>
            createEdgeRouterRequestHandler({
              config,
              logger,
              ...(fetchImpl ? {fetchImpl} : {}),
              ...(dispatchTarget ? {dispatchTarget} : {})
            })
        }
      ]
    };
  }
}
