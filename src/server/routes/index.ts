import type { Express } from 'express';
import type { GatewayFacade } from '../../gateway/gateway-facade.js';
import { registerHealthRoutes } from './health.js';
import { registerMessageRoutes } from './message.js';
import { registerSseRoutes } from './sse.js';
import { registerToolRoutes } from './tools.js';

export interface RegisterAllRoutesDeps {
  gateway: GatewayFacade;
}

export function registerAllRoutes(app: Express, deps: RegisterAllRoutesDeps): void {
  registerHealthRoutes(app, deps);
  registerSseRoutes(app, deps);
  registerMessageRoutes(app, deps);
  registerToolRoutes(app, deps);
}
