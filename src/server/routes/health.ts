import type { Express } from 'express';
import type { GatewayFacade } from '../../gateway/gateway-facade.js';

export interface HealthRouteDeps {
  gateway: GatewayFacade;
}

export function registerHealthRoutes(app: Express, deps: HealthRouteDeps): void {
  const { gateway } = deps;

  app.get('/health', (_req, res) => {
    res.json(gateway.health());
  });
}
