import type { Express } from 'express';
import type { GatewayFacade } from '../../gateway/gateway-facade.js';

export interface ToolRouteDeps {
  gateway: GatewayFacade;
}

export function registerToolRoutes(app: Express, deps: ToolRouteDeps): void {
  const { gateway } = deps;

  app.get('/tools', (_req, res) => {
    res.json(gateway.listTools());
  });

  app.post('/rescan', (_req, res, next) => {
    gateway
      .rescan()
      .then((summary) => {
        res.json(summary);
      })
      .catch(next);
  });
}
