import type { Express } from 'express';
import type { GatewayFacade } from '../../gateway/gateway-facade.js';

export interface MessageRouteDeps {
  gateway: GatewayFacade;
}

export function registerMessageRoutes(app: Express, deps: MessageRouteDeps): void {
  const { gateway } = deps;

  // JSON-RPC errors are part of the response body, so the status is always 200.
  app.post('/message', (req, res, next) => {
    gateway
      .onMessage(req.body)
      .then((response) => {
        res.json(response);
      })
      .catch(next);
  });
}
