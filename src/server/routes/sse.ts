import type { Express } from 'express';
import type { GatewayFacade } from '../../gateway/gateway-facade.js';
import { SSE_HEADERS, SseChannel } from '../sse-channel.js';

export interface SseRouteDeps {
  gateway: GatewayFacade;
}

export function registerSseRoutes(app: Express, deps: SseRouteDeps): void {
  const { gateway } = deps;

  app.get('/sse', (_req, res) => {
    res.writeHead(200, SSE_HEADERS);
    res.flushHeaders();

    const session = gateway.onStreamConnect(new SseChannel(res));
    // req 'close' fires once the request body is consumed; the response closes with the socket.
    res.on('close', () => {
      gateway.onStreamDisconnect(session.id);
    });
  });
}
