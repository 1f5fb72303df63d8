import express, { type ErrorRequestHandler, type Express } from 'express';
import { logger } from '../core/logger.js';
import type { GatewayFacade } from '../gateway/gateway-facade.js';
import { JsonRpcErrorCode, errorResponse, isRecord } from '../protocol/json-rpc.js';
import { registerAllRoutes } from './routes/index.js';

const log = logger.module('HttpServer');
const HTTP_BODY_LIMIT = '4mb';

export function createGatewayApp(gateway: GatewayFacade): Express {
  const app = express();
  app.disable('x-powered-by');
  // strict: false lets non-object JSON through so it is answered as an invalid request.
  app.use(express.json({ limit: HTTP_BODY_LIMIT, strict: false }));

  app.use((req, _res, next) => {
    log.debug('HTTP request', { method: req.method, path: req.path });
    next();
  });

  registerAllRoutes(app, { gateway });

  app.use(handleErrors);
  return app;
}

const handleErrors: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (isRecord(error) && error.type === 'entity.parse.failed') {
    log.debug('Rejected malformed JSON body', { path: req.path });
    res.status(200).json(errorResponse(null, JsonRpcErrorCode.ParseError, 'Parse error'));
    return;
  }
  if (isRecord(error) && error.type === 'entity.too.large') {
    res.status(413).json({ error: 'Request body too large' });
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  log.error('Unhandled request error', error instanceof Error ? error : undefined, { path: req.path, message });
  res.status(500).json({ error: message });
};
