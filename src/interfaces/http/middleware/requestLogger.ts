/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * Pino's HTTP plugin logs each request and its response with status and
 * duration. Every request is tagged with an id, taken from the incoming
 * X-Request-ID header when present, otherwise a fresh UUID, and echoed back
 * on the response.
 */
import { randomUUID } from 'node:crypto';

import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

const REQUEST_ID_HEADER = 'X-Request-ID';

export const requestLogger = pinoHttp({
  logger,
  genReqId: (req, res) => {
    const incoming = req.headers['x-request-id'];
    const id = typeof incoming === 'string' && incoming.trim() !== '' ? incoming.trim() : randomUUID();
    res.setHeader(REQUEST_ID_HEADER, id);
    return id;
  },
});
