/**
 * Correlation id per request: taken from X-Correlation-ID when the caller
 * sends one, generated otherwise, echoed on the response and bound into the
 * request's logger.
 */

import type { Request, RequestHandler } from 'express';
import type { Logger } from '@pdfa/shared/Utils/logger.js';
import { generateCorrelationId } from '../utils/id-generator.js';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';
const MAX_CORRELATION_ID_LENGTH = 128;

export interface RequestContext {
  correlationId: string;
  logger: Logger;
}

const contexts = new WeakMap<Request, RequestContext>();

export function correlationId(baseLogger: Logger): RequestHandler {
  return (req, res, next) => {
    const incoming = req.get(CORRELATION_ID_HEADER)?.trim();
    const id =
      incoming && incoming.length <= MAX_CORRELATION_ID_LENGTH ? incoming : generateCorrelationId();

    res.setHeader(CORRELATION_ID_HEADER, id);
    contexts.set(req, { correlationId: id, logger: baseLogger.child('http', { correlationId: id }) });
    next();
  };
}

/** Context set by the middleware; requests that bypassed it get the base logger */
export function getRequestContext(req: Request, baseLogger: Logger): RequestContext {
  return contexts.get(req) ?? { correlationId: '', logger: baseLogger };
}
