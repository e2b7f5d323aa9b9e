/**
 * HTTP surface: validates the request, hands the base64 payload to the
 * converter and maps the outcome kind onto a status code.
 */

import express, { type ErrorRequestHandler, type Express, type RequestHandler } from 'express';
import { Logger } from '@pdfa/shared/Utils/logger.js';
import { DEFAULT_MAX_INPUT_BYTES } from '../config.js';
import { toResponse, type ConversionErrorKind, type ConversionOutcome, type Converter } from '../conversion/types.js';
import { UNEXPECTED_MESSAGE } from '../conversion/orchestrator.js';
import { correlationId, getRequestContext } from './correlation-id.js';
import { createConvertRequestSchema, type ConvertResponseBody } from './schemas.js';

export const API_BASE_PATH = '/api/PdfaConversion';

/** base64 inflates by a third; 120 MB leaves room for a 100 MB PDF */
const DEFAULT_BODY_LIMIT = '120mb';

const STATUS_BY_KIND: Record<ConversionErrorKind, number> = {
  InvalidInput: 400,
  Timeout: 504,
  ToolFailure: 500,
  OutputMissing: 500,
  Unexpected: 500,
};

export interface AppOptions {
  converter: Converter;
  logger?: Logger;
  maxInputBytes?: number;
  bodyLimit?: string;
}

function errorBody(errorMessage: string): ConvertResponseBody {
  return { success: false, base64PdfA: '', errorMessage };
}

export function toHttpResponse(outcome: ConversionOutcome): { status: number; body: ConvertResponseBody } {
  const response = toResponse(outcome);
  if (outcome.ok) {
    return { status: 200, body: { success: true, base64PdfA: response.base64Output, errorMessage: '' } };
  }
  const message =
    outcome.kind === 'ToolFailure' || outcome.kind === 'OutputMissing'
      ? `Conversion failed: ${response.errorMessage}`
      : response.errorMessage;
  return { status: STATUS_BY_KIND[outcome.kind], body: errorBody(message) };
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function createApp(options: AppOptions): Express {
  const baseLogger = options.logger ?? new Logger('pdfa');
  const maxInputBytes = options.maxInputBytes ?? DEFAULT_MAX_INPUT_BYTES;
  const requestSchema = createConvertRequestSchema(maxInputBytes);
  const { converter } = options;

  const health: RequestHandler = (_req, res) => {
    res.json({ status: 'Healthy', timestamp: new Date().toISOString() });
  };

  const convert: RequestHandler = async (req, res, next) => {
    const { logger } = getRequestContext(req, baseLogger);

    const parsed = requestSchema.safeParse(req.body);
    if (!parsed.success) {
      const message = parsed.error.issues.map((issue) => issue.message).join('; ');
      logger.warn(`Invalid conversion request: ${message}`);
      res.status(400).json(errorBody(message));
      return;
    }

    // A client that hangs up cancels the running conversion
    const abort = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) {
        logger.warn('Client disconnected, cancelling conversion');
        abort.abort();
      }
    };
    res.on('close', onClose);

    try {
      logger.info('Processing PDF conversion request');
      const outcome = await converter.convert(parsed.data.base64Pdf, abort.signal);
      if (abort.signal.aborted) return;

      const { status, body } = toHttpResponse(outcome);
      if (!outcome.ok) {
        const level = outcome.kind === 'InvalidInput' ? 'warn' : 'error';
        logger[level](`Conversion failed (${outcome.kind}): ${outcome.message}`);
      }
      res.status(status).json(body);
    } catch (error) {
      next(error);
    } finally {
      res.off('close', onClose);
    }
  };

  const notFound: RequestHandler = (_req, res) => {
    res.status(404).json(errorBody('Not found'));
  };

  const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const { logger } = getRequestContext(req, baseLogger);
    const status = httpStatusOf(err);

    if (status === 400) {
      logger.warn('Malformed request body', err);
      res.status(400).json(errorBody('Request body is not valid JSON'));
      return;
    }
    if (status === 413) {
      logger.warn('Request body too large');
      res.status(413).json(errorBody('Request body too large'));
      return;
    }
    logger.error('Unexpected error processing conversion request', err);
    res.status(500).json(errorBody(UNEXPECTED_MESSAGE));
  };

  const app = express();
  app.disable('x-powered-by');
  app.use(correlationId(baseLogger));
  app.use(express.json({ limit: options.bodyLimit ?? DEFAULT_BODY_LIMIT }));

  app.get(`${API_BASE_PATH}/health`, health);
  app.post(`${API_BASE_PATH}/convert`, convert);

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
