/**
 * numeval – Node integration / evalMiddleware
 *
 * A framework-agnostic `(req, res, next?)` handler that evaluates
 * expressions posted as JSON. Works with Express-style responses
 * (`status().json()`) and raw `http.ServerResponse`s alike.
 *
 *  Request body:
 *    {
 *      "expression": "max(a[0], x) * 2",
 *      "constants": { "x": 4 },
 *      "arrays": { "a": [10, 20] },
 *      "boolSymbols": false
 *    }
 *
 *  Response:
 *    { "ok": true, "result": 20, "description": "20", "symbols": [] }
 *
 *  On error:
 *    {
 *      "ok": false,
 *      "error": { "code": "E_UNDEFINED_SYMBOL", "message": "Undefined variable y" }
 *    }
 *
 * The body must already be parsed (e.g. by `express.json()`).
 *
 * License: Apache-2.0
 */

import {
  Expression,
  normalizeExpressionOptions,
  type ExpressionOptions,
} from '../../core/engine';
import { isExpressionError } from '../../core/errors';
import { describeSymbol } from '../../core/symbols';

//////////////////////
// Public interfaces //
//////////////////////

export interface EvalRequestPayload {
  expression: string;
  constants?: Record<string, number>;
  arrays?: Record<string, number[]>;
  boolSymbols?: boolean;
}

export interface EvalErrorBody {
  /** `E_*` code of an ExpressionError, or one of the request-level codes. */
  code: string;
  message: string;
  /** ExpressionError detail kind, when `exposeErrorDetails` is on. */
  kind?: string;
}

export type EvalResponse =
  | {
      ok: true;
      result: number;
      /** The bound expression, after folding. */
      description: string;
      /** Symbols left after folding, e.g. "variable x". */
      symbols: string[];
    }
  | { ok: false; error: EvalErrorBody };

/**
 * The parts of a request this handler reads. Express requests and Node's
 * `IncomingMessage` (with a parsed `body`) both fit.
 */
export interface EvalRequest {
  method?: string;
  body?: unknown;
  query?: unknown;
  /** Set when `delegateResponse` is on. */
  numeval?: EvalResponse;
}

/**
 * The parts of a response this handler writes.
 */
export interface EvalResponseTarget {
  statusCode?: number;
  status?(code: number): unknown;
  json?(body: unknown): unknown;
  setHeader?(name: string, value: string | number): unknown;
  end?(chunk: string): unknown;
}

export type NextFunction = (err?: unknown) => void;

export interface EvalMiddlewareOptions {
  /**
   * Base options for every expression: symbols, parser and default
   * constants/arrays. Payload `constants` and `arrays` are merged over these;
   * payload `boolSymbols` overrides.
   */
  expressionOptions?: ExpressionOptions;

  /**
   * Allowed HTTP methods. Others get 405, or go to `next()` when given.
   *
   * Default: ["POST"].
   */
  allowedMethods?: string[];

  /** Also read `expression` from `req.query`. Default: false. */
  allowQuery?: boolean;

  /**
   * Maximum expression length accepted on the wire, checked before parsing
   * (separate from the parser's own `maxExpressionLength`).
   */
  maxWireExpressionLength?: number;

  /**
   * Called with every error before the error response is produced. Errors
   * it throws propagate.
   */
  onError?(err: unknown, req: EvalRequest): void | Promise<void>;

  /**
   * Attach the response payload to `req.numeval` and call `next()` instead of
   * responding. Without `next`, the response is sent anyway.
   *
   * Default: false.
   */
  delegateResponse?: boolean;

  /** Include the error `kind` in error responses. Default: true. */
  exposeErrorDetails?: boolean;

  /** Static headers (typically CORS) set on every response. */
  corsHeaders?: Record<string, string>;
}

//////////////////////
// Middleware factory
//////////////////////

/**
 *  - Express:
 *      app.use(express.json());
 *      app.post('/eval', createEvalMiddleware());
 *
 *  - Node http.Server:
 *      const handler = createEvalMiddleware();
 *      http.createServer((req, res) => {
 *        readJson(req).then((body) => handler({ method: req.method, body }, res));
 *      });
 */
export function createEvalMiddleware(
  options: EvalMiddlewareOptions = {},
): (req: EvalRequest, res: EvalResponseTarget, next?: NextFunction) => Promise<void> {
  const {
    expressionOptions = {},
    allowedMethods = ['POST'],
    allowQuery = false,
    maxWireExpressionLength,
    onError,
    delegateResponse = false,
    exposeErrorDetails = true,
    corsHeaders,
  } = options;

  const base = normalizeExpressionOptions(expressionOptions);
  const methods = allowedMethods.map((method) => method.toUpperCase());

  return async function evalMiddleware(req, res, next) {
    const respond = (statusCode: number, body: EvalResponse, err?: unknown): void => {
      if (delegateResponse && next) {
        req.numeval = body;
        next(err);
        return;
      }
      if (corsHeaders) setHeaders(res, corsHeaders);
      sendJson(res, statusCode, body);
    };

    const method = (req.method ?? 'GET').toUpperCase();
    if (methods.length > 0 && !methods.includes(method)) {
      if (next) {
        next();
        return;
      }
      if (corsHeaders) setHeaders(res, corsHeaders);
      sendJson(res, 405, failure('E_METHOD_NOT_ALLOWED', 'Method Not Allowed'));
      return;
    }

    const payload = readPayload(req.body, allowQuery ? req.query : undefined);
    if (typeof payload === 'string') {
      respond(400, failure('E_BAD_REQUEST', payload));
      return;
    }

    if (
      typeof maxWireExpressionLength === 'number' &&
      maxWireExpressionLength >= 0 &&
      payload.expression.length > maxWireExpressionLength
    ) {
      respond(
        413,
        failure(
          'E_LIMIT',
          `Expression length ${payload.expression.length} exceeds the maximum of ${maxWireExpressionLength}`,
        ),
      );
      return;
    }

    let response: EvalResponse;
    try {
      const expression = new Expression(payload.expression, {
        ...base,
        boolSymbols: payload.boolSymbols ?? base.boolSymbols,
        constants: merge<number>(base.constants, payload.constants),
        arrays: merge<readonly number[]>(base.arrays, payload.arrays),
      });
      response = {
        ok: true,
        result: expression.evaluate(),
        description: expression.description,
        symbols: expression.symbols.map(describeSymbol),
      };
    } catch (err) {
      await onError?.(err, req);
      if (isExpressionError(err)) {
        respond(400, {
          ok: false,
          error: {
            code: err.code,
            message: err.message,
            ...(exposeErrorDetails ? { kind: err.detail.kind } : {}),
          },
        });
        return;
      }
      const message = err instanceof Error ? err.message : String(err);
      respond(500, failure('E_INTERNAL', message), err);
      return;
    }

    respond(200, response);
  };
}

//////////////////////
// Helper functions //
//////////////////////

function failure(code: string, message: string): EvalResponse {
  return { ok: false, error: { code, message } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberRecord(value: unknown): value is Record<string, number> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'number');
}

function isArrayRecord(value: unknown): value is Record<string, number[]> {
  return (
    isRecord(value) &&
    Object.values(value).every(
      (v) => Array.isArray(v) && v.every((item) => typeof item === 'number'),
    )
  );
}

/**
 * Validated payload, or the reason it was rejected.
 */
function readPayload(body: unknown, query: unknown): EvalRequestPayload | string {
  const fields = isRecord(body) ? body : {};
  const fromQuery = isRecord(query) ? query.expression : undefined;
  const expression = fields.expression ?? fromQuery;

  if (typeof expression !== 'string' || expression.trim() === '') {
    return '"expression" must be a non-empty string';
  }
  const { constants, arrays, boolSymbols } = fields;
  if (constants !== undefined && !isNumberRecord(constants)) {
    return '"constants" must map names to numbers';
  }
  if (arrays !== undefined && !isArrayRecord(arrays)) {
    return '"arrays" must map names to arrays of numbers';
  }
  if (boolSymbols !== undefined && typeof boolSymbols !== 'boolean') {
    return '"boolSymbols" must be a boolean';
  }
  return { expression, constants, arrays, boolSymbols };
}

function merge<T>(
  base: ReadonlyMap<string, T>,
  extra: Record<string, T> | undefined,
): ReadonlyMap<string, T> {
  return extra ? new Map([...base, ...Object.entries(extra)]) : base;
}

/**
 * JSON sender for Express-style and raw Node responses.
 */
function sendJson(res: EvalResponseTarget, statusCode: number, body: EvalResponse): void {
  if (res.status && res.json) {
    res.status(statusCode);
    res.json(body);
    return;
  }

  const payload = JSON.stringify(body);
  res.statusCode = statusCode;
  res.setHeader?.('Content-Type', 'application/json; charset=utf-8');
  res.setHeader?.('Content-Length', Buffer.byteLength(payload, 'utf8'));
  res.end?.(payload);
}

function setHeaders(res: EvalResponseTarget, headers: Record<string, string>): void {
  for (const [name, value] of Object.entries(headers)) {
    res.setHeader?.(name, value);
  }
}
