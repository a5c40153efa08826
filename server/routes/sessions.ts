import { NextFunction, Request, Response, Router } from 'express';
import {
  isOrderEntryError,
  OrderEntryError,
  SafetyBlockedError,
  TransientIOError,
  ValidationError,
} from '../errors/OrderEntryError';
import type { BlockReason, OrderFormInput } from '../orders/types';
import { SessionService } from '../session/SessionService';
import { Logger, logger as defaultLogger, serializeError } from '../utils/logger';
import { isRecord } from '../utils/parse';
import type { SessionStreamManager } from '../ws/SessionStreamManager';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function bodyOf(req: Request): Record<string, unknown> {
  return isRecord(req.body) ? req.body : {};
}

const FORM_FIELDS: Array<[keyof OrderFormInput, string[]]> = [
  ['symbol', ['symbol']],
  ['side', ['side']],
  ['qty', ['qty']],
  ['orderType', ['orderType', 'order_type']],
  ['limitPrice', ['limitPrice', 'limit_price']],
  ['stopPrice', ['stopPrice', 'stop_price']],
  ['timeInForce', ['timeInForce', 'time_in_force']],
];

// Only fields present in the body; an absent key keeps the draft's value.
function formInput(body: Record<string, unknown>): OrderFormInput {
  const input: OrderFormInput = {};
  for (const [field, keys] of FORM_FIELDS) {
    const key = keys.find((candidate) => candidate in body);
    if (key !== undefined) {
      input[field] = body[key];
    }
  }
  return input;
}

/** The error kind a blocked preview or confirm answers with. */
export function blockError(block: BlockReason): OrderEntryError {
  const details = { category: block.category, verification: block.verification };
  if (block.category === 'safety') {
    return new SafetyBlockedError(block.code, block.reason, details);
  }
  if (block.category === 'connection' || block.code === 'submission_failed') {
    return new TransientIOError(block.code, block.reason, details);
  }
  return new ValidationError(block.code, block.reason, details);
}

function optionalSymbol(value: unknown): string | null {
  if (value === undefined || value === null || value === '') {
    return null;
  }
  return String(value);
}

export function createSessionRouter(sessions: SessionService, streams?: SessionStreamManager): Router {
  const router = Router();

  router.get(
    '/',
    route(async (_req, res) => {
      res.json({ ok: true, sessions: sessions.list() });
    })
  );

  router.post(
    '/',
    route(async (req, res) => {
      const body = bodyOf(req);
      const coordinator = await sessions.create({ userId: body.userId, sessionId: body.sessionId });
      res.status(201).json({ ok: true, session: coordinator.status() });
    })
  );

  router.get(
    '/:id',
    route(async (req, res) => {
      res.json({ ok: true, session: sessions.status(req.params.id) });
    })
  );

  router.delete(
    '/:id',
    route(async (req, res) => {
      streams?.closeSession(req.params.id);
      const closed = await sessions.close(req.params.id);
      res.status(closed ? 200 : 404).json({ ok: closed });
    })
  );

  router.post(
    '/:id/select',
    route(async (req, res) => {
      const result = await sessions.get(req.params.id).selectSymbol(optionalSymbol(bodyOf(req).symbol));
      res.json({ ok: true, selection: result });
    })
  );

  router.post(
    '/:id/watchlist',
    route(async (req, res) => {
      const subscribed = await sessions.get(req.params.id).watchSymbol(String(bodyOf(req).symbol ?? ''));
      res.json({ ok: true, subscribed });
    })
  );

  router.delete(
    '/:id/watchlist/:symbol',
    route(async (req, res) => {
      await sessions.get(req.params.id).unwatchSymbol(req.params.symbol);
      res.json({ ok: true });
    })
  );

  router.put(
    '/:id/form',
    route(async (req, res) => {
      const coordinator = sessions.get(req.params.id);
      await coordinator.pipeline.updateForm(formInput(bodyOf(req)));
      res.json({ ok: true, order: coordinator.pipeline.snapshot(), check: coordinator.status().submission });
    })
  );

  router.post(
    '/:id/preview',
    route(async (req, res) => {
      const result = await sessions.get(req.params.id).pipeline.preview();
      res.status(result.ok ? 200 : blockError(result.block).statusCode).json(result);
    })
  );

  router.post(
    '/:id/preview/cancel',
    route(async (req, res) => {
      const coordinator = sessions.get(req.params.id);
      coordinator.pipeline.cancelPreview();
      res.json({ ok: true, order: coordinator.pipeline.snapshot() });
    })
  );

  router.post(
    '/:id/confirm',
    route(async (req, res) => {
      const result = await sessions.get(req.params.id).pipeline.confirm();
      res.status(result.ok ? 200 : blockError(result.block).statusCode).json(result);
    })
  );

  router.post(
    '/:id/fills/refresh',
    route(async (req, res) => {
      const fills = await sessions.get(req.params.id).refreshRecentFills();
      res.json({ ok: true, fills });
    })
  );

  return router;
}

/** Maps OrderEntryError kinds to status codes; anything else is a 500. */
export function errorHandler(log: Logger = defaultLogger) {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (isOrderEntryError(error)) {
      if (error.statusCode >= 500) {
        log.error('HTTP_REQUEST_FAILED', { path: req.originalUrl, error: serializeError(error) });
      }
      res.status(error.statusCode).json({ ok: false, error: error.code, message: error.message });
      return;
    }
    if (error instanceof SyntaxError) {
      // express.json() on a malformed body
      res.status(400).json({ ok: false, error: 'invalid_json', message: error.message });
      return;
    }
    log.error('HTTP_UNHANDLED_ERROR', { path: req.originalUrl, error: serializeError(error) });
    res.status(500).json({ ok: false, error: 'internal_error', message: 'Internal server error' });
  };
}
