import { TransientIOError, ValidationError, errorMessage } from '../errors/OrderEntryError';
import type { OrderRequest } from '../orders/types';
import type { SafetyKind } from '../safety/SafetyState';
import type { SafetyStateSource } from '../safety/SafetyStateTracker';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { isRecord } from '../utils/parse';
import {
  AccountSnapshot,
  OrderAck,
  ParseResult,
  PositionsSnapshot,
  Quote,
  RecentFills,
  RiskLimitsSnapshot,
  parseAccountPayload,
  parseOrderAck,
  parsePositionsPayload,
  parseQuotePayload,
  parseRecentFillsPayload,
  parseRiskLimitsPayload,
} from './payloads';

/** REST collaborators of an order-entry session. Every read is parsed and timestamp-checked. */
export interface TradingApi extends SafetyStateSource {
  fetchPositions(signal?: AbortSignal): Promise<PositionsSnapshot>;
  fetchAccount(signal?: AbortSignal): Promise<AccountSnapshot>;
  fetchRiskLimits(signal?: AbortSignal): Promise<RiskLimitsSnapshot>;
  fetchRecentFills(signal?: AbortSignal): Promise<RecentFills>;
  fetchQuote(symbol: string, signal?: AbortSignal): Promise<Quote>;
  submitOrder(order: OrderRequest, signal?: AbortSignal): Promise<OrderAck>;
}

export interface TradingApiClientConfig {
  baseUrl: string;
  apiKey: string;
  userId: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  log?: Logger;
}

interface RawResponse {
  status: number;
  ok: boolean;
  body: unknown;
}

const DEFAULT_TIMEOUT_MS = 10_000;

export class TradingApiClient implements TradingApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(private readonly config: TradingApiClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.timeoutMs = Math.max(1, config.timeoutMs || DEFAULT_TIMEOUT_MS);
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.log = config.log ?? defaultLogger;
  }

  async fetchPositions(signal?: AbortSignal): Promise<PositionsSnapshot> {
    return this.getParsed('/api/v1/positions', parsePositionsPayload, signal);
  }

  async fetchAccount(signal?: AbortSignal): Promise<AccountSnapshot> {
    return this.getParsed('/api/v1/account', parseAccountPayload, signal);
  }

  async fetchRiskLimits(signal?: AbortSignal): Promise<RiskLimitsSnapshot> {
    return this.getParsed('/api/v1/risk_limits', parseRiskLimitsPayload, signal);
  }

  async fetchRecentFills(signal?: AbortSignal): Promise<RecentFills> {
    return this.getParsed('/api/v1/fills/recent', parseRecentFillsPayload, signal);
  }

  async fetchQuote(symbol: string, signal?: AbortSignal): Promise<Quote> {
    return this.getParsed(
      `/api/v1/market_data/${encodeURIComponent(symbol)}/quote`,
      (raw) => parseQuotePayload(raw, symbol),
      signal
    );
  }

  /** Raw state for the tracker to parse; null when the source holds none. */
  async readSafetyState(kind: SafetyKind, signal: AbortSignal): Promise<unknown> {
    const response = await this.send('GET', `/api/v1/safety/${kind}`, { signal });
    if (response.status === 404) {
      return null;
    }
    this.assertOk('GET', `/api/v1/safety/${kind}`, response);
    return response.body;
  }

  /**
   * Posts the order with the intent ID as `Idempotency-Key`. An HTTP rejection
   * with a readable body comes back as an ack carrying the broker's status;
   * transport failures throw so the caller can retry with the same key.
   */
  async submitOrder(order: OrderRequest, signal?: AbortSignal): Promise<OrderAck> {
    const path = '/api/v1/orders';
    const body: Record<string, unknown> = {
      symbol: order.symbol,
      side: order.side,
      qty: Number(order.qty),
      order_type: order.orderType,
      time_in_force: order.timeInForce,
      client_order_id: order.clientOrderId,
    };
    if (order.limitPrice !== null) {
      body.limit_price = order.limitPrice;
    }
    if (order.stopPrice !== null) {
      body.stop_price = order.stopPrice;
    }

    const response = await this.send('POST', path, {
      body,
      headers: { 'Idempotency-Key': order.clientOrderId },
      signal,
    });

    const parsed = parseOrderAck(response.body);
    if (parsed.ok) {
      return parsed.value;
    }
    if (response.status >= 500) {
      throw new TransientIOError('http_error', `POST ${path} failed (${response.status})`, { status: response.status });
    }
    if (!response.ok) {
      return { orderId: null, status: 'rejected', message: describeBody(response.body) ?? `HTTP ${response.status}` };
    }
    throw new ValidationError('malformed_payload', `POST ${path}: ${parsed.error}`, { path });
  }

  private async getParsed<T>(
    path: string,
    parse: (raw: unknown) => ParseResult<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const response = await this.send('GET', path, { signal });
    this.assertOk('GET', path, response);
    const parsed = parse(response.body);
    if (!parsed.ok) {
      this.log.warn('TRADING_API_MALFORMED_PAYLOAD', { path, error: parsed.error });
      throw new ValidationError('malformed_payload', `GET ${path}: ${parsed.error}`, { path });
    }
    return parsed.value;
  }

  private assertOk(method: string, path: string, response: RawResponse): void {
    if (response.ok) {
      return;
    }
    const message = `${method} ${path} failed (${response.status})`;
    this.log.warn('TRADING_API_HTTP_ERROR', { method, path, status: response.status });
    if (response.status >= 500 || response.status === 429) {
      throw new TransientIOError('http_error', message, { status: response.status });
    }
    throw new ValidationError('http_rejected', message, { status: response.status, body: response.body });
  }

  private async send(
    method: 'GET' | 'POST',
    path: string,
    options: { body?: unknown; headers?: Record<string, string>; signal?: AbortSignal } = {}
  ): Promise<RawResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${this.config.apiKey}`,
      'X-User-Id': this.config.userId,
      ...options.headers,
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
    } catch (error) {
      const aborted = controller.signal.aborted;
      this.log.warn('TRADING_API_REQUEST_FAILED', { method, path, aborted, error: errorMessage(error) });
      throw new TransientIOError(
        aborted ? 'timeout' : 'http_failed',
        `${method} ${path} ${aborted ? 'aborted' : 'failed'}: ${errorMessage(error)}`,
        { path }
      );
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onAbort);
    }

    const raw = await response.text();
    let body: unknown = raw;
    try {
      body = JSON.parse(raw);
    } catch {
      // keep raw text; parsers reject it
    }
    return { status: response.status, ok: response.ok, body };
  }
}

function describeBody(body: unknown): string | null {
  if (typeof body === 'string') {
    return body.trim() || null;
  }
  if (isRecord(body)) {
    for (const key of ['message', 'detail', 'error']) {
      const value = body[key];
      if (typeof value === 'string' && value) {
        return value;
      }
    }
  }
  return null;
}
