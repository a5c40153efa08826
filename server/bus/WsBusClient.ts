import WebSocket from 'ws';
import { TransientIOError, errorMessage } from '../errors/OrderEntryError';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { decodeJsonRecord } from '../utils/parse';
import { BusClient, BusMessageHandler, ConnectionStateName } from './types';

/** The slice of a WebSocket the bus client needs; lets tests drive frames by hand. */
export interface BusSocket {
  send(data: string): void;
  close(): void;
  isOpen(): boolean;
  onOpen(listener: () => void): void;
  onMessage(listener: (text: string) => void): void;
  onClose(listener: (reason: string) => void): void;
  onError(listener: (error: Error) => void): void;
}

export type BusSocketFactory = (url: string, headers: Record<string, string>) => BusSocket;

export type ConnectionStateListener = (state: ConnectionStateName) => void;

/** Transport-level connection state, reported alongside `connection:state` pushes. */
export interface ConnectionEvents {
  connectionState(): ConnectionStateName;
  onConnectionState(listener: ConnectionStateListener): () => void;
}

export interface WsBusClientOptions {
  url: string;
  apiKey?: string;
  userId?: string;
  ackTimeoutMs?: number;
  reconnectMinMs?: number;
  reconnectMaxMs?: number;
  socketFactory?: BusSocketFactory;
  log?: Logger;
}

type BusOp = 'subscribe' | 'unsubscribe';

interface PendingAck {
  op: BusOp;
  channel: string;
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const DEFAULT_ACK_TIMEOUT_MS = 5_000;
const DEFAULT_RECONNECT_MIN_MS = 1_000;
const DEFAULT_RECONNECT_MAX_MS = 30_000;

export function createWsSocket(url: string, headers: Record<string, string>): BusSocket {
  const ws = new WebSocket(url, { headers });
  return {
    send: (data) => ws.send(data),
    close: () => ws.close(),
    isOpen: () => ws.readyState === WebSocket.OPEN,
    onOpen: (listener) => {
      ws.on('open', listener);
    },
    onMessage: (listener) => {
      ws.on('message', (raw) => listener(raw.toString()));
    },
    onClose: (listener) => {
      ws.on('close', (code, reason) => listener(`${code}${reason.length > 0 ? ` ${reason.toString()}` : ''}`));
    },
    onError: (listener) => {
      ws.on('error', listener);
    },
  };
}

/**
 * Bus client speaking JSON frames over one WebSocket:
 * `{op, channel, requestId}` out, `{op: "ack"}` and `{op: "message"}` in.
 * Socket open and close are reported as connection states; after a drop the
 * client reconnects with exponential backoff and leaves resubscription to
 * whoever owns the channels.
 */
export class WsBusClient implements BusClient, ConnectionEvents {
  private readonly handlers = new Map<string, BusMessageHandler>();
  private readonly acks = new Map<string, PendingAck>();
  private readonly listeners = new Set<ConnectionStateListener>();
  private readonly socketFactory: BusSocketFactory;
  private readonly ackTimeoutMs: number;
  private readonly reconnectMinMs: number;
  private readonly reconnectMaxMs: number;
  private readonly log: Logger;

  private socket: BusSocket | null = null;
  private state: ConnectionStateName = 'DISCONNECTED';
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectDelayMs: number;
  private requestSeq = 0;
  private closed = false;

  constructor(private readonly options: WsBusClientOptions) {
    this.socketFactory = options.socketFactory ?? createWsSocket;
    this.ackTimeoutMs = Math.max(1, options.ackTimeoutMs || DEFAULT_ACK_TIMEOUT_MS);
    this.reconnectMinMs = Math.max(1, options.reconnectMinMs || DEFAULT_RECONNECT_MIN_MS);
    this.reconnectMaxMs = Math.max(this.reconnectMinMs, options.reconnectMaxMs || DEFAULT_RECONNECT_MAX_MS);
    this.reconnectDelayMs = this.reconnectMinMs;
    this.log = options.log ?? defaultLogger;
  }

  /** Opens the socket. Rejects if it closes before opening; later drops reconnect on their own. */
  connect(): Promise<void> {
    this.closed = false;
    if (this.socket?.isOpen()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.open({ resolve, reject });
    });
  }

  close(): void {
    this.closed = true;
    this.clearReconnectTimer();
    const socket = this.socket;
    this.socket = null;
    this.failPendingAcks('client closed');
    this.handlers.clear();
    if (socket) {
      try {
        socket.close();
      } catch (error) {
        this.log.warn('BUS_CLOSE_FAILED', { error: errorMessage(error) });
      }
    }
    this.setState('DISCONNECTED');
    this.listeners.clear();
  }

  connectionState(): ConnectionStateName {
    return this.state;
  }

  onConnectionState(listener: ConnectionStateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async subscribe(channel: string, handler: BusMessageHandler): Promise<void> {
    // Registered before the ack so a message sent right after it is not lost.
    this.handlers.set(channel, handler);
    try {
      await this.request('subscribe', channel);
    } catch (error) {
      if (this.handlers.get(channel) === handler) {
        this.handlers.delete(channel);
      }
      throw error;
    }
  }

  async unsubscribe(channel: string): Promise<void> {
    this.handlers.delete(channel);
    if (!this.socket?.isOpen()) {
      // The server drops a closed connection's subscriptions itself.
      return;
    }
    await this.request('unsubscribe', channel);
  }

  private request(op: BusOp, channel: string): Promise<void> {
    const socket = this.socket;
    if (!socket || !socket.isOpen()) {
      return Promise.reject(
        new TransientIOError('bus_not_connected', `bus_not_connected:${op}:${channel}`, { op, channel })
      );
    }

    this.requestSeq += 1;
    const requestId = String(this.requestSeq);
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.acks.delete(requestId);
        reject(
          new TransientIOError('timeout', `bus_${op}_timeout:${channel}`, { op, channel, timeoutMs: this.ackTimeoutMs })
        );
      }, this.ackTimeoutMs);
      this.acks.set(requestId, { op, channel, resolve, reject, timer });

      try {
        socket.send(JSON.stringify({ op, channel, requestId }));
      } catch (error) {
        clearTimeout(timer);
        this.acks.delete(requestId);
        reject(
          new TransientIOError('send_failed', `bus_${op}_send_failed:${channel}: ${errorMessage(error)}`, { op, channel })
        );
      }
    });
  }

  private open(waiter?: { resolve: () => void; reject: (error: Error) => void }): void {
    this.clearReconnectTimer();

    let socket: BusSocket;
    try {
      socket = this.socketFactory(this.options.url, this.headers());
    } catch (error) {
      this.log.error('BUS_CONNECT_FAILED', { url: this.options.url, error: errorMessage(error) });
      if (waiter) {
        waiter.reject(new TransientIOError('bus_connect_failed', `bus_connect_failed: ${errorMessage(error)}`));
        return;
      }
      this.scheduleReconnect();
      return;
    }

    this.socket = socket;
    let opened = false;

    socket.onOpen(() => {
      if (this.socket !== socket) {
        return;
      }
      opened = true;
      this.reconnectDelayMs = this.reconnectMinMs;
      this.log.info('BUS_CONNECTED', { url: this.options.url });
      this.setState('CONNECTED');
      waiter?.resolve();
    });

    socket.onMessage((text) => {
      if (this.socket === socket) {
        this.handleFrame(text);
      }
    });

    socket.onError((error) => {
      this.log.warn('BUS_SOCKET_ERROR', { error: error.message });
    });

    socket.onClose((reason) => {
      if (this.socket !== socket) {
        return;
      }
      this.socket = null;
      this.failPendingAcks(`socket closed (${reason})`);
      this.log.warn('BUS_DISCONNECTED', { reason, wasOpen: opened });
      this.setState('DISCONNECTED');

      if (!opened && waiter) {
        waiter.reject(new TransientIOError('bus_connect_failed', `bus_connect_failed: ${reason}`));
        return;
      }
      if (!this.closed) {
        this.scheduleReconnect();
      }
    });
  }

  private handleFrame(text: string): void {
    const decoded = decodeJsonRecord(text);
    if (!decoded.ok) {
      this.log.warn('BUS_FRAME_INVALID', { error: decoded.error });
      return;
    }
    const frame = decoded.value;

    if (frame.op === 'ack') {
      const requestId = String(frame.requestId ?? '');
      const pending = this.acks.get(requestId);
      if (!pending) {
        this.log.debug('BUS_ACK_UNMATCHED', { requestId });
        return;
      }
      clearTimeout(pending.timer);
      this.acks.delete(requestId);
      if (frame.ok === true) {
        pending.resolve();
        return;
      }
      const reason = typeof frame.error === 'string' && frame.error ? frame.error : 'rejected';
      pending.reject(
        new TransientIOError('bus_rejected', `bus_${pending.op}_rejected:${pending.channel}: ${reason}`, {
          op: pending.op,
          channel: pending.channel,
        })
      );
      return;
    }

    if (frame.op === 'message') {
      if (typeof frame.channel !== 'string') {
        this.log.warn('BUS_FRAME_INVALID', { error: 'message without channel' });
        return;
      }
      const handler = this.handlers.get(frame.channel);
      if (!handler) {
        return;
      }
      this.deliver(frame.channel, handler, frame.data);
      return;
    }

    this.log.debug('BUS_FRAME_IGNORED', { op: frame.op });
  }

  private deliver(channel: string, handler: BusMessageHandler, data: unknown): void {
    let result: void | Promise<void>;
    try {
      result = handler(data);
    } catch (error) {
      this.log.error('BUS_HANDLER_FAILED', { channel, error: errorMessage(error) });
      return;
    }
    if (result instanceof Promise) {
      result.catch((error: unknown) => {
        this.log.error('BUS_HANDLER_FAILED', { channel, error: errorMessage(error) });
      });
    }
  }

  private failPendingAcks(reason: string): void {
    for (const [requestId, pending] of this.acks) {
      clearTimeout(pending.timer);
      pending.reject(
        new TransientIOError('bus_disconnected', `bus_${pending.op}_interrupted:${pending.channel}: ${reason}`, {
          op: pending.op,
          channel: pending.channel,
          requestId,
        })
      );
    }
    this.acks.clear();
  }

  private scheduleReconnect(): void {
    if (this.closed || this.reconnectTimer) {
      return;
    }
    const delayMs = this.reconnectDelayMs;
    this.reconnectDelayMs = Math.min(this.reconnectDelayMs * 2, this.reconnectMaxMs);
    this.log.info('BUS_RECONNECT_SCHEDULED', { delayMs });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.closed) {
        return;
      }
      this.setState('RECONNECTING');
      this.open();
    }, delayMs);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private setState(next: ConnectionStateName): void {
    if (this.state === next) {
      return;
    }
    this.state = next;
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (error) {
        this.log.error('BUS_STATE_LISTENER_FAILED', { state: next, error: errorMessage(error) });
      }
    }
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }
    if (this.options.userId) {
      headers['X-User-Id'] = this.options.userId;
    }
    return headers;
  }
}
