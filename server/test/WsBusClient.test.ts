import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ConnectionStateName } from '../bus/types';
import { BusSocket, WsBusClient } from '../bus/WsBusClient';
import { TransientIOError } from '../errors/OrderEntryError';
import { recordingLogger } from './helpers';

class FakeSocket implements BusSocket {
  readonly sent: Array<Record<string, unknown>> = [];
  private open = false;
  private openListeners: Array<() => void> = [];
  private messageListeners: Array<(text: string) => void> = [];
  private closeListeners: Array<(reason: string) => void> = [];

  constructor(readonly url: string, readonly headers: Record<string, string>) {}

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }
  close(): void {
    this.emitClose('1000');
  }
  isOpen(): boolean {
    return this.open;
  }
  onOpen(listener: () => void): void {
    this.openListeners.push(listener);
  }
  onMessage(listener: (text: string) => void): void {
    this.messageListeners.push(listener);
  }
  onClose(listener: (reason: string) => void): void {
    this.closeListeners.push(listener);
  }
  onError(): void {}

  emitOpen(): void {
    this.open = true;
    this.openListeners.forEach((listener) => listener());
  }
  emitFrame(frame: unknown): void {
    const text = typeof frame === 'string' ? frame : JSON.stringify(frame);
    this.messageListeners.forEach((listener) => listener(text));
  }
  emitClose(reason: string): void {
    this.open = false;
    this.closeListeners.forEach((listener) => listener(reason));
  }
}

function setup() {
  const sockets: FakeSocket[] = [];
  const client = new WsBusClient({
    url: 'ws://bus.test/bus',
    apiKey: 'test-secret',
    userId: 'user-1',
    socketFactory: (url, headers) => {
      const socket = new FakeSocket(url, headers);
      sockets.push(socket);
      return socket;
    },
    log: recordingLogger(),
  });
  const states: ConnectionStateName[] = [];
  client.onConnectionState((state) => states.push(state));
  return { client, sockets, states };
}

async function connected() {
  const ctx = setup();
  const opening = ctx.client.connect();
  ctx.sockets[0].emitOpen();
  await opening;
  return ctx;
}

describe('WsBusClient', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('connects with bearer and user headers and reports CONNECTED', async () => {
    const { client, sockets, states } = await connected();
    expect(sockets[0].headers).toEqual({ Authorization: 'Bearer test-secret', 'X-User-Id': 'user-1' });
    expect(client.connectionState()).toBe('CONNECTED');
    expect(states).toEqual(['CONNECTED']);
  });

  it('subscribes on ack and routes messages to the channel handler', async () => {
    const { client, sockets } = await connected();
    const handler = vi.fn();

    const subscribing = client.subscribe('kill_switch:state', handler);
    expect(sockets[0].sent).toEqual([{ op: 'subscribe', channel: 'kill_switch:state', requestId: '1' }]);
    sockets[0].emitFrame({ op: 'ack', requestId: '1', ok: true });
    await subscribing;

    sockets[0].emitFrame({ op: 'message', channel: 'kill_switch:state', data: { state: 'ACTIVE' } });
    sockets[0].emitFrame({ op: 'message', channel: 'circuit_breaker:state', data: { state: 'OPEN' } });
    sockets[0].emitFrame('not json');

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ state: 'ACTIVE' });
  });

  it('rejects a refused subscribe and drops its handler', async () => {
    const { client, sockets } = await connected();
    const handler = vi.fn();

    const subscribing = client.subscribe('positions:user-1', handler);
    sockets[0].emitFrame({ op: 'ack', requestId: '1', ok: false, error: 'forbidden' });

    await expect(subscribing).rejects.toMatchObject({
      code: 'bus_rejected',
      message: 'bus_subscribe_rejected:positions:user-1: forbidden',
    });
    sockets[0].emitFrame({ op: 'message', channel: 'positions:user-1', data: {} });
    expect(handler).not.toHaveBeenCalled();
  });

  it('times out an unanswered subscribe', async () => {
    vi.useFakeTimers();
    const { client } = await connected();

    const subscribing = client.subscribe('connection:state', vi.fn()).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(5_000);

    const error = await subscribing;
    expect(error).toBeInstanceOf(TransientIOError);
    expect(error).toMatchObject({ code: 'timeout', message: 'bus_subscribe_timeout:connection:state' });
  });

  it('refuses requests while disconnected', async () => {
    const { client } = setup();
    await expect(client.subscribe('connection:state', vi.fn())).rejects.toMatchObject({ code: 'bus_not_connected' });
    await expect(client.unsubscribe('connection:state')).resolves.toBeUndefined();
  });

  it('fails pending acks on a drop and reconnects with backoff', async () => {
    vi.useFakeTimers();
    const { client, sockets, states } = await connected();

    const subscribing = client.subscribe('price.updated.AAPL', vi.fn()).catch((error: unknown) => error);
    sockets[0].emitClose('1006');

    expect(await subscribing).toMatchObject({ code: 'bus_disconnected' });
    expect(client.connectionState()).toBe('DISCONNECTED');

    await vi.advanceTimersByTimeAsync(999);
    expect(sockets).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(sockets).toHaveLength(2);
    expect(client.connectionState()).toBe('RECONNECTING');

    sockets[1].emitOpen();
    expect(states).toEqual(['CONNECTED', 'DISCONNECTED', 'RECONNECTING', 'CONNECTED']);
  });

  it('rejects connect when the socket closes before opening', async () => {
    const { client, sockets } = setup();
    const opening = client.connect();
    sockets[0].emitClose('1006');
    await expect(opening).rejects.toMatchObject({ code: 'bus_connect_failed', message: 'bus_connect_failed: 1006' });
  });

  it('stops reconnecting after close', async () => {
    vi.useFakeTimers();
    const { client, sockets } = await connected();
    client.close();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(sockets).toHaveLength(1);
    expect(client.connectionState()).toBe('DISCONNECTED');
  });
});
