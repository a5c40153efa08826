export type BusMessageHandler = (payload: unknown) => void | Promise<void>;

/** Publish-subscribe transport. One handler per channel; subscribing again replaces it. */
export interface BusClient {
  subscribe(channel: string, handler: BusMessageHandler): Promise<void>;
  unsubscribe(channel: string): Promise<void>;
}

export type ConnectionStateName = 'CONNECTED' | 'DEGRADED' | 'DISCONNECTED' | 'RECONNECTING' | 'UNKNOWN';

export const CONNECTION_CHANNEL = 'connection:state';

export function priceChannel(symbol: string): string {
  return `price.updated.${symbol}`;
}

export function positionsChannel(userId: string): string {
  return `positions:${userId}`;
}
