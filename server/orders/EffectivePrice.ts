import Decimal from 'decimal.js';
import type { OrderDraft } from './types';

/**
 * Price used for notional and exposure checks.
 *
 * market: last price. limit / stop_limit: the limit price. stop: the worse of
 * stop and last for either side, i.e. `max(stop, last)`. Any missing input
 * gives null, which the limit checks treat as a block.
 */
export function effectivePrice(
  order: Pick<OrderDraft, 'orderType' | 'limitPrice' | 'stopPrice'>,
  lastPrice: Decimal | null
): Decimal | null {
  switch (order.orderType) {
    case 'market':
      return lastPrice;
    case 'limit':
    case 'stop_limit':
      return order.limitPrice;
    case 'stop':
      if (!order.stopPrice || !lastPrice) {
        return null;
      }
      return Decimal.max(order.stopPrice, lastPrice);
  }
}
