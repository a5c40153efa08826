/**
 * Order-entry safety coordinator server.
 *
 * One coordinator per order-entry session: bus subscriptions, kill switch and
 * circuit breaker state, cached market data and the order pipeline. Display
 * clients talk to it over REST and stream its events from `/ws?session=ID`.
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import { loadConfig } from './config/config';
import { errorMessage } from './errors/OrderEntryError';
import { JsonFileIntentStore } from './orders/PendingIntentStore';
import { SessionService, restApiFactory, wsTransportFactory } from './session/SessionService';
import { logger } from './utils/logger';

const config = loadConfig(process.env);

const sessions = new SessionService({
  config,
  intentStore: new JsonFileIntentStore(config.intentStoreDir),
  transportFactory: wsTransportFactory(config, logger),
  apiFactory: restApiFactory(config, logger),
  log: logger,
});

const { server, shutdown } = createApp(config, sessions, logger);

server.listen(config.port, config.host, () => {
  logger.info('SERVER_UP', {
    port: config.port,
    host: config.host,
    busUrl: config.bus.url,
    tradingApi: config.tradingApi.baseUrl,
  });
});

let stopping = false;
function stop(signal: string): void {
  if (stopping) return;
  stopping = true;
  logger.info('SERVER_SHUTDOWN', { signal, sessions: sessions.size() });
  shutdown()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('SERVER_SHUTDOWN_FAILED', { error: errorMessage(error) });
      process.exit(1);
    });
}

process.on('SIGINT', () => stop('SIGINT'));
process.on('SIGTERM', () => stop('SIGTERM'));
