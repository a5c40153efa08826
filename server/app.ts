import express, { Express } from 'express';
import cors from 'cors';
import { createServer, IncomingMessage, Server } from 'http';
import { Duplex } from 'stream';
import { WebSocketServer } from 'ws';
import { apiKeyMiddleware, validateWebSocketApiKey } from './auth/apiKey';
import type { AppConfig } from './config/config';
import { createSessionRouter, errorHandler } from './routes/sessions';
import { SessionService } from './session/SessionService';
import { Logger, logger as defaultLogger, requestLogger } from './utils/logger';
import { SessionStreamManager } from './ws/SessionStreamManager';

export interface AppContext {
  app: Express;
  server: Server;
  streams: SessionStreamManager;
  shutdown(): Promise<void>;
}

type AppOptions = Pick<AppConfig, 'allowedOrigins' | 'production' | 'apiKeySecret' | 'ws'>;

export function createApp(config: AppOptions, sessions: SessionService, log: Logger = defaultLogger): AppContext {
  const startedAt = Date.now();
  const streams = new SessionStreamManager({
    log,
    heartbeatIntervalMs: config.ws.heartbeatIntervalMs,
    staleConnectionMs: config.ws.staleConnectionMs,
  });

  const app = express();
  app.use(express.json());
  app.use(requestLogger);

  app.use(
    cors({
      origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
        // Requests without an origin (curl, server-to-server) carry the API key instead.
        if (!origin || config.allowedOrigins.includes(origin) || !config.production) {
          callback(null, true);
          return;
        }
        callback(new Error('Not allowed by CORS'));
      },
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.get('/api/health', (_req, res) => {
    res.json({
      ok: true,
      uptime: Math.floor((Date.now() - startedAt) / 1000),
      sessions: sessions.size(),
      streamClients: streams.getClientCount(),
    });
  });

  app.use('/api/sessions', apiKeyMiddleware(config.apiKeySecret), createSessionRouter(sessions, streams));
  app.use(errorHandler(log));

  const server = createServer(app);
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = new URL(req.url || '', 'http://localhost');
    if (url.pathname !== '/ws') {
      socket.destroy();
      return;
    }
    const auth = validateWebSocketApiKey(req, config.apiKeySecret);
    const sessionId = url.searchParams.get('session') || '';
    if (!auth.ok || !sessions.has(sessionId)) {
      log.warn('WS_UPGRADE_REJECTED', { reason: auth.reason || 'unknown_session', sessionId });
      socket.write(auth.ok ? 'HTTP/1.1 404 Not Found\r\n\r\n' : 'HTTP/1.1 401 Unauthorized\r\n\r\n');
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (client) => {
      if (!sessions.has(sessionId)) {
        client.terminate();
        return;
      }
      streams.registerClient(client, sessionId, sessions.get(sessionId), {
        remoteAddress: req.socket.remoteAddress || null,
      });
    });
  });

  const shutdown = async (): Promise<void> => {
    streams.shutdown();
    wss.close();
    await sessions.closeAll();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  return { app, server, streams, shutdown };
}
