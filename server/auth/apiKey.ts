import { timingSafeEqual } from 'crypto';
import { IncomingMessage } from 'http';
import { NextFunction, Request, RequestHandler, Response } from 'express';

function safeEquals(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}

function getApiKeyFromAuthorization(headers: IncomingMessage['headers']): string {
  const auth = String(headers.authorization || '');
  const [scheme, token] = auth.split(' ');
  if (scheme?.toLowerCase() === 'bearer' && token) {
    return token.trim();
  }
  return '';
}

function getApiKeyFromWebSocketProtocol(headers: IncomingMessage['headers']): string {
  const protocolHeader = String(headers['sec-websocket-protocol'] || '');
  if (!protocolHeader) {
    return '';
  }

  const protocols = protocolHeader.split(',').map((p) => p.trim()).filter(Boolean);
  const bearerProtocol = protocols.find((p) => p.startsWith('bearer.'));
  if (!bearerProtocol) {
    return '';
  }
  // Node's base64url decoder skips invalid characters instead of throwing.
  return Buffer.from(bearerProtocol.slice('bearer.'.length), 'base64url').toString('utf8').trim();
}

export function extractApiKey(req: IncomingMessage): string {
  return getApiKeyFromAuthorization(req.headers) || getApiKeyFromWebSocketProtocol(req.headers);
}

export function isApiKeyValid(apiKey: string, secret: string): boolean {
  if (!apiKey || !secret) {
    return false;
  }
  return safeEquals(apiKey, secret);
}

export function apiKeyMiddleware(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!isApiKeyValid(extractApiKey(req), secret)) {
      res.status(401).json({
        ok: false,
        error: 'unauthorized',
        message: 'Provide a valid bearer token in the Authorization header.',
      });
      return;
    }
    next();
  };
}

export function validateWebSocketApiKey(req: IncomingMessage, secret: string): { ok: boolean; reason?: string } {
  if (!isApiKeyValid(extractApiKey(req), secret)) {
    return { ok: false, reason: 'invalid_api_key' };
  }
  return { ok: true };
}
