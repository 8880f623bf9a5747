import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { env } from './env';
import type { SessionManager } from './calls/sessionManager';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createHealthRouter, type HealthDeps } from './routes/health';
import { createTwilioWebhookRouter, MEDIA_STREAM_PATH } from './routes/twilioWebhook';
import type { MediaSocket } from './transport/types';

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  req.id = requestId;
  next();
}

function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  log.error({ err, requestId: req.id }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

function rawDataToString(data: WebSocket.RawData): string {
  const buffer = Buffer.isBuffer(data) ? data : Array.isArray(data) ? Buffer.concat(data) : Buffer.from(data);
  return buffer.toString('utf8');
}

/** Adapts a ws connection to the session's outbound interface. */
export function wrapWebSocket(ws: WebSocket): MediaSocket {
  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (frame: string) => ws.send(frame),
    close: (code?: number, reason?: string) => ws.close(code, reason),
  };
}

function isAuthorizedMediaRequest(request: http.IncomingMessage, token: string): boolean {
  if (!request.url) {
    return false;
  }

  const host = request.headers.host ?? 'localhost';
  const url = new URL(request.url, `http://${host}`);
  if (url.pathname !== MEDIA_STREAM_PATH) {
    return false;
  }

  return url.searchParams.get('token') === token;
}

function attachMediaWebSocketServer(
  server: http.Server,
  sessionManager: SessionManager,
  token: string,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    if (!isAuthorizedMediaRequest(request, token)) {
      log.warn({ event: 'media_upgrade_rejected', url: request.url?.split('?')[0] }, 'media upgrade rejected');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
    });
  });

  wss.on('connection', (ws: WebSocket, request: http.IncomingMessage) => {
    const headerId = request.headers['x-request-id'];
    const session = sessionManager.open(wrapWebSocket(ws), {
      requestId: typeof headerId === 'string' ? headerId : undefined,
      remoteAddress: request.socket.remoteAddress,
    });
    const sessionId = session.sessionId;

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        log.debug({ event: 'media_binary_ignored', session_id: sessionId }, 'binary media frame ignored');
        return;
      }
      sessionManager.handleMessage(sessionId, rawDataToString(data));
    });

    ws.on('close', (code) => {
      void sessionManager.handleClose(sessionId, `ws_close_${code}`).catch((error: unknown) => {
        log.error({ err: error, session_id: sessionId }, 'session close failed');
      });
    });

    ws.on('error', (error) => {
      log.error({ err: error, session_id: sessionId }, 'media websocket error');
    });
  });

  return wss;
}

export interface ServerDeps {
  sessionManager: SessionManager;
  questions: HealthDeps['questions'];
  redis?: HealthDeps['redis'];
  publicBaseUrl?: string;
  mediaStreamToken?: string;
}

export function buildServer(deps: ServerDeps): {
  app: express.Express;
  server: http.Server;
  wss: WebSocketServer;
} {
  const app = express();
  const token = deps.mediaStreamToken ?? env.MEDIA_STREAM_TOKEN;

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(metricsMiddleware);

  app.use(
    '/health',
    createHealthRouter({
      sessions: deps.sessionManager,
      questions: deps.questions,
      redis: deps.redis ?? (() => null),
    }),
  );
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use(
    '/v1/twilio',
    createTwilioWebhookRouter({ publicBaseUrl: deps.publicBaseUrl, mediaStreamToken: token }),
  );

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachMediaWebSocketServer(server, deps.sessionManager, token);

  return { app, server, wss };
}
