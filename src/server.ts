import express, { Request, Response, NextFunction } from 'express';
import http from 'http';
import cors from 'cors';
import helmet from 'helmet';
import { WebSocketServer, WebSocket } from 'ws';
import type { WatcherConfig } from './config';
import type { AlertWatcher } from './watcher';
import type { FileTailer } from './fileTailer';
import { RingBuffer } from './ringBuffer';
import { DispatchResult } from './types';

export type StatusServerConfig = Pick<WatcherConfig, 'statusToken' | 'recentLimit'>;

/** Read-only status surface: health, detector state, recent alert outcomes, and a live feed over /ws. */
export function createServer(watcher: AlertWatcher, tailer: FileTailer, config: StatusServerConfig) {
  const app = express();
  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors());

  function bearerToken(header: string | undefined): string {
    return header && header.startsWith('Bearer ') ? header.slice(7) : '';
  }

  function authMiddleware(req: Request, res: Response, next: NextFunction) {
    if (!config.statusToken) return next();
    const urlToken = typeof req.query.token === 'string' ? req.query.token : '';
    const bearer = bearerToken(req.headers['authorization']);
    if (bearer === config.statusToken || urlToken === config.statusToken) return next();
    return res.status(401).json({ error: 'unauthorized' });
  }

  const server = http.createServer(app);
  const wss = new WebSocketServer({ server, path: '/ws' });
  const recent = new RingBuffer<DispatchResult>(config.recentLimit);

  function broadcast(type: string, data: unknown) {
    const payload = JSON.stringify({ type, data });
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) client.send(payload);
    }
  }

  watcher.on('dispatch', (result: DispatchResult) => {
    recent.push(result);
    broadcast('dispatch', result);
  });
  tailer.on('notice', (msg: string) => broadcast('notice', { msg, ts: Date.now() }));

  app.get('/api/v1/health', (_req: Request, res: Response) => res.json({ ok: true }));

  app.get('/api/v1/state', authMiddleware, (_req: Request, res: Response) => {
    res.json({ ...watcher.snapshot(), tailer: tailer.status() });
  });

  app.get('/api/v1/alerts', authMiddleware, (req: Request, res: Response) => {
    const limit = Number(req.query.limit);
    let alerts = recent.toArray();
    if (Number.isInteger(limit) && limit > 0 && alerts.length > limit) {
      alerts = alerts.slice(alerts.length - limit);
    }
    res.json({ alerts });
  });

  wss.on('connection', (ws: WebSocket, req: http.IncomingMessage) => {
    if (config.statusToken) {
      const url = new URL(req.url || '', 'http://localhost');
      const tokenParam = url.searchParams.get('token') || '';
      const bearer = bearerToken(req.headers['authorization']);
      if (tokenParam !== config.statusToken && bearer !== config.statusToken) {
        ws.close(1008, 'unauthorized');
        return;
      }
    }
    ws.send(JSON.stringify({ type: 'hello', data: { version: 1, now: Date.now() } }));
  });

  // ws re-emits the http server's 'error' on wss, so startup failures surface there.
  function listen(port: number, host: string): Promise<void> {
    return new Promise((resolve, reject) => {
      wss.once('error', reject);
      server.listen(port, host, () => {
        wss.off('error', reject);
        resolve();
      });
    });
  }

  return { app, server, wss, listen };
}
