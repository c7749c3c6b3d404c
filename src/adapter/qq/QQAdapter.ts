import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { URL } from 'node:url';
import { describeError, type Logger } from '../../infra/logger/logger.js';
import type { MainRouter } from '../../core/router/MainRouter.js';
import { mapToChatEvent } from './qqEventMapper.js';
import { QQMessageSender } from './QQMessageSender.js';

function decode(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

/**
 * QQ/NapCat adapter - handles OneBot11 protocol.
 * Normalizes all events to ChatEvent and forwards to MainRouter.
 */
export class QQAdapter {
  private router: MainRouter;
  private logger: Logger;
  private wsPort: number;
  private wsPath: string;
  private token?: string;
  private wss: WebSocketServer | null = null;
  private connections: Set<WebSocket> = new Set();

  constructor(router: MainRouter, logger: Logger, wsPort: number = 6090, token?: string) {
    this.router = router;
    this.logger = logger;
    this.wsPort = wsPort;
    this.wsPath = '/';
    this.token = token;
  }

  /**
   * Start reverse WebSocket server to accept connections from NapCat.
   */
  public start(): void {
    this.wss = new WebSocketServer({
      port: this.wsPort,
      path: this.wsPath,
    });

    this.logger.info('qq-adapter', `Listening on ws://localhost:${this.wsPort}${this.wsPath}`);

    this.wss.on('connection', (ws: WebSocket, req) => {
      // Token validation
      if (this.token) {
        const providedToken = this.extractToken(req.headers['authorization'], req.url);
        if (providedToken !== this.token) {
          this.logger.warn('qq-adapter', 'Connection rejected: invalid token');
          ws.close(4401, 'Unauthorized');
          return;
        }
      } else {
        this.logger.warn('qq-adapter', 'Token not configured - accepting connection (dev mode)');
      }

      this.logger.info('qq-adapter', 'New connection established');
      this.connections.add(ws);

      // Replies go out through the most recent connection
      this.router.setSender(new QQMessageSender(ws, this.logger));

      ws.on('message', (data: RawData) => {
        this.handleData(data).catch((err: unknown) => {
          this.logger.error('qq-adapter', `Failed to handle payload: ${describeError(err)}`);
        });
      });

      ws.on('close', () => {
        this.logger.info('qq-adapter', 'Connection closed');
        this.connections.delete(ws);
      });

      ws.on('error', (err: Error) => {
        this.logger.error('qq-adapter', `WebSocket error: ${err.message}`);
        this.connections.delete(ws);
      });
    });

    this.wss.on('error', (err: Error) => {
      this.logger.error('qq-adapter', `Server error: ${err.message}`);
    });
  }

  private extractToken(
    authHeader: string | string[] | undefined,
    url?: string,
  ): string | undefined {
    // Try Authorization header (OneBot11 standard)
    if (typeof authHeader === 'string') {
      if (authHeader.startsWith('Bearer ')) {
        return authHeader.substring(7);
      }
      return authHeader;
    }
    const first = Array.isArray(authHeader) ? authHeader[0] : undefined;
    if (first !== undefined) {
      if (first.startsWith('Bearer ')) {
        return first.substring(7);
      }
      return first;
    }

    // Try query parameter ?access_token=<token>
    if (url) {
      try {
        const parsed = new URL(url, `http://localhost:${this.wsPort}`);
        const t = parsed.searchParams.get('access_token');
        if (t) return t;
      } catch {
        return undefined;
      }
    }
    return undefined;
  }

  /**
   * Handle incoming OneBot11 payload - normalize to ChatEvent and forward to router.
   */
  async handleData(data: RawData): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(decode(data));
    } catch (err) {
      this.logger.warn('qq-adapter', `Parse error: ${describeError(err)}`);
      return;
    }

    const chatEvent = mapToChatEvent(raw, this.logger);
    if (!chatEvent) {
      return; // Not a user message (meta event, API echo, self-message)
    }

    // Forward to main router
    await this.router.handleEvent(chatEvent);
  }

  /**
   * Stop the reverse WebSocket server.
   */
  public stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return Promise.resolve();
    this.wss = null;

    for (const ws of this.connections) {
      ws.close();
    }
    return new Promise((resolve) => {
      wss.close(() => {
        this.logger.info('qq-adapter', 'Server stopped');
        resolve();
      });
    });
  }
}
