import http from 'node:http';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { TokenError, toUserSummary, type TokenManager } from '@parley/domain';
import { createLogger, errorMessage, type SnowflakeGenerator } from '@parley/shared';
import { Connection, type ConnectionDeps, type Socket } from './connection';
import { type SessionUser } from './session';

const logger = createLogger({ name: 'gateway' });

export interface GatewayOptions {
  port: number;
  host: string;
  maxPayloadBytes: number;
  idGen: SnowflakeGenerator;
  tokens: Pick<TokenManager, 'verify'>;
  connectionDeps: ConnectionDeps;
}

export type UpgradeResult = { ok: true; user: SessionUser } | { ok: false; status: 401 | 500 };

/** Resolves the `?token=` of an upgrade request to the connecting user. */
export async function authenticateUpgrade(
  url: string | undefined,
  tokens: Pick<TokenManager, 'verify'>,
): Promise<UpgradeResult> {
  const token = new URL(url ?? '/', 'http://localhost').searchParams.get('token');
  if (!token) return { ok: false, status: 401 };

  try {
    const { user } = await tokens.verify(token, 'access');
    return { ok: true, user: { summary: toUserSummary(user), status: user.status } };
  } catch (err) {
    if (err instanceof TokenError) return { ok: false, status: 401 };
    logger.error({ err: errorMessage(err) }, 'Upgrade authentication failed');
    return { ok: false, status: 500 };
  }
}

function wsSocket(ws: WebSocket): Socket {
  return {
    send(data) {
      if (ws.readyState === WebSocket.OPEN) ws.send(data);
    },
    close(code, reason) {
      ws.close(code, reason);
    },
  };
}

function rawText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

export function createGateway(options: GatewayOptions): {
  server: http.Server;
  start: () => void;
  stop: () => Promise<void>;
} {
  const { port, host, maxPayloadBytes, idGen, tokens, connectionDeps } = options;

  const server = http.createServer((req, res) => {
    if (req.method === 'GET' && req.url === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok', timestamp: new Date().toISOString() }));
      return;
    }
    res.writeHead(404).end();
  });

  const wss = new WebSocketServer({ noServer: true, maxPayload: maxPayloadBytes });

  server.on('upgrade', (req, socket, head) => {
    authenticateUpgrade(req.url, tokens)
      .then((result) => {
        if (!result.ok) {
          const text = result.status === 401 ? 'Unauthorized' : 'Internal Server Error';
          socket.end(`HTTP/1.1 ${result.status} ${text}\r\nConnection: close\r\n\r\n`);
          return;
        }

        wss.handleUpgrade(req, socket, head, (ws) => {
          const connection = new Connection(idGen.generate(), result.user, wsSocket(ws), connectionDeps);
          logger.info({ connectionId: connection.id, userId: result.user.summary.id }, 'WebSocket connection opened');

          ws.on('message', (data) => connection.receive(rawText(data)));
          ws.on('close', (code) => {
            logger.debug({ connectionId: connection.id, code }, 'WebSocket closed');
            connection.close();
          });
          ws.on('error', (err) => {
            logger.warn({ connectionId: connection.id, err: err.message }, 'WebSocket error');
          });
        });
      })
      .catch((err: unknown) => {
        logger.error({ err: errorMessage(err) }, 'Upgrade failed');
        socket.destroy();
      });
  });

  return {
    server,
    start: () => {
      server.listen(port, host, () => {
        logger.info({ host, port }, 'Gateway listening');
      });
      server.on('error', (err) => {
        logger.fatal({ host, port, err: err.message }, 'Failed to listen');
        process.exit(1);
      });
    },
    stop: async () => {
      for (const client of wss.clients) {
        client.close(1001, 'Server shutting down');
      }
      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
