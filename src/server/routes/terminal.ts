/**
 * WebSocket terminals into pods and nodes
 *
 * Query parameters are checked before the upgrade so that a bad request
 * gets an envelope instead of a socket. Shells on the management cluster
 * are for administrators only.
 */

import type { Context, Next } from 'hono';
import { Hono } from 'hono';
import type { UpgradeWebSocket, WSContext, WSEvents, WSMessageReceive } from 'hono/ws';
import { failure } from '../../lib/api/response.js';
import { TerminalErrors } from '../../lib/errors/terminal-errors.js';
import { MGMT_CLUSTER_NAME } from '../../lib/k8s/types.js';
import { createLogger } from '../../lib/logging/logger.js';
import type { TerminalService, TerminalSession, TerminalSocket } from '../../services/terminal.service.js';

const log = createLogger('TerminalRoutes');

interface TerminalDeps {
  terminalService: TerminalService;
  upgradeWebSocket: UpgradeWebSocket;
  requireAdmin: (c: Context, next: Next) => Promise<Response | void>;
}

function messageText(data: WSMessageReceive): string | undefined {
  if (typeof data === 'string') return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return undefined;
}

function socketFor(ws: WSContext): TerminalSocket {
  return {
    send: (data) => ws.send(data),
    close: () => ws.close(),
  };
}

/**
 * Socket events for one terminal. Messages that arrive while the session
 * is starting are replayed once it is up.
 */
function terminalEvents(open: (socket: TerminalSocket) => Promise<TerminalSession | null>): WSEvents {
  let session: TerminalSession | null = null;
  let closed = false;
  const pending: string[] = [];

  const closeSession = (target: TerminalSession) => {
    void target.close().catch((error: unknown) => log.error('Failed to close terminal session', { error }));
  };

  return {
    onOpen(_event, ws) {
      void open(socketFor(ws))
        .then((started) => {
          if (!started) return;
          if (closed) {
            closeSession(started);
            return;
          }
          session = started;
          for (const message of pending.splice(0)) started.handle(message);
        })
        .catch((error: unknown) => {
          log.error('Terminal session failed to start', { error });
          ws.close();
        });
    },
    onMessage(event) {
      const text = messageText(event.data);
      if (text === undefined) return;
      if (session) session.handle(text);
      else pending.push(text);
    },
    onClose() {
      closed = true;
      if (session) closeSession(session);
    },
  };
}

export function createTerminalRoutes({ terminalService, upgradeWebSocket, requireAdmin }: TerminalDeps) {
  const app = new Hono();

  const guardCluster = (c: Context, next: Next) =>
    c.req.query('cluster') === MGMT_CLUSTER_NAME ? requireAdmin(c, next) : next();

  // GET /api/v1/terminal?namespace=&pod=&container=&cluster=&shell=
  app.get(
    '/terminal',
    async (c, next) => {
      const { namespace, pod, cluster } = c.req.query();
      if (!namespace || !pod) return c.json(failure(TerminalErrors.MISSING_PARAMS));
      if (!cluster) return c.json(failure(TerminalErrors.INVALID_CLUSTER));
      return guardCluster(c, next);
    },
    upgradeWebSocket((c) => {
      const query = c.req.query();
      return terminalEvents((socket) =>
        terminalService.openPod(socket, {
          cluster: query.cluster ?? '',
          namespace: query.namespace ?? '',
          pod: query.pod ?? '',
          container: query.container || undefined,
          shell: query.shell || undefined,
        })
      );
    })
  );

  // GET /api/v1/node-terminal?node=&cluster=&shell=
  app.get(
    '/node-terminal',
    async (c, next) => {
      const { node, cluster } = c.req.query();
      if (!node) return c.json(failure(TerminalErrors.MISSING_NODE));
      if (!cluster) return c.json(failure(TerminalErrors.INVALID_CLUSTER));
      return guardCluster(c, next);
    },
    upgradeWebSocket((c) => {
      const query = c.req.query();
      return terminalEvents((socket) =>
        terminalService.openNode(socket, {
          cluster: query.cluster ?? '',
          node: query.node ?? '',
          shell: query.shell || undefined,
        })
      );
    })
  );

  return app;
}
