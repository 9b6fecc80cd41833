import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { WS_EVENTS } from '@shared/constants';
import type { LedgerEvent, WsMessage } from '@shared/types';
import type { AuditSink } from '@core/audit-log';

const HEARTBEAT_MS = 30_000;

let wss: WebSocketServer | null = null;

function send(socket: WebSocket, event: WsMessage['event'], data: unknown): void {
  const message: WsMessage = { event, data, timestamp: new Date().toISOString() };
  socket.send(JSON.stringify(message));
}

export function initWebSocket(server: Server): WebSocketServer {
  const instance = new WebSocketServer({ server, path: '/ws' });

  instance.on('connection', (socket) => {
    send(socket, WS_EVENTS.CONNECTION_ESTABLISHED, { clients: instance.clients.size });
  });

  const heartbeat = setInterval(() => broadcast(WS_EVENTS.HEARTBEAT, null), HEARTBEAT_MS);
  heartbeat.unref();
  instance.on('close', () => clearInterval(heartbeat));

  wss = instance;
  return instance;
}

export function broadcast(event: WsMessage['event'], data: unknown): void {
  if (!wss) return;
  for (const client of wss.clients) {
    if (client.readyState === WebSocket.OPEN) {
      send(client, event, data);
    }
  }
}

/** Pushes each committed ledger event to connected WebSocket clients. */
export class BroadcastAuditSink implements AuditSink {
  async append(events: readonly LedgerEvent[]): Promise<void> {
    for (const event of events) {
      broadcast(WS_EVENTS.LEDGER_EVENT, event);
    }
  }
}
