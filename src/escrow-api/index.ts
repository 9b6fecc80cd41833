import { createServer } from 'http';
import { API_PREFIX } from '@shared/constants';
import { config } from './config';
import { createApp } from './app';
import { HttpTransferGateway, LoggingTransferGateway } from './payments';
import { createServices } from './services';
import { BroadcastAuditSink, initWebSocket } from './websocket';

const services = createServices({
  adminId: config.adminId,
  databaseUrl: config.database.url,
  transfers: config.transfer.url
    ? new HttpTransferGateway(config.transfer.url, config.transfer.timeoutMs)
    : new LoggingTransferGateway(),
  sinks: [new BroadcastAuditSink()],
});

const app = createApp(services, { corsOrigin: config.corsOrigin });
const server = createServer(app);
const wss = initWebSocket(server);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  wss.close();
  server.close(() => {
    services.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[SERVER] Failed to close database:', err);
        process.exit(1);
      },
    );
  });
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

server.listen(config.port, () => {
  console.warn(`[SERVER] Escrow ledger API on port ${config.port}`);
  console.warn(`[SERVER] Storage: ${config.database.url ? 'postgres' : 'in-memory'}`);
  console.warn(`[SERVER] Administrator: ${config.adminId}`);
  console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
});

export { app, server };
