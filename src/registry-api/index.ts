import { createServer } from 'http';
import { createRegistry } from '@core/registry';
import { createApp } from './app';
import { config } from './config';

const registry = createRegistry();
const app = createApp(registry);
const server = createServer(app);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  server.close(() => process.exit(0));
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

server.listen(config.port, () => {
  console.warn(`[SERVER] Registry API on port ${config.port} (${config.nodeEnv})`);
  console.warn(`[SERVER] Health: http://localhost:${config.port}/health`);
});

export { app, server };
