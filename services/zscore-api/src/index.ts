import { buildService } from './app';
import { loadConfig } from './config';
import { createLogger } from './logger';
import { createServer } from './server';

const config = loadConfig();
const log = createLogger(config.LOG_LEVEL);
const server = createServer({ service: buildService(config, log), logger: log });

server.listen(config.PORT, config.HOST, () => {
  log.info({ port: config.PORT, host: config.HOST }, 'zscore-api listening');
});

const shutdown = (signal: string) => {
  log.info({ signal }, 'shutting down');
  server.close((err) => {
    if (err) log.error({ err }, 'error while closing server');
    process.exit(err ? 1 : 0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
