import type http from 'node:http';
import { config } from './config.js';
import { createLogger } from './utils/logger.js';
import { createHttpServer } from './runtime/http.js';
import { attachTaskWebSockets } from './runtime/websocket.js';
import { TrialSupervisor } from './orchestration/trial-supervisor.js';

const logger = createLogger('trial-orchestrator', config.LOG_LEVEL);

const closeServer = (server: http.Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });

const run = async () => {
  const supervisor = new TrialSupervisor(config, {
    logger: createLogger('orchestration.supervisor', config.LOG_LEVEL),
  });

  const httpServer = await createHttpServer(supervisor, {
    host: config.HTTP_HOST,
    port: config.HTTP_PORT,
    logger: createLogger('runtime.http', config.LOG_LEVEL),
  });
  const sockets = attachTaskWebSockets(httpServer, supervisor, {
    logger: createLogger('runtime.websocket', config.LOG_LEVEL),
  });

  logger.info(`trial orchestrator started, project root=${config.PROJECT_ROOT}`);

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('shutdown signal received');
    await supervisor.stop();
    await sockets.close();
    await closeServer(httpServer);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error('shutdown failed', error);
      process.exit(1);
    });
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
};

run().catch((error: unknown) => {
  logger.error('fatal', error);
  process.exit(1);
});
