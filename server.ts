import http from 'http';
import { AppConfig } from './config';
import { createApp } from './app';
import { createLogger } from './Helper/Logger';

export const workerName = (port: number): string => `worker-${port}`;

/**
 * Binds one listener on `config.host:port` and serves until the process is
 * terminated. The logger is closed together with the server.
 */
export const startServer = async (config: AppConfig, port: number): Promise<http.Server> => {
  const logger = createLogger(config, workerName(port));
  const app = createApp({ config, logger });
  const httpServer = http.createServer(app);

  try {
    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(port, config.host, () => {
        httpServer.off('error', reject);
        resolve();
      });
    });
  } catch (error) {
    logger.error(`Failed to bind http://${config.host}:${port}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    logger.close();
    throw error;
  }
  httpServer.on('close', () => logger.close());

  logger.info(`Starting HTTP server on http://${config.host}:${port}`);
  return httpServer;
};
