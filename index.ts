import http from 'http';
import { Config } from './config';
import { createLogger } from './Helper/Logger';
import { ForkWorker, launchWorkers, parseWorkerPort, WorkerProcess, WORKER_PORT_ENV } from './launcher';
import { startServer } from './server';

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  modulePath?: string;
  forkWorker?: ForkWorker;
}

export type Started =
  | { kind: 'worker'; server: http.Server }
  | { kind: 'launcher'; workers: WorkerProcess[] };

/**
 * A process started with `WORKER_PORT` serves on that port; any other start
 * is the launcher, which forks `modulePath` once per configured worker.
 */
const main = async ({
  env = process.env,
  modulePath = __filename,
  forkWorker,
}: MainOptions = {}): Promise<Started> => {
  const config = Config.loadConfig(env);

  const workerPort = env[WORKER_PORT_ENV];
  if (workerPort) {
    const server = await startServer(config, parseWorkerPort(workerPort));
    return { kind: 'worker', server };
  }

  const logger = createLogger(config, 'launcher');
  const workers = launchWorkers(config, logger, { modulePath, env, forkWorker });
  return { kind: 'launcher', workers };
};

// Start the server if this file is run directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}

export { main };
