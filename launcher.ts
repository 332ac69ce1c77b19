import { fork, ForkOptions } from 'child_process';
import { AppConfig } from './config';
import { Logger } from './Helper/Logger';

export const WORKER_PORT_ENV = 'WORKER_PORT';

export interface WorkerProcess {
  readonly pid?: number;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type ForkWorker = (modulePath: string, args: readonly string[], options: ForkOptions) => WorkerProcess;

export interface LaunchOptions {
  modulePath: string;
  env?: NodeJS.ProcessEnv;
  forkWorker?: ForkWorker;
}

/**
 * Forks `config.workers` copies of `modulePath`, the i-th one told to serve on
 * `startPort + i`. Workers share nothing; one that dies stays dead.
 */
export const launchWorkers = (
  config: Pick<AppConfig, 'workers' | 'startPort'>,
  logger: Logger,
  { modulePath, env = process.env, forkWorker = fork }: LaunchOptions
): WorkerProcess[] => {
  const workers: WorkerProcess[] = [];

  for (let index = 0; index < config.workers; index++) {
    const port = config.startPort + index;
    const child = forkWorker(modulePath, [], {
      env: { ...env, [WORKER_PORT_ENV]: String(port) },
    });
    child.once('exit', (code, signal) => {
      logger.error(`Worker on port ${port} exited`, { pid: child.pid, code, signal });
    });
    logger.info(`Starting worker ${index + 1} on port ${port}`, { pid: child.pid });
    workers.push(child);
  }

  return workers;
};

export const parseWorkerPort = (raw: string): number => {
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`invalid ${WORKER_PORT_ENV}: ${raw}`);
  }
  const port = Number.parseInt(raw, 10);
  if (port > 65535) {
    throw new Error(`invalid ${WORKER_PORT_ENV}: ${raw}`);
  }
  return port;
};
