import fs from 'fs';
import net from 'net';
import os from 'os';
import path from 'path';
import http from 'http';
import { ChildProcess, fork } from 'child_process';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { main } from './index';
import { ForkWorker, WORKER_PORT_ENV } from './launcher';

const children: ChildProcess[] = [];
const servers: http.Server[] = [];
let workDir: string;

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'image-main-'));
  fs.mkdirSync(path.join(workDir, 'images'));
});

afterEach(async () => {
  await Promise.all(children.splice(0).map(stopChild));
  await Promise.all(
    servers.splice(0).map(
      (server) => new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      })
    )
  );
  fs.rmSync(workDir, { recursive: true, force: true });
});

function stopChild(child: ChildProcess): Promise<void> {
  return new Promise((resolve) => {
    if (child.exitCode !== null || child.signalCode !== null) {
      resolve();
      return;
    }
    child.once('exit', () => resolve());
    child.kill('SIGTERM');
  });
}

function isPortFree(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const candidate = net.createServer();
    candidate.once('error', () => resolve(false));
    candidate.listen(port, '127.0.0.1', () => candidate.close(() => resolve(true)));
  });
}

async function freePortRange(count: number): Promise<number> {
  for (let attempt = 0; attempt < 20; attempt++) {
    const start = 20000 + Math.floor(Math.random() * 40000);
    const free = await Promise.all(Array.from({ length: count }, (_, index) => isPortFree(start + index)));
    if (free.every(Boolean)) {
      return start;
    }
  }
  throw new Error(`no ${count} consecutive free ports on 127.0.0.1`);
}

function baseEnv(startPort: number, workers: number): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {
    ...process.env,
    IMAGES_DIR: path.join(workDir, 'images'),
    LOG_DIR: path.join(workDir, 'logs'),
    LOG_LEVEL: 'error',
    WEB_SERVER_HOST: '127.0.0.1',
    WEB_SERVER_WORKERS: String(workers),
    WEB_SERVER_START_PORT: String(startPort),
  };
  delete env[WORKER_PORT_ENV];
  return env;
}

// Children load the TypeScript entry directly.
const forkWithTsx: ForkWorker = (modulePath, args, options) => {
  const child = fork(modulePath, [...args], {
    ...options,
    execArgv: ['--import', 'tsx'],
    stdio: ['ignore', 'ignore', 'inherit', 'ipc'],
  });
  children.push(child);
  return child;
};

async function waitForWelcome(port: number): Promise<unknown> {
  return vi.waitFor(
    async () => {
      const res = await fetch(`http://127.0.0.1:${port}/`);
      expect(res.status).toBe(200);
      return res.json();
    },
    { timeout: 30_000, interval: 250 }
  );
}

describe('main as launcher', () => {
  it('forks one worker per port and each one answers the health check', async () => {
    const startPort = await freePortRange(3);

    const started = await main({
      env: baseEnv(startPort, 3),
      modulePath: path.join(__dirname, 'index.ts'),
      forkWorker: forkWithTsx,
    });

    expect(started.kind).toBe('launcher');
    expect(children).toHaveLength(3);
    expect(new Set(children.map((child) => child.pid)).size).toBe(3);
    for (const port of [startPort, startPort + 1, startPort + 2]) {
      await expect(waitForWelcome(port)).resolves.toEqual({ message: 'Welcome to the Image Hosting Server' });
    }
  }, 60_000);

  it('leaves the other workers serving when one exits', async () => {
    const startPort = await freePortRange(2);

    await main({
      env: baseEnv(startPort, 2),
      modulePath: path.join(__dirname, 'index.ts'),
      forkWorker: forkWithTsx,
    });
    await waitForWelcome(startPort);
    await waitForWelcome(startPort + 1);

    const [first] = children;
    await stopChild(first);

    expect(children).toHaveLength(2);
    await expect(waitForWelcome(startPort + 1)).resolves.toEqual({ message: 'Welcome to the Image Hosting Server' });
  }, 60_000);
});

describe('main as worker', () => {
  it('serves on the port named by WORKER_PORT', async () => {
    const port = await freePortRange(1);

    const started = await main({ env: { ...baseEnv(port, 1), [WORKER_PORT_ENV]: String(port) } });
    if (started.kind !== 'worker') {
      throw new Error(`expected a worker, got ${started.kind}`);
    }
    servers.push(started.server);

    const res = await fetch(`http://127.0.0.1:${port}/`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ message: 'Welcome to the Image Hosting Server' });
    expect(children).toEqual([]);
  });

  it('refuses a WORKER_PORT that is not a port number', async () => {
    await expect(main({ env: { ...baseEnv(8000, 1), [WORKER_PORT_ENV]: 'abc' } })).rejects.toThrow(
      `invalid ${WORKER_PORT_ENV}: abc`
    );
  });
});
