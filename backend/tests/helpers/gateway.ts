import { existsSync, mkdtempSync, readdirSync, rmSync } from 'fs';
import type { Server } from 'http';
import { tmpdir } from 'os';
import path from 'path';
import { createServer } from '../../src/api/server';
import { loadEnvironmentConfig, type EnvironmentConfig } from '../../src/config';
import { buildAppContext } from '../../src/index';

export const FAKE_TOOL = path.resolve(__dirname, '..', 'fixtures', 'fake-dpt.js');

export interface TestGateway {
  baseUrl: string;
  scratchDir: string;
  config: EnvironmentConfig;
  close(): Promise<void>;
}

/**
 * Boots the gateway on an ephemeral port with the fake tool run by the
 * current Node.js binary in place of java + dpt.jar.
 */
export async function startGateway(
  env: NodeJS.ProcessEnv = {},
  adjust?: (config: EnvironmentConfig) => void
): Promise<TestGateway> {
  const scratchDir = mkdtempSync(path.join(tmpdir(), 'gateway-it-'));

  const config = loadEnvironmentConfig({
    NODE_ENV: 'test',
    PORT: '0',
    HOST: '127.0.0.1',
    SCRATCH_DIR: scratchDir,
    DPT_JAR_PATH: FAKE_TOOL,
    JAVA_CMD: process.execPath,
    TOOL_LAUNCHER_ARGS: '',
    JAVA_VERSION_ARGS: '--version',
    VERIFY_SIGNATURE: 'false',
    MAX_UPLOAD_BYTES: '262144',
    ...env
  });
  adjust?.(config);

  const app = createServer(buildAppContext(config));
  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Gateway did not bind a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    scratchDir,
    config,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(error => {
          rmSync(scratchDir, { recursive: true, force: true });
          if (error) reject(error);
          else resolve();
        });
      })
  };
}

/**
 * Cleanup of a delivered job runs after the last byte is written, so it may
 * finish just after the client has the response.
 */
export async function waitForEmptyDir(dir: string, timeoutMs = 3000): Promise<string[]> {
  const deadline = Date.now() + timeoutMs;
  let entries = existsSync(dir) ? readdirSync(dir) : [];

  while (entries.length > 0 && Date.now() < deadline) {
    await new Promise(resolve => setTimeout(resolve, 25));
    entries = readdirSync(dir);
  }

  return entries;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
