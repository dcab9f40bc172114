import { spawn, type ChildProcess } from 'child_process';
import type { ToolCommand, ToolRunResult } from '../../types/protection';
import { createServiceLogger } from '../logger';

const log = createServiceLogger('tool-runner');

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Kill the process with SIGKILL after this many ms */
  timeoutMs?: number;
  traceId?: string;
}

/**
 * Runs a command to completion. Resolves for any exit, including a kill on
 * timeout; rejects only when the process cannot be spawned (ENOENT, EACCES).
 *
 * The command runs in its own process group so a timeout kills helpers it
 * forked as well. Once the timeout has fired the promise settles on the
 * leader's exit, even if something still holds the output pipes.
 */
export type ToolRunner = (command: ToolCommand, options?: RunOptions) => Promise<ToolRunResult>;

const usesProcessGroups = process.platform !== 'win32';

function killProcessTree(child: ChildProcess): void {
  if (usesProcessGroups && child.pid !== undefined) {
    try {
      process.kill(-child.pid, 'SIGKILL');
      return;
    } catch (error) {
      log.debug('group_kill_failed', 'Falling back to killing the leader only', undefined, {
        pid: child.pid,
        reason: error instanceof Error ? error.message : String(error)
      });
    }
  }
  child.kill('SIGKILL');
}

export const runTool: ToolRunner = (command, { cwd, env, timeoutMs, traceId } = {}) => {
  return new Promise((resolve, reject) => {
    const startedAt = Date.now();
    const child = spawn(command.executable, command.args, {
      cwd,
      env: { ...process.env, ...env },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: usesProcessGroups
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;
    let exit: { code: number | null; signal: NodeJS.Signals | null } | undefined;
    let timer: NodeJS.Timeout | undefined;

    const settle = (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({
        code,
        signal,
        stdout,
        stderr,
        timedOut,
        durationMs: Date.now() - startedAt
      });
    };

    // Stop waiting for pipe holders that outlived the leader
    const abandonPipes = () => {
      child.stdout?.destroy();
      child.stderr?.destroy();
    };

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error) => {
      if (timer) clearTimeout(timer);
      settled = true;
      reject(error);
    });

    child.on('exit', (code, signal) => {
      exit = { code, signal };
      if (timedOut) {
        abandonPipes();
        settle(code, signal);
      }
    });

    child.on('close', (code, signal) => {
      settle(code, signal);
    });

    if (timeoutMs) {
      timer = setTimeout(() => {
        timedOut = true;
        log.warn('command_timeout', 'Command timeout — terminating', traceId, {
          executable: command.executable,
          timeoutMs,
          pid: child.pid
        });
        killProcessTree(child);
        if (exit) {
          abandonPipes();
          settle(exit.code, exit.signal);
        }
      }, timeoutMs);
    }
  });
};

/**
 * True when spawn failed because the executable is missing or not runnable.
 */
export function isSpawnFailure(error: unknown): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'EACCES' || error.code === 'ENOTDIR';
}
