import { stat } from 'fs/promises';
import type { ToolConfig } from '../../config';
import type { HealthReport } from '../../types/protection';
import { createServiceLogger } from '../logger';
import { runTool, type ToolRunner } from './toolRunner';

const log = createServiceLogger('health-reporter');

export type HealthProbeConfig = Pick<ToolConfig, 'toolPath' | 'runtimePath' | 'versionArgs' | 'probeTimeoutMs'>;

interface RuntimeProbe {
  available: boolean;
  version: string;
}

const NOT_FOUND: RuntimeProbe = { available: false, version: 'Not found' };

/**
 * Read-only probe of the tool artifact and the runtime that launches it.
 * Each field falls back to its negative value on its own; `probe()` never
 * rejects and caches nothing.
 */
export class HealthReporter {
  constructor(
    private readonly config: HealthProbeConfig,
    private readonly run: ToolRunner = runTool
  ) {}

  async probe(): Promise<HealthReport> {
    const [toolExists, runtime] = await Promise.all([this.toolExists(), this.probeRuntime()]);

    return {
      status: 'ok',
      dpt_jar_exists: toolExists,
      java_available: runtime.available,
      java_version: runtime.version
    };
  }

  private async toolExists(): Promise<boolean> {
    try {
      return (await stat(this.config.toolPath)).isFile();
    } catch {
      return false;
    }
  }

  /**
   * Java prints its version banner on stderr; other launchers use stdout.
   */
  private async probeRuntime(): Promise<RuntimeProbe> {
    try {
      const result = await this.run(
        { executable: this.config.runtimePath, args: this.config.versionArgs },
        { timeoutMs: this.config.probeTimeoutMs }
      );

      if (result.timedOut) {
        return NOT_FOUND;
      }

      const banner = result.stderr.trim() || result.stdout.trim();
      return {
        available: true,
        version: banner ? banner.split(/\r?\n/)[0].trim() : 'Unknown'
      };
    } catch (error) {
      log.debug('runtime_probe_failed', 'Runtime did not start', undefined, {
        runtimePath: this.config.runtimePath,
        reason: error instanceof Error ? error.message : String(error)
      });
      return NOT_FOUND;
    }
  }
}
