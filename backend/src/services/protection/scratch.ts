import { mkdir, mkdtemp, rm } from 'fs/promises';
import path from 'path';
import { createServiceLogger } from '../logger';

const log = createServiceLogger('scratch');

/**
 * Temp paths owned by one job. `release()` deletes all of them and is safe
 * to call more than once: only the first call touches the filesystem.
 */
export class JobScratch {
  private readonly paths = new Set<string>();
  private released: Promise<void> | null = null;

  constructor(private readonly traceId?: string) {}

  /** Register a path (file or directory) for deletion on release */
  track(target: string): string {
    this.paths.add(target);
    return target;
  }

  /**
   * Create `<scratchDir>/apk_protect_<random>/output` and own the whole tree.
   */
  async createWorkspace(scratchDir: string): Promise<{ workDir: string; outputDir: string }> {
    const workDir = this.track(await mkdtemp(path.join(scratchDir, 'apk_protect_')));
    const outputDir = path.join(workDir, 'output');
    await mkdir(outputDir, { recursive: true });
    return { workDir, outputDir };
  }

  release(): Promise<void> {
    if (!this.released) {
      this.released = this.removeAll();
    }
    return this.released;
  }

  private async removeAll(): Promise<void> {
    const results = await Promise.allSettled(
      [...this.paths].map(target => rm(target, { recursive: true, force: true }))
    );

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const reason = result.reason instanceof Error ? result.reason : new Error(String(result.reason));
        log.error('cleanup_failed', 'Could not remove temp path', reason, this.traceId, {
          path: [...this.paths][index]
        });
      }
    });
  }
}
