import { existsSync, mkdtempSync, readdirSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { JobScratch } from '../protection/scratch';

describe('JobScratch', () => {
  let scratchDir: string;

  beforeEach(() => {
    scratchDir = mkdtempSync(path.join(tmpdir(), 'scratch-test-'));
  });

  afterEach(() => {
    rmSync(scratchDir, { recursive: true, force: true });
  });

  test('creates a workspace with an output directory inside the scratch dir', async () => {
    const scratch = new JobScratch('trace');
    const { workDir, outputDir } = await scratch.createWorkspace(scratchDir);

    expect(path.dirname(workDir)).toBe(scratchDir);
    expect(path.basename(workDir)).toMatch(/^apk_protect_/);
    expect(outputDir).toBe(path.join(workDir, 'output'));
    expect(statSync(outputDir).isDirectory()).toBe(true);

    await scratch.release();
    expect(existsSync(workDir)).toBe(false);
  });

  test('release removes tracked files and workspaces', async () => {
    const scratch = new JobScratch();
    const upload = scratch.track(path.join(scratchDir, 'upload_1.apk'));
    writeFileSync(upload, 'bytes');
    const { outputDir } = await scratch.createWorkspace(scratchDir);
    writeFileSync(path.join(outputDir, 'out.apk'), 'bytes');

    await scratch.release();

    expect(readdirSync(scratchDir)).toEqual([]);
  });

  test('release is idempotent and tolerates paths that never existed', async () => {
    const scratch = new JobScratch();
    scratch.track(path.join(scratchDir, 'missing.apk'));

    const first = scratch.release();
    const second = scratch.release();

    expect(second).toBe(first);
    await expect(first).resolves.toBeUndefined();
    expect(existsSync(path.join(scratchDir, 'missing.apk'))).toBe(false);
  });
});
