import { existsSync } from 'fs';
import { readdir, stat } from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { EnvironmentConfig } from '../../config';
import type {
  Artifact,
  JobOutcome,
  JobState,
  ToolCommand,
  ToolRunResult,
  Upload
} from '../../types/protection';
import { hashFile } from '../../utils/hash';
import { safeFileName } from '../../utils/filename';
import { createServiceLogger } from '../logger';
import {
  EnvironmentError,
  ProtectionError,
  ToolExecutionError,
  ToolTimeoutError,
  UploadValidationError
} from './errors';
import { buildToolCommand, buildToolFlags, describeOptions, parseProtectionOptions } from './optionMapper';
import { JobScratch } from './scratch';
import type { SignatureVerifier } from './signatureVerifier';
import { isSpawnFailure, runTool, type ToolRunner } from './toolRunner';
import { validateUpload } from './uploadValidator';

/**
 * Protection Job Runner
 *
 * One upload, one tool run. States:
 *
 *   received → rejected
 *   received → validated → invoking → completed | failed | timed_out
 *
 * Every temp path the job creates (the stored upload and the workspace that
 * holds the tool's output) is released by a single cleanup in `finally`,
 * after the artifact has been delivered or the job has failed.
 */

const log = createServiceLogger('job-runner');

const ARTIFACT_EXTENSIONS = ['.apk', '.aab'];

const CONTENT_TYPES: Record<string, string> = {
  '.apk': 'application/vnd.android.package-archive',
  '.aab': 'application/octet-stream'
};

export type JobRunnerConfig = Pick<EnvironmentConfig, 'upload' | 'tool' | 'storage'>;

export interface JobRunnerDeps {
  config: JobRunnerConfig;
  run?: ToolRunner;
  /** Omit to skip the post-run signature check */
  verifier?: Pick<SignatureVerifier, 'verify'>;
}

export interface JobRequest {
  upload: Upload;
  /** Raw multipart text fields */
  fields: unknown;
}

/** Sends the artifact to the caller; cleanup waits for it to settle. */
export type DeliverArtifact = (artifact: Artifact) => Promise<void>;

const toMB = (bytes: number): string => (bytes / (1024 * 1024)).toFixed(2);

/**
 * Output files the tool may have produced, depth-first in name order.
 */
async function findArtifacts(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const found: string[] = [];
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await findArtifacts(entryPath)));
    } else if (entry.isFile() && ARTIFACT_EXTENSIONS.includes(path.extname(entry.name).toLowerCase())) {
      found.push(entryPath);
    }
  }
  return found;
}

function finalState(error: unknown): JobState {
  if (error instanceof UploadValidationError) return 'rejected';
  if (error instanceof ToolTimeoutError) return 'timed_out';
  return 'failed';
}

export class JobRunner {
  private readonly config: JobRunnerConfig;
  private readonly run: ToolRunner;
  private readonly verifier?: Pick<SignatureVerifier, 'verify'>;

  constructor({ config, run = runTool, verifier }: JobRunnerDeps) {
    this.config = config;
    this.run = run;
    this.verifier = verifier;
  }

  async runJob({ upload, fields }: JobRequest, deliver: DeliverArtifact): Promise<JobOutcome> {
    const jobId = uuidv4();
    const traceId = log.generateTraceId();
    const scratch = new JobScratch(traceId);
    scratch.track(upload.storedPath);

    const timer = log.startTimer('protection_job', traceId);
    let state: JobState = 'received';
    const transition = (next: JobState) => {
      log.debug('job_state', `${state} → ${next}`, traceId, { jobId });
      state = next;
    };

    log.info('job_received', `Processing file: ${upload.originalName}`, traceId, {
      jobId,
      sizeMB: toMB(upload.sizeBytes)
    });

    try {
      const decision = validateUpload(upload, this.config.upload);
      if (!decision.accepted) {
        throw new UploadValidationError(decision.reason, decision.details);
      }
      const options = parseProtectionOptions(fields);
      transition('validated');

      const md5 = await hashFile(upload.storedPath, 'md5');
      log.info('upload_validated', 'Upload accepted', traceId, { md5, options: describeOptions(options) });

      this.preflight(options.useProtectConfig);

      const { workDir, outputDir } = await scratch.createWorkspace(this.config.storage.scratchDir);
      const command = buildToolCommand({
        runtimePath: this.config.tool.runtimePath,
        launcherArgs: this.config.tool.launcherArgs,
        toolPath: this.config.tool.toolPath,
        inputPath: upload.storedPath,
        outputDir,
        flags: buildToolFlags(options, { protectConfigPath: this.config.tool.protectConfigPath })
      });

      transition('invoking');
      log.info('tool_started', `Running command: ${[command.executable, ...command.args].join(' ')}`, traceId, {
        workDir
      });
      const result = await this.invoke(command, workDir, traceId);
      const artifact = await this.collectArtifact(result, outputDir, upload.originalName, traceId);

      if (this.verifier) {
        await this.verifier.verify(artifact.path, traceId);
      }

      await deliver(artifact);
      transition('completed');
      log.info('job_completed', 'Protection successful', traceId, {
        jobId,
        artifact: artifact.downloadName,
        sizeMB: toMB(artifact.sizeBytes)
      });

      return {
        jobId,
        state: 'completed',
        artifactName: artifact.downloadName,
        durationMs: timer.end({ state: 'completed' })
      };
    } catch (error) {
      transition(finalState(error));
      if (error instanceof UploadValidationError) {
        log.warn('job_rejected', error.message, traceId, { jobId, details: error.details });
      } else if (error instanceof ProtectionError) {
        log.error('job_failed', error.message, error, traceId, { jobId, state, details: error.details });
      } else {
        log.error('job_failed', 'Unexpected error running protection', error instanceof Error ? error : undefined, traceId, {
          jobId,
          state
        });
      }
      timer.end({ state });
      throw error;
    } finally {
      await scratch.release();
    }
  }

  private preflight(useProtectConfig: boolean): void {
    const { toolPath, protectConfigPath } = this.config.tool;

    if (!existsSync(toolPath)) {
      throw new EnvironmentError(
        'Protection tool not found',
        `Expected the tool artifact at ${toolPath}`
      );
    }

    if (useProtectConfig && !existsSync(protectConfigPath)) {
      throw new EnvironmentError(
        'Protect config template not found',
        `Expected the template at ${protectConfigPath}`
      );
    }
  }

  private async invoke(command: ToolCommand, workDir: string, traceId: string): Promise<ToolRunResult> {
    let result: ToolRunResult;
    try {
      // The workspace is the cwd so side output such as code dumps is cleaned with it
      result = await this.run(command, { cwd: workDir, timeoutMs: this.config.tool.timeoutMs, traceId });
    } catch (error) {
      if (isSpawnFailure(error)) {
        throw new EnvironmentError(
          'Java runtime is not installed or not found in PATH',
          `Could not start ${command.executable} (${error.code}). Please ensure Java is installed and JAVA_HOME is set correctly.`
        );
      }
      throw error;
    }

    log.info('tool_exited', `Command completed with return code: ${result.code}`, traceId, {
      signal: result.signal,
      durationMs: result.durationMs
    });

    if (result.timedOut) {
      throw new ToolTimeoutError(
        this.config.tool.timeoutMs,
        'The package might be too large or complex. Please try a smaller file or retry later.'
      );
    }

    if (result.code !== 0) {
      log.debug('tool_output', 'Tool output', traceId, { stdout: result.stdout, stderr: result.stderr });
      throw new ToolExecutionError(
        'Protection failed',
        result.stderr.trim() || result.stdout.trim() || `Tool exited with code ${result.code}`,
        result.code
      );
    }

    return result;
  }

  private async collectArtifact(
    result: ToolRunResult,
    outputDir: string,
    originalName: string,
    traceId: string
  ): Promise<Artifact> {
    const [artifactPath] = await findArtifacts(outputDir);

    if (!artifactPath) {
      throw new ToolExecutionError(
        'No output file generated',
        result.stdout.trim() || result.stderr.trim() || 'No output file found in output directory',
        result.code
      );
    }

    const { size } = await stat(artifactPath);
    if (size === 0) {
      throw new ToolExecutionError(
        'Protected file is empty',
        'The protection process completed but generated an empty file. Please try again.',
        result.code
      );
    }

    log.debug('artifact_found', `Found output file: ${artifactPath}`, traceId, { sizeBytes: size });

    const safeName = safeFileName(originalName);
    return {
      path: artifactPath,
      sizeBytes: size,
      downloadName: `protected_${safeName}`,
      contentType: CONTENT_TYPES[path.extname(safeName).toLowerCase()] ?? 'application/octet-stream'
    };
  }
}
