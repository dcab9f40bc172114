import { existsSync, readdirSync, statSync } from 'fs';
import path from 'path';
import type { SignatureCheck, ToolCommand } from '../../types/protection';
import { createServiceLogger } from '../logger';
import { runTool, type ToolRunner } from './toolRunner';

/**
 * Signature Verifier
 *
 * Advisory check that the tool signed its output. apksigner from the newest
 * installed build-tools is tried first, then the JDK's jarsigner. A failed
 * check is logged and reported, never raised.
 */

const log = createServiceLogger('signature-verifier');

const VERIFY_TIMEOUT_MS = 30000;

export interface VerifierPaths {
  /** apksigner from Android SDK build-tools, when one was found */
  apksigner?: string;
  jarsigner: string;
}

const isWindows = process.platform === 'win32';

/**
 * Newest build-tools version directory, compared numerically per segment.
 */
function latestBuildTools(buildToolsDir: string): string | undefined {
  const versions = readdirSync(buildToolsDir).filter(entry =>
    statSync(path.join(buildToolsDir, entry)).isDirectory()
  );

  const segments = (version: string) => version.split(/[.-]/).map(part => Number.parseInt(part, 10) || 0);

  return versions.sort((a, b) => {
    const left = segments(a);
    const right = segments(b);
    for (let i = 0; i < Math.max(left.length, right.length); i++) {
      const diff = (right[i] ?? 0) - (left[i] ?? 0);
      if (diff !== 0) return diff;
    }
    return 0;
  })[0];
}

export function resolveVerifierPaths(env: NodeJS.ProcessEnv = process.env): VerifierPaths {
  const jarsignerExe = isWindows ? 'jarsigner.exe' : 'jarsigner';
  let jarsigner = jarsignerExe;
  if (env.JAVA_HOME) {
    const candidate = path.join(env.JAVA_HOME, 'bin', jarsignerExe);
    if (existsSync(candidate)) {
      jarsigner = candidate;
    }
  }

  let apksigner: string | undefined;
  const androidHome = env.ANDROID_HOME || env.ANDROID_SDK_ROOT;
  if (androidHome) {
    const buildToolsDir = path.join(androidHome, 'build-tools');
    try {
      const latest = existsSync(buildToolsDir) ? latestBuildTools(buildToolsDir) : undefined;
      if (latest) {
        const candidate = path.join(buildToolsDir, latest, isWindows ? 'apksigner.bat' : 'apksigner');
        apksigner = existsSync(candidate) ? candidate : undefined;
      }
    } catch (error) {
      log.warn('build_tools_scan_failed', 'Could not scan Android build-tools', undefined, {
        buildToolsDir,
        reason: error instanceof Error ? error.message : String(error)
      });
    }
  }

  return { apksigner, jarsigner };
}

export class SignatureVerifier {
  constructor(
    private readonly paths: VerifierPaths = resolveVerifierPaths(),
    private readonly run: ToolRunner = runTool
  ) {}

  async verify(artifactPath: string, traceId?: string): Promise<SignatureCheck> {
    const reasons: string[] = [];

    if (this.paths.apksigner) {
      const outcome = await this.attempt(
        { executable: this.paths.apksigner, args: ['verify', '--print-certs', artifactPath] },
        () => true,
        traceId
      );
      if (outcome === true) {
        log.info('signature_verified', 'APK signature verified using apksigner', traceId);
        return { status: 'verified', verifier: 'apksigner' };
      }
      reasons.push(`apksigner: ${outcome}`);
    }

    const outcome = await this.attempt(
      { executable: this.paths.jarsigner, args: ['-verify', '-verbose', '-certs', artifactPath] },
      stdout => stdout.toLowerCase().includes('jar verified'),
      traceId
    );
    if (outcome === true) {
      log.info('signature_verified', 'APK signature verified using jarsigner', traceId);
      return { status: 'verified', verifier: 'jarsigner' };
    }
    reasons.push(`jarsigner: ${outcome}`);

    const reason = reasons.join('; ');
    log.warn('signature_unverified', 'The protected package may not be properly signed', traceId, { reason });
    return { status: 'unverified', reason };
  }

  /**
   * true on success, otherwise a short reason
   */
  private async attempt(
    command: ToolCommand,
    accept: (stdout: string) => boolean,
    traceId?: string
  ): Promise<true | string> {
    try {
      const result = await this.run(command, { timeoutMs: VERIFY_TIMEOUT_MS, traceId });
      if (result.timedOut) {
        return 'timed out';
      }
      if (result.code !== 0) {
        return (result.stderr || result.stdout).trim().split('\n')[0] || `exit code ${result.code}`;
      }
      return accept(result.stdout) ? true : 'signature not confirmed';
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }
  }
}
