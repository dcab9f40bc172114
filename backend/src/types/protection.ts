/**
 * Protection Job Types
 *
 * Value types shared by the upload validator, option mapper, job runner and
 * the HTTP layer.
 */

export const SUPPORTED_ABIS = ['arm', 'arm64', 'x86', 'x86_64'] as const;

export type Abi = (typeof SUPPORTED_ABIS)[number];

/**
 * Raw uploaded package as materialized in the scratch directory.
 */
export interface Upload {
  /** Filename declared by the client */
  originalName: string;
  /** Where multer wrote the bytes */
  storedPath: string;
  sizeBytes: number;
}

/**
 * Validated, immutable options for one tool run. Signing is not represented:
 * the tool always signs.
 */
export interface ProtectionOptions {
  readonly debug: boolean;
  readonly disableAcf: boolean;
  readonly dumpCode: boolean;
  readonly keepClasses: boolean;
  readonly noisyLog: boolean;
  readonly smaller: boolean;
  readonly useProtectConfig: boolean;
  readonly excludeAbis: readonly Abi[];
}

export type JobState =
  | 'received'
  | 'validated'
  | 'rejected'
  | 'invoking'
  | 'completed'
  | 'failed'
  | 'timed_out';

/**
 * File produced by the tool, owned by its job until cleanup.
 */
export interface Artifact {
  path: string;
  sizeBytes: number;
  /** Name offered to the client, e.g. protected_sample.apk */
  downloadName: string;
  contentType: string;
}

export interface ToolCommand {
  executable: string;
  args: string[];
}

export interface ToolRunResult {
  /** Exit code, null when the process died from a signal */
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
}

export interface JobOutcome {
  jobId: string;
  state: Extract<JobState, 'completed'>;
  artifactName: string;
  durationMs: number;
}

export type SignatureCheck =
  | { status: 'verified'; verifier: 'apksigner' | 'jarsigner' }
  | { status: 'unverified'; reason: string };

export interface HealthReport {
  status: 'ok';
  dpt_jar_exists: boolean;
  java_available: boolean;
  java_version: string;
}

/** JSON body of every non-2xx response */
export interface ErrorResponseBody {
  error: string;
  details: string;
}
