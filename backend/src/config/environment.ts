/**
 * Environment Configuration Validation
 *
 * Loads every setting the gateway needs from environment variables and
 * validates type and range up front, so a misconfigured deployment fails at
 * boot instead of on the first upload.
 */

import * as path from 'path';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { appPaths } from './appPaths';
import type { LogFormat, LogLevel, LogOutput } from '../services/logger';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

export interface ServerConfig {
  port: number;
  host: string;
  /** Allowed CORS origin; `*` allows any */
  corsOrigin: string;
}

export interface UploadConfig {
  /** Largest accepted upload, in bytes */
  maxUploadBytes: number;
  /** Lower-case extensions including the dot */
  allowedExtensions: string[];
  /** Filename prefix marking output of a previous protection pass */
  protectedPrefix: string;
  /** Multipart field carrying the package */
  fileField: string;
}

export interface ToolConfig {
  /** Protection tool artifact (the jar) */
  toolPath: string;
  /** Runtime launcher used to run the tool */
  runtimePath: string;
  /** Arguments placed between the launcher and the tool path */
  launcherArgs: string[];
  /** Arguments that make the runtime print its version */
  versionArgs: string[];
  /** Wall-clock ceiling for one tool run */
  timeoutMs: number;
  /** Ceiling for health probes of the runtime */
  probeTimeoutMs: number;
  /** Template passed with -c when use_protect_config is set */
  protectConfigPath: string;
  /** Check the artifact's signature after a successful run */
  verifySignature: boolean;
}

export interface StorageConfig {
  /** Parent directory of every upload and job workspace */
  scratchDir: string;
}

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  output: LogOutput;
}

export interface EnvironmentConfig {
  server: ServerConfig;
  upload: UploadConfig;
  tool: ToolConfig;
  storage: StorageConfig;
  logging: LoggingConfig;
  /** Current environment (development|production|test) */
  environment: string;
}

type Env = NodeJS.ProcessEnv;

// =============================================================================
// VALIDATION UTILITIES
// =============================================================================

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly variable?: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

function validatePort(value: string, variableName: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigValidationError(
      `Invalid port number for ${variableName}: ${value}`,
      variableName,
      'Please provide a port number between 0 and 65535'
    );
  }
  return port;
}

function validatePositiveInt(value: string, variableName: string, min = 1, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigValidationError(
      `Invalid value for ${variableName}: ${value}`,
      variableName,
      `Please provide a whole number between ${min} and ${max}`
    );
  }
  return parsed;
}

function validateBoolean(value: string | undefined, variableName: string, defaultValue = false): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.toLowerCase().trim();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;

  throw new ConfigValidationError(
    `Invalid boolean value for ${variableName}: ${value}`,
    variableName,
    'Please use true, false, 1, 0, yes, no, on, or off'
  );
}

function validatePath(value: string, variableName: string, mustExist = false): string {
  if (!value || value.trim() === '') {
    throw new ConfigValidationError(
      `Empty path for ${variableName}`,
      variableName,
      'Please provide a valid file system path'
    );
  }

  const normalizedPath = path.resolve(value);

  if (mustExist && !existsSync(normalizedPath)) {
    throw new ConfigValidationError(
      `Path does not exist for ${variableName}: ${normalizedPath}`,
      variableName,
      `Please ensure the path exists or create it: ${normalizedPath}`
    );
  }

  return normalizedPath;
}

function validateLogLevel(value: string, variableName: string): LogLevel {
  const normalized = value.toLowerCase().trim();

  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    default:
      throw new ConfigValidationError(
        `Invalid log level for ${variableName}: ${value}`,
        variableName,
        'Please use one of: debug, info, warn, error'
      );
  }
}

function validateLogFormat(value: string, variableName: string): LogFormat {
  const normalized = value.toLowerCase().trim();
  if (normalized === 'json' || normalized === 'text') {
    return normalized;
  }

  throw new ConfigValidationError(
    `Invalid log format for ${variableName}: ${value}`,
    variableName,
    'Please use one of: json, text'
  );
}

function validateLogOutput(value: string, variableName: string): LogOutput {
  const normalized = value.toLowerCase().trim();
  if (normalized === 'console' || normalized === 'file' || normalized === 'both') {
    return normalized;
  }

  throw new ConfigValidationError(
    `Invalid log output for ${variableName}: ${value}`,
    variableName,
    'Please use one of: console, file, both'
  );
}

/**
 * Split a space separated argument list, dropping empty entries.
 */
function parseArgs(value: string): string[] {
  return value.split(/\s+/).filter(arg => arg.length > 0);
}

/**
 * JAVA_CMD wins; otherwise $JAVA_HOME/bin/java when it exists; otherwise
 * whatever `java` resolves to on PATH.
 */
function resolveRuntimePath(env: Env): string {
  const javaExe = process.platform === 'win32' ? 'java.exe' : 'java';

  if (env.JAVA_CMD && env.JAVA_CMD.trim() !== '') {
    return env.JAVA_CMD.trim();
  }

  if (env.JAVA_HOME) {
    const candidate = path.join(env.JAVA_HOME, 'bin', javaExe);
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  return javaExe;
}

// =============================================================================
// CONFIGURATION LOADERS
// =============================================================================

function loadServerConfig(env: Env): ServerConfig {
  return {
    port: validatePort(env.PORT || '5000', 'PORT'),
    host: env.HOST || '0.0.0.0',
    corsOrigin: env.CORS_ORIGIN || '*'
  };
}

function loadUploadConfig(env: Env): UploadConfig {
  return {
    maxUploadBytes: validatePositiveInt(
      env.MAX_UPLOAD_BYTES || `${150 * 1024 * 1024}`,
      'MAX_UPLOAD_BYTES'
    ),
    allowedExtensions: ['.apk', '.aab'],
    protectedPrefix: 'protected_',
    fileField: 'apk_file'
  };
}

function loadToolConfig(env: Env): ToolConfig {
  const timeoutSeconds = validatePositiveInt(
    env.TOOL_TIMEOUT_SECONDS || '300',
    'TOOL_TIMEOUT_SECONDS',
    1,
    3600
  );

  return {
    toolPath: validatePath(env.DPT_JAR_PATH || appPaths.defaultToolPath, 'DPT_JAR_PATH'),
    runtimePath: resolveRuntimePath(env),
    launcherArgs: parseArgs(env.TOOL_LAUNCHER_ARGS ?? '-jar'),
    versionArgs: parseArgs(env.JAVA_VERSION_ARGS ?? '-version'),
    timeoutMs: timeoutSeconds * 1000,
    probeTimeoutMs: validatePositiveInt(
      env.HEALTH_PROBE_TIMEOUT_MS || '5000',
      'HEALTH_PROBE_TIMEOUT_MS',
      100,
      60000
    ),
    protectConfigPath: validatePath(
      env.PROTECT_CONFIG_PATH || appPaths.defaultProtectConfigPath,
      'PROTECT_CONFIG_PATH'
    ),
    verifySignature: validateBoolean(env.VERIFY_SIGNATURE, 'VERIFY_SIGNATURE', true)
  };
}

function loadStorageConfig(env: Env): StorageConfig {
  return {
    scratchDir: validatePath(env.SCRATCH_DIR || tmpdir(), 'SCRATCH_DIR')
  };
}

function loadLoggingConfig(env: Env): LoggingConfig {
  return {
    level: validateLogLevel(env.LOG_LEVEL || 'info', 'LOG_LEVEL'),
    format: validateLogFormat(env.LOG_FORMAT || 'json', 'LOG_FORMAT'),
    output: validateLogOutput(env.LOG_OUTPUT || 'console', 'LOG_OUTPUT')
  };
}

/**
 * Load and validate complete environment configuration.
 *
 * @throws ConfigValidationError naming the offending variable
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  return {
    server: loadServerConfig(env),
    upload: loadUploadConfig(env),
    tool: loadToolConfig(env),
    storage: loadStorageConfig(env),
    logging: loadLoggingConfig(env),
    environment: env.NODE_ENV || 'development'
  };
}

/**
 * Warnings for settings that are legal but suspicious in the target environment.
 */
export function validateEnvironmentConfig(config: EnvironmentConfig, environment?: string): string[] {
  const targetEnv = environment || config.environment;
  const warnings: string[] = [];

  if (!existsSync(config.tool.toolPath)) {
    warnings.push(`Protection tool not found at ${config.tool.toolPath}; /protect will fail until it is installed`);
  }

  if (targetEnv === 'production') {
    if (config.logging.level === 'debug') {
      warnings.push('Debug logging enabled in production environment');
    }
    if (config.server.corsOrigin === '*') {
      warnings.push('CORS origin set to wildcard in production environment');
    }
  }

  return warnings;
}

/**
 * Configuration summary for the boot log
 */
export function getConfigSummary(config: EnvironmentConfig): Record<string, unknown> {
  return {
    environment: config.environment,
    server: {
      port: config.server.port,
      host: config.server.host
    },
    upload: {
      maxUploadMB: Math.round(config.upload.maxUploadBytes / (1024 * 1024)),
      allowedExtensions: config.upload.allowedExtensions
    },
    tool: {
      toolPath: config.tool.toolPath,
      runtimePath: config.tool.runtimePath,
      timeoutSeconds: config.tool.timeoutMs / 1000,
      verifySignature: config.tool.verifySignature
    },
    storage: {
      scratchDir: config.storage.scratchDir
    },
    logging: config.logging
  };
}
