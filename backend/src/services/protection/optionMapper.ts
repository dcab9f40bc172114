import { z } from 'zod';
import { SUPPORTED_ABIS } from '../../types/protection';
import type { Abi, ProtectionOptions, ToolCommand } from '../../types/protection';
import { UploadValidationError } from './errors';

/**
 * Option Mapper
 *
 * Turns loosely typed multipart fields into a ProtectionOptions value, and
 * ProtectionOptions into the tool's command line.
 */

const flagField = z
  .enum(['true', 'false'], {
    errorMap: () => ({ message: 'expected "true" or "false"' })
  })
  .optional()
  .transform(value => value === 'true');

const isAbi = (token: string): token is Abi =>
  SUPPORTED_ABIS.some(abi => abi === token);

const excludeAbisField = z
  .string()
  .optional()
  .transform((value, ctx): Abi[] => {
    if (value === undefined || value.trim() === '') {
      return [];
    }

    const tokens = value.split(',').map(token => token.trim());
    const unknown = tokens.filter(token => !isAbi(token));
    if (unknown.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `unknown architecture ${unknown.map(token => `"${token}"`).join(', ')}; expected one of ${SUPPORTED_ABIS.join(', ')}`
      });
      return z.NEVER;
    }

    // Canonical order keeps the command line stable for the same selection
    return SUPPORTED_ABIS.filter(abi => tokens.includes(abi));
  });

export const protectionFieldsSchema = z
  .object({
    debug: flagField,
    disable_acf: flagField,
    dump_code: flagField,
    keep_classes: flagField,
    noisy_log: flagField,
    smaller: flagField,
    use_protect_config: flagField,
    exclude_abis: excludeAbisField
  })
  .strict();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      if (issue.code === z.ZodIssueCode.unrecognized_keys) {
        return `unsupported field(s): ${issue.keys.join(', ')}`;
      }
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Parse and validate raw form fields.
 *
 * @throws UploadValidationError on unknown fields, non "true"/"false" flags
 * or an unknown architecture token
 */
export function parseProtectionOptions(fields: unknown): ProtectionOptions {
  const parsed = protectionFieldsSchema.safeParse(fields ?? {});

  if (!parsed.success) {
    const hasUnknownAbi = parsed.error.issues.some(issue => issue.path[0] === 'exclude_abis');
    throw new UploadValidationError(
      hasUnknownAbi ? 'Invalid architecture in exclude_abis' : 'Invalid protection options',
      formatIssues(parsed.error)
    );
  }

  const data = parsed.data;
  return Object.freeze({
    debug: data.debug,
    disableAcf: data.disable_acf,
    dumpCode: data.dump_code,
    keepClasses: data.keep_classes,
    noisyLog: data.noisy_log,
    smaller: data.smaller,
    useProtectConfig: data.use_protect_config,
    excludeAbis: Object.freeze([...data.exclude_abis])
  });
}

export interface FlagResources {
  /** Template passed with -c when useProtectConfig is set */
  protectConfigPath: string;
}

type BooleanOption = Exclude<keyof ProtectionOptions, 'excludeAbis'>;

const SWITCHES: ReadonlyArray<readonly [BooleanOption, string]> = [
  ['debug', '--debug'],
  ['disableAcf', '--disable-acf'],
  ['dumpCode', '--dump-code'],
  ['keepClasses', '-K'],
  ['noisyLog', '--noisy-log'],
  ['smaller', '-S']
];

/**
 * Tool flags for the options, in a fixed order. Signing has no flag.
 */
export function buildToolFlags(options: ProtectionOptions, resources: FlagResources): string[] {
  const flags: string[] = [];

  for (const [option, flag] of SWITCHES) {
    if (options[option]) {
      flags.push(flag);
    }
  }

  if (options.excludeAbis.length > 0) {
    flags.push('-e', options.excludeAbis.join(','));
  }

  if (options.useProtectConfig) {
    flags.push('-c', resources.protectConfigPath);
  }

  return flags;
}

/** Labels for the "options selected" log line */
export function describeOptions(options: ProtectionOptions): string[] {
  const used: string[] = SWITCHES
    .filter(([option]) => options[option])
    .map(([option]) => option);

  if (options.excludeAbis.length > 0) {
    used.push(`excludeAbis: ${options.excludeAbis.join(',')}`);
  }
  if (options.useProtectConfig) {
    used.push('protectConfig');
  }

  return used;
}

export interface ToolInvocation {
  runtimePath: string;
  launcherArgs: string[];
  toolPath: string;
  inputPath: string;
  outputDir: string;
  flags: string[];
}

/**
 * launcher, launcher args, tool, -f <input>, flags, -o <output dir>
 */
export function buildToolCommand(invocation: ToolInvocation): ToolCommand {
  return {
    executable: invocation.runtimePath,
    args: [
      ...invocation.launcherArgs,
      invocation.toolPath,
      '-f',
      invocation.inputPath,
      ...invocation.flags,
      '-o',
      invocation.outputDir
    ]
  };
}
