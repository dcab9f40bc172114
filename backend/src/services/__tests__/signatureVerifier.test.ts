import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import type { ToolCommand, ToolRunResult } from '../../types/protection';
import { SignatureVerifier, resolveVerifierPaths } from '../protection/signatureVerifier';
import type { RunOptions } from '../protection/toolRunner';

const runResult = (overrides: Partial<ToolRunResult>): ToolRunResult => ({
  code: 0,
  signal: null,
  stdout: '',
  stderr: '',
  timedOut: false,
  durationMs: 5,
  ...overrides
});

const paths = { apksigner: '/sdk/build-tools/34.0.0/apksigner', jarsigner: '/jdk/bin/jarsigner' };

describe('SignatureVerifier', () => {
  test('accepts a clean apksigner exit without trying jarsigner', async () => {
    const run = jest.fn(async (_command: ToolCommand, _options?: RunOptions) => runResult({ stdout: 'Signer #1 certificate DN: CN=test' }));

    const check = await new SignatureVerifier(paths, run).verify('/tmp/out.apk', 'trace');

    expect(check).toEqual({ status: 'verified', verifier: 'apksigner' });
    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith(
      { executable: paths.apksigner, args: ['verify', '--print-certs', '/tmp/out.apk'] },
      { timeoutMs: 30000, traceId: 'trace' }
    );
  });

  test('falls back to jarsigner when apksigner fails', async () => {
    const run = jest.fn(async (command: ToolCommand, _options?: RunOptions) =>
      command.executable === paths.apksigner
        ? runResult({ code: 1, stderr: 'DOES NOT VERIFY\nERROR: missing META-INF' })
        : runResult({ stdout: 's = signature was verified\n\njar verified.\n' }));

    const check = await new SignatureVerifier(paths, run).verify('/tmp/out.apk');

    expect(check).toEqual({ status: 'verified', verifier: 'jarsigner' });
    expect(run).toHaveBeenLastCalledWith(
      { executable: paths.jarsigner, args: ['-verify', '-verbose', '-certs', '/tmp/out.apk'] },
      { timeoutMs: 30000, traceId: undefined }
    );
  });

  test('reports every reason when no verifier confirms the signature', async () => {
    const run = jest.fn(async (command: ToolCommand, _options?: RunOptions) =>
      command.executable === paths.apksigner
        ? runResult({ code: null, signal: 'SIGKILL', timedOut: true })
        : runResult({ stdout: 'jar is unsigned.' }));

    const check = await new SignatureVerifier(paths, run).verify('/tmp/out.apk');

    expect(check).toEqual({
      status: 'unverified',
      reason: 'apksigner: timed out; jarsigner: signature not confirmed'
    });
  });

  test('uses jarsigner alone when no build-tools are installed', async () => {
    const run = jest.fn(async (_command: ToolCommand, _options?: RunOptions) => runResult({ code: 2 }));

    const check = await new SignatureVerifier({ jarsigner: 'jarsigner' }, run).verify('/tmp/out.apk');

    expect(run).toHaveBeenCalledTimes(1);
    expect(check).toEqual({ status: 'unverified', reason: 'jarsigner: exit code 2' });
  });

  test('never rejects when the verifier cannot start', async () => {
    const run = jest.fn(async (_command: ToolCommand, _options?: RunOptions): Promise<ToolRunResult> => {
      throw new Error('spawn jarsigner ENOENT');
    });

    const check = await new SignatureVerifier({ jarsigner: 'jarsigner' }, run).verify('/tmp/out.apk');

    expect(check).toEqual({ status: 'unverified', reason: 'jarsigner: spawn jarsigner ENOENT' });
  });
});

describe('resolveVerifierPaths', () => {
  let sdk: string;

  const addBuildTools = (version: string) => {
    const dir = path.join(sdk, 'build-tools', version);
    mkdirSync(dir, { recursive: true });
    const apksigner = path.join(dir, 'apksigner');
    writeFileSync(apksigner, '#!/bin/sh\n');
    chmodSync(apksigner, 0o755);
    return apksigner;
  };

  beforeEach(() => {
    sdk = mkdtempSync(path.join(tmpdir(), 'android-sdk-'));
  });

  afterEach(() => {
    rmSync(sdk, { recursive: true, force: true });
  });

  test('picks apksigner from the newest build-tools by numeric version', () => {
    addBuildTools('9.0.0');
    addBuildTools('30.0.3');
    const newest = addBuildTools('34.0.0');

    expect(resolveVerifierPaths({ ANDROID_HOME: sdk }).apksigner).toBe(newest);
  });

  test('compares versions numerically rather than as text', () => {
    addBuildTools('9.0.0');
    const newest = addBuildTools('30.0.3');

    expect(resolveVerifierPaths({ ANDROID_SDK_ROOT: sdk }).apksigner).toBe(newest);
  });

  test('falls back to jarsigner on PATH without JAVA_HOME or an SDK', () => {
    expect(resolveVerifierPaths({})).toEqual({ apksigner: undefined, jarsigner: 'jarsigner' });
  });

  test('uses jarsigner from JAVA_HOME when it exists', () => {
    const javaHome = path.join(sdk, 'jdk');
    mkdirSync(path.join(javaHome, 'bin'), { recursive: true });
    const jarsigner = path.join(javaHome, 'bin', 'jarsigner');
    writeFileSync(jarsigner, '');

    expect(resolveVerifierPaths({ JAVA_HOME: javaHome }).jarsigner).toBe(jarsigner);
  });
});
