/**
 * Structured Logger Tests
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  createServiceLogger,
  StructuredLogger,
  ServiceLogger,
  LoggerConfig
} from '../logger';

describe('Structured Logger', () => {
  let logDir: string;

  const fileLogger = (overrides: Partial<LoggerConfig> = {}) =>
    new StructuredLogger({
      level: 'debug',
      format: 'json',
      output: 'file',
      includeTrace: true,
      logDir,
      logFile: 'test-gateway.log',
      serviceLevels: {},
      ...overrides
    });

  const readLines = (): string[] => {
    const file = join(logDir, 'test-gateway.log');
    if (!existsSync(file)) return [];
    return readFileSync(file, 'utf8').split('\n').filter(line => line.length > 0);
  };

  const readEntries = (): Array<Record<string, unknown>> => readLines().map(line => JSON.parse(line));

  beforeEach(() => {
    logDir = mkdtempSync(join(tmpdir(), 'logger-test-'));
  });

  afterEach(() => {
    rmSync(logDir, { recursive: true, force: true });
  });

  describe('Basic Logging Functionality', () => {
    test('should create service logger', () => {
      expect(createServiceLogger('test-service')).toBeInstanceOf(ServiceLogger);
    });

    test('should generate trace IDs', () => {
      const service = createServiceLogger('test-service');
      const traceId1 = service.generateTraceId();
      const traceId2 = service.generateTraceId();

      expect(traceId1).toMatch(/^[a-f0-9]{16}$/);
      expect(traceId2).toMatch(/^[a-f0-9]{16}$/);
      expect(traceId1).not.toBe(traceId2);
    });

    test('should create performance timers', () => {
      const timer = createServiceLogger('test-service').startTimer('test-operation', 'test-trace', { context: 'test' });

      expect(timer.startTime).toBeGreaterThan(0);
      expect(timer.operation).toBe('test-service:test-operation');
      expect(timer.traceId).toBe('test-trace');
      expect(timer.context).toEqual({ context: 'test' });
    });
  });

  describe('JSON Output', () => {
    test('flattens metadata into the entry', () => {
      fileLogger().info('job-runner', 'job_received', 'Processing file: sample.apk', 'abc123', { sizeMB: '0.01' });

      const [entry] = readEntries();
      expect(entry).toEqual({
        service: 'job-runner',
        event: 'job_received',
        severity: 'info',
        timestamp: expect.any(String),
        trace_id: 'abc123',
        message: 'Processing file: sample.apk',
        sizeMB: '0.01'
      });
    });

    test('omits an absent trace id', () => {
      fileLogger().warn('gateway', 'warn', 'no trace');

      const [entry] = readEntries();
      expect(entry).not.toHaveProperty('trace_id');
    });

    test('omits trace ids when tracing is disabled', () => {
      fileLogger({ includeTrace: false }).info('gateway', 'info', 'hidden trace', 'abc123');

      expect(readEntries()[0]).not.toHaveProperty('trace_id');
    });

    test('serializes errors with name, message and code', () => {
      const error = Object.assign(new Error('spawn java ENOENT'), { code: 'ENOENT' });
      fileLogger().error('job-runner', 'job_failed', 'Runtime missing', error, 'abc123');

      const [entry] = readEntries();
      expect(entry.error).toEqual(expect.objectContaining({
        name: 'Error',
        message: 'spawn java ENOENT',
        code: 'ENOENT'
      }));
    });

    test('logs timer durations at debug', () => {
      const structured = fileLogger();
      const duration = structured.startTimer('job-runner:protection_job', 'abc123').end({ state: 'completed' });

      const [entry] = readEntries();
      expect(entry.severity).toBe('debug');
      expect(entry.operation).toBe('job-runner:protection_job');
      expect(entry.duration).toBe(duration);
      expect(entry.state).toBe('completed');
    });
  });

  describe('Text Output', () => {
    test('renders a single readable line', () => {
      fileLogger({ format: 'text' }).info('health-reporter', 'probe', 'Runtime ok', 'abc123', { version: 'v20' });

      const [line] = readLines();
      expect(line).toMatch(
        /^\[[^\]]+\] \[INFO\] health-reporter probe Runtime ok \[trace:abc123\] \{"version":"v20"\}$/
      );
    });
  });

  describe('Level Filtering', () => {
    test('drops entries below the configured level', () => {
      const structured = fileLogger({ level: 'warn' });
      structured.info('gateway', 'info', 'dropped');
      structured.warn('gateway', 'warn', 'kept');

      expect(readEntries().map(entry => entry.message)).toEqual(['kept']);
    });

    test('applies per-service overrides', () => {
      const structured = fileLogger({ level: 'error', serviceLevels: { 'job-runner': 'debug' } });
      structured.debug('job-runner', 'job_state', 'received → validated');
      structured.debug('tool-runner', 'noise', 'dropped');

      expect(readEntries().map(entry => entry.service)).toEqual(['job-runner']);
    });
  });

  describe('Configuration', () => {
    test('updates configuration at runtime', () => {
      const structured = fileLogger();
      structured.updateConfig({ level: 'error', format: 'text' });

      expect(structured.getConfig()).toEqual(expect.objectContaining({ level: 'error', format: 'text' }));
    });

    test('creates the log directory on first write', () => {
      const nested = join(logDir, 'nested', 'logs');
      new StructuredLogger({ output: 'file', logDir: nested, logFile: 'out.log', level: 'info' })
        .info('gateway', 'info', 'hello');

      expect(existsSync(join(nested, 'out.log'))).toBe(true);
    });
  });
});
