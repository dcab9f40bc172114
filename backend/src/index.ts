import { startServer } from './api/server';
import {
  ConfigValidationError,
  getConfigSummary,
  loadEnvironmentConfig,
  validateEnvironmentConfig,
  type EnvironmentConfig
} from './config';
import { logger } from './services/logger';
import { HealthReporter } from './services/protection/healthReporter';
import { JobRunner } from './services/protection/jobRunner';
import { SignatureVerifier } from './services/protection/signatureVerifier';
import type { AppContext } from './types/appContext';

function loadConfig(): EnvironmentConfig {
  try {
    return loadEnvironmentConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      logger.error('Configuration error', {
        variable: error.variable,
        issue: error.message,
        suggestion: error.suggestion
      });
    } else {
      logger.error('Unexpected error loading configuration', error instanceof Error ? error : { error: String(error) });
    }
    process.exit(1);
  }
}

export function buildAppContext(config: EnvironmentConfig): AppContext {
  return {
    config,
    jobRunner: new JobRunner({
      config,
      verifier: config.tool.verifySignature ? new SignatureVerifier() : undefined
    }),
    healthReporter: new HealthReporter(config.tool)
  };
}

function bootstrap(): void {
  const config = loadConfig();
  logger.updateConfig(config.logging);

  for (const warning of validateEnvironmentConfig(config)) {
    logger.warn(warning);
  }
  logger.info('Protect gateway starting', getConfigSummary(config));

  const server = startServer(buildAppContext(config));
  logger.info('Backend booted', { port: config.server.port, host: config.server.host });

  const shutdown = (signal: string) => {
    logger.warn('Shutting down backend', { signal });
    server.close(() => {
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
  });
}

if (require.main === module) {
  bootstrap();
}
