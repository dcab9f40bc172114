import type { EnvironmentConfig } from '../config';
import type { HealthReporter } from '../services/protection/healthReporter';
import type { JobRunner } from '../services/protection/jobRunner';

/**
 * Everything a request handler needs, built once at boot and passed down
 * explicitly instead of living in module-level singletons.
 */
export interface AppContext {
  config: EnvironmentConfig;
  jobRunner: JobRunner;
  healthReporter: HealthReporter;
}
