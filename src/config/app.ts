import { join, resolve } from 'node:path';
import { env } from './env.ts';

/**
 * On-disk layout of a harness project
 */
export interface HarnessPaths {
  root: string;
  configDir: string;
  dataDir: string;
  reportsDir: string;
  configFile: string;
}

/**
 * Resolve the config/, data/ and reports/ directories under a project root
 */
export function resolvePaths(root: string, configFile?: string): HarnessPaths {
  const absoluteRoot = resolve(root);
  const configDir = join(absoluteRoot, 'config');

  return {
    root: absoluteRoot,
    configDir,
    dataDir: join(absoluteRoot, 'data'),
    reportsDir: join(absoluteRoot, 'reports'),
    configFile: configFile ? resolve(absoluteRoot, configFile) : join(configDir, 'config.yaml'),
  };
}

/**
 * Application configuration derived from environment variables
 */
export const appConfig = {
  /**
   * Application environment
   */
  env: env.NODE_ENV,

  /**
   * Is production environment
   */
  isProduction: env.NODE_ENV === 'production',

  /**
   * Is test environment
   */
  isTest: env.NODE_ENV === 'test',

  /**
   * Log level
   */
  logLevel: env.LOG_LEVEL,

  /**
   * Rotating log file settings
   */
  logFile: {
    name: 'test_run',
    retentionDays: env.LOG_RETENTION_DAYS,
  },

  /**
   * Project directories
   */
  paths: resolvePaths(env.HARNESS_ROOT ?? process.cwd(), env.HARNESS_CONFIG_FILE),

  /**
   * Seed for the fake-data generator (random when unset)
   */
  fakerSeed: env.FAKER_SEED,
} as const;
