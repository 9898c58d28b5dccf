import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@core/errors.ts';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://jsonplaceholder.typicode.com';

export const browserNames = ['chrome', 'firefox', 'edge'] as const;

export type BrowserName = (typeof browserNames)[number];

/**
 * Run configuration schema
 * Recognized keys get defaults, anything else passes through untouched.
 */
const runConfigSchema = z
  .object({
    base_url: z.string().min(1).default(DEFAULT_BASE_URL),
    timeout: z.number().int().positive().default(30),
    browser: z.enum(browserNames).default('chrome'),
    headless: z.boolean().default(false),
  })
  .passthrough();

export type RunConfig = Readonly<z.infer<typeof runConfigSchema>>;

/**
 * Defaults used when no config file exists
 */
export const defaultRunConfig: RunConfig = Object.freeze(runConfigSchema.parse({}));

/**
 * Apply defaults to a parsed document
 */
export function resolveRunConfig(document: unknown, source = 'inline'): RunConfig {
  // An empty YAML document parses to null
  if (document === null || document === undefined) {
    return defaultRunConfig;
  }

  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigurationError(`Config ${source} must be a mapping of options`);
  }

  const result = runConfigSchema.safeParse(document);
  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join(', ');
    throw new ConfigurationError(`Invalid config ${source}: ${details}`, { cause: result.error });
  }

  return Object.freeze(result.data);
}

/**
 * Load the run configuration from a YAML file
 * Missing file means defaults; a malformed one aborts the session.
 */
export async function loadRunConfig(file: string): Promise<RunConfig> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return defaultRunConfig;
    }
    throw new ConfigurationError(`Cannot read config ${file}`, { cause: error });
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (error) {
    throw new ConfigurationError(`Malformed config ${file}`, { cause: error });
  }

  return resolveRunConfig(document, file);
}
