/**
 * Generator configuration
 *
 * The configuration is validated once at the entrypoint and then passed
 * explicitly to every component as a frozen value.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import { deepFreeze } from './codegen/utils/freeze.js';

export const FRAMEWORKS = ['sveltekit', 'nextjs', 'nuxtjs'] as const;

const environmentSchema = z.object({
  mode: z.enum(['unified', 'separate']),
  apiUrl: z.string().min(1, 'apiUrl is required'),
});

const outputSchema = z
  .object({
    strategy: z.enum(['mirror', 'co-locate']).default('mirror'),
    location: z.string().min(1, 'output.location must not be empty').default('.typed-routes'),
  })
  .default({});

const backendSchema = z
  .object({
    host: z.string().min(1).default('localhost'),
    port: z.number().int().min(1).max(65535).default(8000),
  })
  .default({});

const autoDiscoverySchema = z
  .object({
    enabled: z.boolean().default(false),
    root: z.string().default('.'),
    filePatterns: z.array(z.string().min(1)).default(['_*.py', '*.*.py']),
  })
  .default({});

export const configSchema = z
  .object({
    framework: z.enum(FRAMEWORKS).nullable().default(null),
    language: z.string().min(1).default('typescript'),
    target: z.string().min(1).default('development'),
    output: outputSchema,
    backend: backendSchema,
    environments: z
      .record(z.string(), environmentSchema)
      .default({ development: { mode: 'unified', apiUrl: '/api' } }),
    include: z.array(z.string()).default(['**/*']),
    exclude: z.array(z.string()).default(['**/node_modules/**', '**/__pycache__/**']),
    autoDiscovery: autoDiscoverySchema,
    includeDeprecated: z.boolean().default(true),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (!(config.target in config.environments)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['target'],
        message: `target "${config.target}" is not defined under environments`,
      });
    }
    if (config.autoDiscovery.enabled && config.autoDiscovery.filePatterns.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['autoDiscovery', 'filePatterns'],
        message: 'at least one file pattern is required when auto-discovery is enabled',
      });
    }
  });

export type ConfigInput = z.input<typeof configSchema>;
export type GeneratorConfig = Readonly<z.output<typeof configSchema>>;
export type EnvironmentConfig = z.output<typeof environmentSchema>;
export type OutputStrategy = GeneratorConfig['output']['strategy'];

/**
 * Validate raw configuration and apply defaults
 *
 * @param raw - Parsed configuration (from a file or passed inline)
 * @returns Frozen configuration
 * @throws {ConfigError} When an option is missing, unknown or invalid
 */
export function resolveConfig(raw: unknown = {}): GeneratorConfig {
  const parsed = configSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
  }

  return deepFreeze(parsed.data);
}

/**
 * Read and validate a JSON configuration file
 *
 * @param configPath - Path to the configuration file
 * @throws {ConfigError} When the file is missing, is not JSON, or is invalid
 */
export async function loadConfig(configPath: string): Promise<GeneratorConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read configuration file ${configPath}: ${describeError(error)}`,
      [],
      error
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse JSON from ${configPath}: ${describeError(error)}`,
      [],
      error
    );
  }

  return resolveConfig(raw);
}

/**
 * Environment selected by `target`
 */
export function getTargetEnvironment(config: GeneratorConfig): EnvironmentConfig {
  const environment = config.environments[config.target];
  if (!environment) {
    throw new ConfigError(`target "${config.target}" is not defined under environments`, [
      'target',
    ]);
  }
  return environment;
}

/**
 * Address of the live API process, e.g. `http://localhost:8000`
 */
export function getBackendUrl(config: GeneratorConfig): string {
  return `http://${config.backend.host}:${config.backend.port}`;
}
