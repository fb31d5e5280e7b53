import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((val) => val === 'true');

const envSchema = z.object({
  CFI_LOG_CONSOLE: booleanFlag,
  CFI_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  CFI_STRICT_UNSTRUCTURED: booleanFlag,
  CFI_TAXONOMY_DIR: z.string().trim().min(1).or(z.undefined()),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Parse an environment object without touching the cache.
 * @throws Error listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Drop the cached environment so the next access re-reads `process.env`.
 * Tests that stub variables call this before and after.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Directory holding the taxonomy JSON tables, when overridden.
 * Undefined means the tables bundled with `@iso10962/core`.
 */
export function getTaxonomyDirectory(): string | undefined {
  return validateEnv().CFI_TAXONOMY_DIR;
}

/**
 * Whether unstructured categories (spot, forwards, strategies, ...) must carry `X`
 * in every position after the category.
 */
export function isStrictUnstructured(): boolean {
  return validateEnv().CFI_STRICT_UNSTRUCTURED;
}

export function getLogLevel(): ValidatedEnv['CFI_LOG_LEVEL'] {
  return validateEnv().CFI_LOG_LEVEL;
}

export function isConsoleLoggingEnabled(): boolean {
  return validateEnv().CFI_LOG_CONSOLE;
}
