/**
 * Environment Variable Utilities
 * Safe parsing of environment variables with NaN protection and logging
 */

type Env = Record<string, string | undefined>;

/**
 * Parse an integer environment variable with validation
 * Returns the default value if:
 * - Environment variable is not set
 * - Value cannot be parsed as an integer (NaN)
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if missing or invalid
 * @param env - Variables to read (defaults to process.env)
 */
export function parseIntEnv(key: string, defaultValue: number, env: Env = process.env): number {
  const raw = env[key];
  if (!raw) return defaultValue;

  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    console.warn(`[ENV] Invalid ${key}="${raw}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

/**
 * Parse a float environment variable with validation
 * Returns the default value if:
 * - Environment variable is not set
 * - Value cannot be parsed as a float (NaN)
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if missing or invalid
 * @param env - Variables to read (defaults to process.env)
 */
export function parseFloatEnv(key: string, defaultValue: number, env: Env = process.env): number {
  const raw = env[key];
  if (!raw) return defaultValue;

  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) {
    console.warn(`[ENV] Invalid ${key}="${raw}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

/**
 * Parse a comma-separated list environment variable
 * Entries are trimmed and empty entries dropped. Unset returns the default.
 */
export function parseListEnv(key: string, defaultValue: string[], env: Env = process.env): string[] {
  const raw = env[key];
  if (raw === undefined) return defaultValue;

  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Parse a boolean environment variable ("true"/"1"/"yes" and "false"/"0"/"no")
 */
export function parseBooleanEnv(key: string, defaultValue: boolean, env: Env = process.env): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return defaultValue;

  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;

  console.warn(`[ENV] Invalid ${key}="${raw}", using default ${defaultValue}`);
  return defaultValue;
}
