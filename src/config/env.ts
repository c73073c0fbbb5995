/**
 * Environment configuration module
 * Loads and validates environment variables
 */

export interface EnvConfig {
  // Required
  DATABASE_URL: string;

  // Optional with defaults
  PORT: number;
  TIMEZONE: string;
  DB_POOL_MAX: number;

  // Member name resolution (optional with defaults)
  MEMBER_FUZZY_CUTOFF: number;
  MEMBER_FIRST_NAME_MATCH: boolean;
}

export class MissingEnvVarError extends Error {
  constructor(varName: string) {
    super(`Required environment variable not set: ${varName}`);
    this.name = 'MissingEnvVarError';
  }
}

const REQUIRED_ENV_VARS = ['DATABASE_URL'] as const;

/**
 * Validates that all required environment variables are set
 * @throws MissingEnvVarError if any required variable is missing
 */
export function validateRequiredEnvVars(): void {
  for (const varName of REQUIRED_ENV_VARS) {
    if (!process.env[varName]) {
      throw new MissingEnvVarError(varName);
    }
  }
}

/**
 * Validate an IANA time zone name
 * @returns true if valid, false otherwise
 */
function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone }).format(new Date());
    return true;
  } catch {
    return false;
  }
}

/**
 * Loads environment configuration with defaults for optional values
 * @returns EnvConfig object with all configuration values
 */
export function loadEnvConfig(): EnvConfig {
  let timeZone = process.env.TIMEZONE || 'UTC';
  if (!isValidTimeZone(timeZone)) {
    console.warn(`Invalid TIMEZONE "${timeZone}", using default "UTC"`);
    timeZone = 'UTC';
  }

  let poolMax = parseInt(process.env.DB_POOL_MAX || '10', 10);
  if (isNaN(poolMax) || poolMax < 1) {
    console.warn(`Invalid DB_POOL_MAX "${process.env.DB_POOL_MAX}", using default 10`);
    poolMax = 10;
  }

  // MEMBER_FUZZY_CUTOFF - minimum similarity ratio for approximate name matches (default: 0.6)
  let fuzzyCutoff = parseFloat(process.env.MEMBER_FUZZY_CUTOFF || '0.6');
  if (isNaN(fuzzyCutoff) || fuzzyCutoff <= 0 || fuzzyCutoff > 1) {
    console.warn(`Invalid MEMBER_FUZZY_CUTOFF "${process.env.MEMBER_FUZZY_CUTOFF}", using default 0.6`);
    fuzzyCutoff = 0.6;
  }

  return {
    DATABASE_URL: process.env.DATABASE_URL || '',
    PORT: parseInt(process.env.PORT || '3000', 10),
    TIMEZONE: timeZone,
    DB_POOL_MAX: poolMax,

    MEMBER_FUZZY_CUTOFF: fuzzyCutoff,
    // Unique first-name shortcut is on unless explicitly disabled
    MEMBER_FIRST_NAME_MATCH: (process.env.MEMBER_FIRST_NAME_MATCH || 'true').toLowerCase() !== 'false',
  };
}

// Export singleton config instance
let configInstance: EnvConfig | null = null;

export function getConfig(): EnvConfig {
  if (!configInstance) {
    configInstance = loadEnvConfig();
  }
  return configInstance;
}

/**
 * Reset the singleton instance (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
