/**
 * Centralized environment configuration for the look-alike scanner
 *
 * All environment variables should be accessed through this module to ensure:
 * - Type safety with proper parsing
 * - Sensible defaults
 * - Single source of truth
 *
 * CLI flags override the values read here.
 */

// =============================================================================
// Helper Functions
// =============================================================================

function parseIntEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseStringEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

// =============================================================================
// Runtime Environment
// =============================================================================

export const env = {
  /** Is production environment */
  isProduction: process.env.NODE_ENV === 'production',
  /** Is test environment */
  isTest: process.env.NODE_ENV === 'test',
  /** Log level: 'debug' | 'info' | 'warn' | 'error' | 'silent' */
  LOG_LEVEL: parseStringEnv('LOG_LEVEL', 'info').toLowerCase(),
} as const;

// =============================================================================
// Scan Configuration
// =============================================================================

export const scan = {
  /** Concurrent resolver workers; 0 means one per logical core */
  CONCURRENCY: Math.max(0, parseIntEnv('LOOKALIKE_CONCURRENCY', 0)),
  /** Maximum number of permutations; 0 means no cap */
  LIMIT: Math.max(0, parseIntEnv('LOOKALIKE_LIMIT', 0)),
  /** Alternative substitution dictionary (JSON), empty for the bundled one */
  DICTIONARY: parseStringEnv('LOOKALIKE_DICTIONARY', ''),
} as const;

// =============================================================================
// Whois Client
// =============================================================================

export const whois = {
  /** Socket timeout for a single whois query; 0 leaves it unbounded */
  TIMEOUT_MS: Math.max(0, parseIntEnv('LOOKALIKE_WHOIS_TIMEOUT_MS', 0)),
  /** Registrar referrals to follow after the registry answer */
  FOLLOW: Math.max(0, parseIntEnv('LOOKALIKE_WHOIS_FOLLOW', 2)),
} as const;
