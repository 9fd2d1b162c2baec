/**
 * Environment variable type definitions
 */

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      NODE_ENV?: 'development' | 'production' | 'test';
      LOG_LEVEL?: string;

      // Scan tuning
      LOOKALIKE_CONCURRENCY?: string;
      LOOKALIKE_LIMIT?: string;
      LOOKALIKE_DICTIONARY?: string;

      // Whois client
      LOOKALIKE_WHOIS_TIMEOUT_MS?: string;
      LOOKALIKE_WHOIS_FOLLOW?: string;
    }
  }
}

export {};
