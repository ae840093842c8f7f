/**
 * Environment variable type definitions
 */

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      NODE_ENV?: 'development' | 'production' | 'test';
      LOG_LEVEL?: string;

      // Scan tuning
      SIMILARITY_THRESHOLD?: string;
      CANDIDATE_CAP?: string;
      SCAN_STRATEGY?: string;
      SCAN_CONCURRENCY?: string;
      FETCH_CONNECT_TIMEOUT_MS?: string;
      FETCH_READ_TIMEOUT_MS?: string;
      SCANNER_USER_AGENT?: string;

      // Registration oracle (dnstwist)
      ORACLE_COMMAND?: string;
      ORACLE_TIMEOUT_MS?: string;

      // History
      HISTORY_FILE?: string;

      // API server
      PORT?: string;
      HOST?: string;
      SCANNER_API_KEY?: string;
      RATE_LIMIT_MAX_REQUESTS?: string;
      RATE_LIMIT_WINDOW_MS?: string;
    }
  }
}

export {};
