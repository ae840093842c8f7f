import { env, server as serverEnv, loadScanConfig } from './core/env.js';
import { createModuleLogger } from './core/logger.js';
import { createScanner } from './scan/executeScan.js';
import { createApp } from './server/app.js';

const log = createModuleLogger('localServer');

const config = loadScanConfig();
const scanner = createScanner(config);

const app = createApp(scanner, {
  apiKey: serverEnv.SCANNER_API_KEY,
  rateLimitMax: serverEnv.RATE_LIMIT_MAX_REQUESTS,
  rateLimitWindowMs: serverEnv.RATE_LIMIT_WINDOW_MS,
});

if (!serverEnv.SCANNER_API_KEY) {
  log.warn('SCANNER_API_KEY not set - API is unprotected (dev mode only)');
}

const httpServer = app.listen(serverEnv.PORT, serverEnv.HOST, () => {
  log.info(
    {
      port: serverEnv.PORT,
      env: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      strategy: config.strategy,
      threshold: config.threshold,
      candidateCap: config.candidateCap,
      historyFile: scanner.history.path,
    },
    'Lookalike scanner API running'
  );
  log.info({ endpoint: 'POST /scan' }, 'Start scan endpoint');
  log.info({ endpoint: 'GET /history' }, 'History endpoint');
});

process.on('unhandledRejection', (reason) => {
  log.error({ reason }, 'Unhandled rejection');
});

function shutdown(signal: string): void {
  log.info({ signal }, 'Shutting down gracefully');
  httpServer.close((err) => {
    if (err) {
      log.error({ err }, 'HTTP server close error');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
