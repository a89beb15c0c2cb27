import { config } from './config/index.js';
import { createLogger } from './services/logger/index.js';
import { CONVERSION_TIERS, validateTierTable } from './services/conversion/index.js';
import app from './app.js';

const logger = createLogger('server');

// Catch kills/OOM before pino can flush
process.on('uncaughtException', (err) => {
  console.error(`UNCAUGHT EXCEPTION: ${err.message}`);
  console.error(err.stack);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  console.error(`UNHANDLED REJECTION: ${String(reason)}`);
  process.exit(1);
});

function boot(): void {
  // Step 1: Config already validated by Zod at import time
  logger.info({ env: config.NODE_ENV }, 'Configuration validated');

  // Step 2: Refuse to serve from a table with gaps or overlaps
  const issues = validateTierTable(CONVERSION_TIERS);
  if (issues.length > 0) {
    for (const issue of issues) {
      logger.error({ tier: issue.tier, kind: issue.kind }, issue.message);
    }
    throw new Error(`Conversion tier table has ${issues.length} issue(s)`);
  }
  logger.info({ tiers: CONVERSION_TIERS.length }, 'Tier table validated');

  // Step 3: Start Express
  app.listen(config.PORT, () => {
    logger.info(`Server ready on port ${config.PORT}`);
  });
}

try {
  boot();
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  const stack = err instanceof Error ? err.stack : '';
  console.error(`BOOT FAILED: ${message}`);
  console.error(`Stack: ${stack}`);
  process.exit(1);
}
