import type http from 'node:http';
import { config } from './config.js';
import { createLogger } from './utils/logger.js';
import { createHttpServer } from './runtime/http.js';
import { createReviewService } from './orchestration/review-service.js';
import { errorMessage } from './orchestration/errors.js';
import { formatStartupIssue, StartupValidationError, validateStartupConfig } from './utils/startup.js';

const logger = createLogger('codewarden', config.LOG_LEVEL);

const closeServer = (server: http.Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
    server.closeAllConnections();
  });

const run = async () => {
  const startupIssues = validateStartupConfig(config);
  for (const issue of startupIssues) {
    const rendered = formatStartupIssue(issue);
    if (issue.severity === 'error') {
      logger.error(`[startup/${issue.area}] ${rendered}`);
    } else {
      logger.warn(`[startup/${issue.area}] ${rendered}`);
    }
  }

  const errors = startupIssues.filter((issue) => issue.severity === 'error');
  if (errors.length > 0) {
    throw new StartupValidationError(errors);
  }

  const service = createReviewService(config);
  const server = await createHttpServer(service, config, config.CONTROL_HTTP_PORT, createLogger('runtime.http', config.LOG_LEVEL));

  logger.info(`codewarden started engine=${config.ENGINE_MODE} uploads=${config.UPLOAD_DIR} fixed=${config.FIXED_DIR}`);

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('shutdown signal received');
    await service.stop();
    await closeServer(server);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error('shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
};

run().catch((err: unknown) => {
  if (err instanceof StartupValidationError) {
    logger.error(`startup checks failed, aborting (${err.issues.length} error(s))`);
    process.exit(1);
    return;
  }
  logger.error('fatal', { error: errorMessage(err) });
  process.exit(1);
});
