#!/usr/bin/env node
import Fastify from 'fastify';
import { loadAccountsConfig } from './src/config/accounts.js';
import { env } from './src/config/env.js';
import { registerRoutes } from './src/routes/index.js';
import { createAccountEngine } from './src/services/accountEngine.js';
import { createConnectionManager } from './src/services/imap/connection.js';
import { createAccountLogger, logger } from './src/services/logger.js';
import { createMetricsRegistry } from './src/services/metrics.js';
import { createTokenSourceResolver } from './src/services/modernauth/tokenSource.js';
import { closeEngines, createLogCrashReporter, runAccounts } from './src/services/supervisor.js';
import { describeError } from './src/shared/errors.js';

const shutdown = new AbortController();
const reporter = createLogCrashReporter(logger);

process.on('unhandledRejection', (reason) => {
  reporter.report(reason, { source: 'unhandledRejection' });
});
process.on('uncaughtException', (error) => {
  reporter.report(error, { source: 'uncaughtException' });
  process.exitCode = 1;
  shutdown.abort();
});

const config = await loadAccountsConfig(env.configPath).catch((error: unknown) => {
  logger.fatal({ error }, describeError(error));
  process.exit(1);
});

const engines = config.accounts.map((account) => {
  const accountLogger = createAccountLogger(account);
  const connections = createConnectionManager({
    logger: accountLogger,
    tokenSourceFor: createTokenSourceResolver({
      account,
      broker: config.broker,
      providers: config.providers,
      logger: accountLogger,
      signal: shutdown.signal,
    }),
  });
  return createAccountEngine(account, {
    connections,
    logger,
    idleFallbackMs: env.sync.idleFallbackMs,
  });
});

const server = env.metrics.enabled ? Fastify({ logger: env.nodeEnv === 'development' }) : null;
if (server) {
  const accounts = () => config.accounts;
  await registerRoutes(server, { registry: createMetricsRegistry(accounts), accounts });
  await server.listen({ port: env.metrics.port, host: env.metrics.host });
  logger.info(`metrics listening on ${env.metrics.host}:${env.metrics.port}`);
}

const stop = () => {
  if (!shutdown.signal.aborted) {
    logger.info('shutdown requested');
    shutdown.abort();
  }
};

process.on('SIGINT', stop);
process.on('SIGTERM', stop);

const outcomes = await runAccounts(engines, shutdown.signal, { logger, reporter });
await closeEngines(engines, logger);
await server?.close();

const failed = outcomes.filter((outcome) => outcome.error !== null);
logger.info({ accounts: outcomes.length, failed: failed.length }, 'all accounts stopped');
if (failed.length > 0 && !shutdown.signal.aborted) {
  process.exitCode = 1;
}
