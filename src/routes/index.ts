import type { FastifyInstance } from 'fastify';
import type { Registry } from 'prom-client';
import { describeError } from '../shared/errors.js';
import type { AccountSnapshot } from '../services/metrics.js';

export type RouteContext = {
  registry: Registry;
  accounts: () => readonly AccountSnapshot[];
};

export const registerRoutes = async (app: FastifyInstance, context: RouteContext) => {
  app.get('/api/health', async () => ({
    status: 'ok',
    accounts: context.accounts().map((account) => ({
      name: account.name,
      state: account.state,
      processed: account.processed,
      lastError: account.lastError ? describeError(account.lastError) : null,
    })),
  }));

  app.get('/metrics', async (_request, reply) => {
    reply.header('Content-Type', context.registry.contentType);
    return context.registry.metrics();
  });
};
