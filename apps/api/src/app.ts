import type { AnalysisThresholds } from '@runstreak/shared';
import type { IncomingMessage, ServerResponse } from 'node:http';

import Fastify, { type FastifyBaseLogger, type FastifyInstance, type RawServerDefault } from 'fastify';

import { config, type ReportSettings } from './config/index.js';
import errorHandler from './plugins/error-handler.js';
import storesPlugin, { type StoresPluginOptions } from './plugins/stores.js';
import { analysisRoutes } from './routes/analysis.js';
import { healthRoutes } from './routes/health.js';
import { ingestionRoutes } from './routes/ingestion.js';
import { logger } from './utils/logger.js';

export interface BuildAppOptions {
  stores: StoresPluginOptions['stores'];
  thresholds?: AnalysisThresholds;
  branch?: string;
  report?: ReportSettings;
  ping?: () => Promise<void>;
  close?: () => Promise<void>;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const thresholds = options.thresholds ?? config.thresholds;
  const report = options.report ?? config.report;

  const app = Fastify<RawServerDefault, IncomingMessage, ServerResponse, FastifyBaseLogger>({
    logger,
    trustProxy: true,
  });

  await app.register(errorHandler);
  await app.register(storesPlugin, {
    stores: options.stores,
    thresholds,
    branch: options.branch ?? config.branch,
    ping: options.ping,
    close: options.close,
  });

  await app.register(healthRoutes, { prefix: '/health' });
  await app.register(ingestionRoutes, { prefix: '/api' });
  await app.register(analysisRoutes, { prefix: '/api', thresholds, report });

  return app;
}
