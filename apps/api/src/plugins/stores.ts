import type { AnalysisThresholds } from '@runstreak/shared';
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';

import { RegressionDetectionEngine } from '../analytics/detection-engine.js';
import type { Stores } from '../storage/types.js';
import { logger } from '../utils/logger.js';

declare module 'fastify' {
  interface FastifyInstance {
    stores: Stores;
    detectionEngine: RegressionDetectionEngine;
    checkDatabaseHealth: () => Promise<'connected' | 'disconnected'>;
  }
}

export interface StoresPluginOptions {
  stores: Stores;
  thresholds: AnalysisThresholds;
  branch: string;
  /** Resolves when the backing database answers */
  ping?: () => Promise<void>;
  /** Called when the server shuts down */
  close?: () => Promise<void>;
}

async function storesPlugin(fastify: FastifyInstance, options: StoresPluginOptions) {
  const { stores, thresholds, branch, ping, close } = options;

  fastify.decorate('stores', stores);
  fastify.decorate('detectionEngine', new RegressionDetectionEngine({ stores, thresholds, branch }));

  fastify.decorate('checkDatabaseHealth', async () => {
    if (!ping) {
      return 'connected';
    }
    try {
      await ping();
      return 'connected';
    } catch (error) {
      logger.error({ err: error }, 'Database health check failed');
      return 'disconnected';
    }
  });

  if (close) {
    fastify.addHook('onClose', async () => {
      await close();
      logger.info('Disconnected from database');
    });
  }
}

export default fp(storesPlugin, {
  name: 'stores',
});
