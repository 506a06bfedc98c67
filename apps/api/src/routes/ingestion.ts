/**
 * Ingestion API Routes
 *
 * Accepts test runs already parsed by the CI log parsers, and segments of the
 * commit history used for bisection.
 */

import {
  type ApiResponse,
  ingestCommitsSchema,
  ingestRunSchema,
  type TestOutcome,
  uniqueJobKeyFromMeta,
} from '@runstreak/shared';
import type { FastifyInstance } from 'fastify';

import { classifyResult } from '../ingestion/result-classifier.js';
import { logger } from '../utils/logger.js';

interface StoredRun {
  runId: number;
  uniqueJob: string;
  tests: number;
}

export async function ingestionRoutes(fastify: FastifyInstance) {
  // POST /api/runs - store one run with its test outcomes
  fastify.post('/runs', async (request, reply) => {
    const { meta, tests } = ingestRunSchema.parse(request.body);

    const outcomes: TestOutcome[] = tests.map((test) => ({
      name: test.name,
      result: classifyResult(test.result),
      reason: test.reason,
      duration: test.duration,
    }));
    const runId = await fastify.stores.results.storeRun(meta, outcomes);
    const uniqueJob = uniqueJobKeyFromMeta(meta);

    logger.info({ runId, uniqueJob, tests: outcomes.length }, 'Stored test run');

    const response: ApiResponse<StoredRun> = {
      success: true,
      data: { runId, uniqueJob, tests: outcomes.length },
    };
    return reply.status(201).send(response);
  });

  // POST /api/commits - store a segment of a branch's commit chain
  fastify.post('/commits', async (request, reply) => {
    const { repo, branch, commits } = ingestCommitsSchema.parse(request.body);

    await fastify.stores.commits.storeCommits(repo, branch, commits);
    logger.info({ repo, branch, commits: commits.length }, 'Stored commits');

    const response: ApiResponse<{ commits: number }> = {
      success: true,
      data: { commits: commits.length },
    };
    return reply.status(201).send(response);
  });
}
