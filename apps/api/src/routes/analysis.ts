import { type AnalysisThresholds, type ApiResponse, hoursBefore, type JobAnalysis, type StreakMap } from '@runstreak/shared';
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import type { ReportSettings } from '../config/index.js';
import { renderReport } from '../reports/html-report.js';
import { formatJobReport } from '../reports/text-report.js';

export interface AnalysisRoutesOptions {
  thresholds: AnalysisThresholds;
  report: ReportSettings;
}

const jobsQuerySchema = z.object({
  repo: z.string().min(1),
  hours: z.coerce.number().int().positive().optional(),
});

const analysisQuerySchema = z.object({
  uniqueJob: z.string().min(1),
});

const reportQuerySchema = z.object({
  repo: z.string().min(1),
});

interface SerializedStreakMap {
  failing: Record<string, number>;
  pending: Record<string, number>;
}

type SerializedAnalysis = Omit<JobAnalysis, 'streaks'> & {
  streaks: SerializedStreakMap[];
  report: string[];
};

function serializeStreakMap(map: StreakMap): SerializedStreakMap {
  return {
    failing: Object.fromEntries(map.failing),
    pending: Object.fromEntries(map.pending),
  };
}

export const analysisRoutes: FastifyPluginAsync<AnalysisRoutesOptions> = async (fastify, options) => {
  // GET /api/jobs - unique jobs of a repository with recent runs
  fastify.get('/jobs', async (request) => {
    const { repo, hours } = jobsQuerySchema.parse(request.query);
    const sinceTime = hoursBefore(hours ?? options.thresholds.analysisHours);
    const jobs = await fastify.stores.results.listUniqueJobs(repo, sinceTime);

    const response: ApiResponse<{ repo: string; sinceTime: number; jobs: string[] }> = {
      success: true,
      data: { repo, sinceTime, jobs },
    };
    return response;
  });

  // GET /api/jobs/analysis - flaky and permanently failing tests of one unique job
  fastify.get('/jobs/analysis', async (request) => {
    const { uniqueJob } = analysisQuerySchema.parse(request.query);
    const analysis = await fastify.detectionEngine.analyzeUniqueJob(uniqueJob);

    const response: ApiResponse<SerializedAnalysis> = {
      success: true,
      data: {
        ...analysis,
        streaks: analysis.streaks.map(serializeStreakMap),
        report: formatJobReport(analysis),
      },
    };
    return response;
  });

  // GET /api/report - HTML failure grid over all unique jobs of a repository
  fastify.get('/report', async (request, reply) => {
    const { repo } = reportQuerySchema.parse(request.query);
    const analyses = await fastify.detectionEngine.analyzeRepository(repo);
    const html = renderReport(repo, analyses, { thresholds: options.thresholds, settings: options.report });

    return reply.type('text/html; charset=utf-8').send(html);
  });
};
