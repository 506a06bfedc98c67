import { DEFAULT_ANALYSIS_THRESHOLDS, TestResult } from '@runstreak/shared';
import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { buildApp } from '../../app.js';
import { StorageError } from '../../errors.js';
import { REPO, UNIQUE_JOB } from '../../__tests__/mocks/job-runs.js';
import { createMemoryStores } from '../../__tests__/mocks/memory-stores.js';

const REPORT = { oldJobHours: 72, disabledJobHours: 336 };

function runPayload(runid: string, tests: { name: string; result: string | number }[]) {
  return {
    meta: {
      account: 'acme',
      checkrepo: REPO,
      origin: 'gha',
      uniquejobname: 'linux',
      runid,
      runtriggertime: Math.floor(Date.now() / 1000) - 60,
      url: `https://ci.example.com/runs/${runid}`,
      testresult: 'failure',
    },
    tests,
  };
}

describe('API routes', () => {
  let app: FastifyInstance;
  let stores: ReturnType<typeof createMemoryStores>;

  beforeEach(async () => {
    stores = createMemoryStores();
    app = await buildApp({ stores, thresholds: DEFAULT_ANALYSIS_THRESHOLDS, branch: 'main', report: REPORT });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /health', () => {
    it('should report a healthy service', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', database: 'connected' });
    });

    it('should report a database that does not answer', async () => {
      const degraded = await buildApp({
        stores,
        thresholds: DEFAULT_ANALYSIS_THRESHOLDS,
        ping: () => Promise.reject(new Error('connection refused')),
      });

      const response = await degraded.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ status: 'degraded', database: 'disconnected' });
      await degraded.close();
    });
  });

  describe('POST /api/runs', () => {
    it('should store a run with classified outcomes', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/runs',
        payload: runPayload('1', [
          { name: 't1', result: 'ok' },
          { name: 't2', result: 'FAIL' },
        ]),
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({ success: true, data: { runId: 1, uniqueJob: UNIQUE_JOB, tests: 2 } });
      expect((await stores.results.getTestOutcomes(1)).map((outcome) => outcome.result)).toEqual([
        TestResult.Pass,
        TestResult.Fail,
      ]);
      expect(await stores.results.getRunMetadata(1)).toMatchObject({ runid: '1', origin: 'gha' });
    });

    it('should reject a run without an origin', async () => {
      const payload = runPayload('1', []);
      const response = await app.inject({
        method: 'POST',
        url: '/api/runs',
        payload: { ...payload, meta: { ...payload.meta, origin: '' } },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'Validation Error' });
    });
  });

  describe('POST /api/commits', () => {
    it('should store a commit chain segment', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/commits',
        payload: {
          repo: REPO,
          branch: 'main',
          commits: [
            { commitHash: 'aaaa1111', commitTime: 100 },
            { commitHash: 'bbbb2222', prevHash: 'aaaa1111', commitTime: 200 },
          ],
        },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({ success: true, data: { commits: 2 } });
      const chain = await stores.commits.commitsAfter(REPO, 'main', 'aaaa');
      expect(chain.map((commit) => commit.commitHash)).toEqual(['aaaa1111', 'bbbb2222']);
    });

    it('should reject a hash that is not hexadecimal', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/commits',
        payload: { repo: REPO, branch: 'main', commits: [{ commitHash: 'not-a-hash', commitTime: 1 }] },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('analysis', () => {
    beforeEach(async () => {
      await app.inject({ method: 'POST', url: '/api/runs', payload: runPayload('1', [{ name: 't1', result: 'fail' }]) });
    });

    it('should list the unique jobs of a repository', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/jobs',
        query: { repo: REPO, hours: '1' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.jobs).toEqual([UNIQUE_JOB]);
    });

    it('should analyze one unique job', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/jobs/analysis',
        query: { uniqueJob: UNIQUE_JOB },
      });

      expect(response.statusCode).toBe(200);
      const { data } = response.json();
      expect(data.runs).toHaveLength(1);
      expect(data.streaks).toEqual([{ failing: { t1: 1 }, pending: {} }]);
      expect(data.flakiness).toEqual({ status: 'insufficient-data', availableBuilds: 1, requiredBuilds: 10 });
      expect(data.permafails).toEqual([]);
      expect(data.report[0]).toBe(`Analyzing unique job ${UNIQUE_JOB}`);
    });

    it('should require a unique job', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/jobs/analysis' });

      expect(response.statusCode).toBe(400);
    });

    it('should render the HTML report', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/report', query: { repo: REPO } });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.payload).toContain('<tr><td class="jobname">[gha] linux</td>');
      expect(response.payload).toContain('<a href="https://ci.example.com/runs/1">*1</a></td>');
    });

    it('should answer 503 when the store fails', async () => {
      vi.spyOn(stores.results, 'listUniqueJobs').mockRejectedValue(new StorageError('List unique jobs failed'));

      const response = await app.inject({ method: 'GET', url: '/api/jobs', query: { repo: REPO } });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ errorType: 'STORAGE', message: 'List unique jobs failed' });
    });
  });
});
