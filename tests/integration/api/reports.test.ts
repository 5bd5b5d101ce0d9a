/**
 * Integration Tests: report endpoints
 */

import { promises as fs } from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { createApp, type AppContext } from '../../../src/app';
import { buildTestContext, fixedClock, makeTempDir, removeDir } from '../../fixtures/factories';

describe('report endpoints', () => {
  let dir: string;
  let ctx: AppContext;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    ctx.broadcaster.close();
    await removeDir(dir);
  });

  describe('POST /api/reports (streaming mode)', () => {
    beforeEach(() => {
      ctx = buildTestContext({ dir, clock: fixedClock(new Date(2024, 2, 30, 10, 15, 0)) });
    });

    it('saves the report and notifies subscribers', async () => {
      ctx.broadcaster.subscribe();

      const response = await request(createApp(ctx)).post('/api/reports').send({ content: 'Report A' });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        success: true,
        reportId: 'weekly_report_20240330_101500',
        filename: 'weekly_report_20240330_101500.txt',
        filepath: path.join(dir, 'weekly_report_20240330_101500.txt'),
        createdAt: new Date(2024, 2, 30, 10, 15, 0).toISOString(),
        notified: true,
        subscribersNotified: 1,
      });
      expect(await fs.readFile(path.join(dir, 'weekly_report_20240330_101500.txt'), 'utf8')).toBe('Report A');
      expect(ctx.broadcaster.current()?.value).toEqual({
        reportId: 'weekly_report_20240330_101500',
        content: 'Report A',
      });
    });

    it.each([
      ['empty', { content: '' }],
      ['missing', {}],
      ['null', { content: null }],
    ])('declines %s content with EMPTY_CONTENT', async (_label, body) => {
      const response = await request(createApp(ctx)).post('/api/reports').send(body);

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Report content is required');
      expect(response.body.code).toBe('EMPTY_CONTENT');
      expect(ctx.broadcaster.generationCount()).toBe(0);
      expect(await fs.readdir(dir)).toEqual([]);
    });

    it('rejects non-string content with VALIDATION_ERROR', async () => {
      const response = await request(createApp(ctx)).post('/api/reports').send({ content: 42 });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: [{ field: 'content', message: 'content must be a string' }],
      });
    });

    it('answers 500 STORAGE_ERROR when the report cannot be written', async () => {
      const blocker = path.join(dir, 'file');
      await fs.writeFile(blocker, 'x');
      ctx = buildTestContext({ dir: path.join(blocker, 'reports') });

      const response = await request(createApp(ctx)).post('/api/reports').send({ content: 'Report A' });

      expect(response.status).toBe(500);
      expect(response.body.code).toBe('STORAGE_ERROR');
      expect(response.body.error).toMatch(/^Failed to save weekly report: /);
      expect(ctx.broadcaster.generationCount()).toBe(0);
    });
  });

  describe('POST /api/reports (plain mode)', () => {
    it('saves without notifying', async () => {
      ctx = buildTestContext({ dir, mode: 'plain', clock: fixedClock(new Date(2024, 2, 30, 10, 15, 0)) });
      ctx.broadcaster.subscribe();

      const response = await request(createApp(ctx)).post('/api/reports').send({ content: 'Report A' });

      expect(response.status).toBe(201);
      expect(response.body.notified).toBe(false);
      expect(response.body.subscribersNotified).toBe(0);
      expect(ctx.broadcaster.generationCount()).toBe(0);
    });
  });

  describe('GET /api/reports/latest', () => {
    it('answers 404 before anything is published', async () => {
      ctx = buildTestContext({ dir });

      const response = await request(createApp(ctx)).get('/api/reports/latest');

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('No report has been published yet');
      expect(response.body.code).toBe('NOT_FOUND');
    });

    it('returns the newest published report', async () => {
      ctx = buildTestContext({
        dir,
        clock: fixedClock(new Date(2024, 2, 30, 10, 15, 0), new Date(2024, 2, 30, 10, 16, 0)),
      });
      const app = createApp(ctx);
      await request(app).post('/api/reports').send({ content: 'Report A' });
      await request(app).post('/api/reports').send({ content: 'Report B' });

      const response = await request(app).get('/api/reports/latest');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        generation: 2,
        reportId: 'weekly_report_20240330_101600',
        content: 'Report B',
      });
    });
  });

  describe('GET /api/subscribers', () => {
    it('lists connected subscribers in join order', async () => {
      ctx = buildTestContext({ dir });
      const first = ctx.broadcaster.subscribe();
      const second = ctx.broadcaster.subscribe();

      const response = await request(createApp(ctx)).get('/api/subscribers');

      expect(response.status).toBe(200);
      expect(response.body.count).toBe(2);
      expect(response.body.subscribers.map((s: { id: string }) => s.id)).toEqual([first.id, second.id]);
    });

    it('does not exist in plain mode', async () => {
      ctx = buildTestContext({ dir, mode: 'plain' });

      const app = createApp(ctx);
      const census = await request(app).get('/api/subscribers');
      const stream = await request(app).get('/api/reports/stream');

      expect(census.status).toBe(404);
      expect(stream.status).toBe(404);
      expect(stream.body.error).toBe('Cannot GET /api/reports/stream');
    });
  });
});
