/**
 * Unit Tests: ReportService
 */

import { promises as fs } from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EmptyContentError } from '../../../src/errors';
import { createReportBroadcaster, type ReportBroadcaster } from '../../../src/services/notification/reportBroadcaster';
import { SubscriberRegistry } from '../../../src/services/notification/subscriberRegistry';
import { ReportService } from '../../../src/services/report/reportService';
import { ReportStore } from '../../../src/services/report/reportStore';
import { fixedClock, makeTempDir, removeDir } from '../../fixtures/factories';

describe('ReportService', () => {
  let dir: string;
  let registry: SubscriberRegistry;
  let broadcaster: ReportBroadcaster;
  let service: ReportService;

  beforeEach(async () => {
    dir = await makeTempDir();
    registry = new SubscriberRegistry();
    broadcaster = createReportBroadcaster(registry);
    const store = new ReportStore({ dir, clock: fixedClock(new Date(2024, 2, 30, 10, 15, 0)) });
    service = new ReportService(store, broadcaster);
  });

  afterEach(async () => {
    broadcaster.close();
    await removeDir(dir);
  });

  describe('publishReport', () => {
    it('saves the report and wakes waiting subscribers', async () => {
      const sub = broadcaster.subscribe();
      const pending = sub.next();

      const result = await service.publishReport('Report A');

      expect(result).toEqual({
        success: true,
        reportId: 'weekly_report_20240330_101500',
        filename: 'weekly_report_20240330_101500.txt',
        filepath: path.join(dir, 'weekly_report_20240330_101500.txt'),
        subscribersNotified: 1,
      });
      expect(await pending).toEqual({
        done: false,
        value: { reportId: 'weekly_report_20240330_101500', content: 'Report A' },
      });
    });

    it('publishes even with nobody connected', async () => {
      const result = await service.publishReport('Report A');

      expect(result).toMatchObject({ success: true, subscribersNotified: 0 });
      expect(broadcaster.current()?.value.content).toBe('Report A');
    });

    it('reports empty content as a failed result and publishes nothing', async () => {
      const result = await service.publishReport('');

      expect(result).toEqual({ success: false, error: 'Report content is required', code: 'EMPTY_CONTENT' });
      expect(broadcaster.generationCount()).toBe(0);
      expect(await fs.readdir(dir)).toEqual([]);
    });

    it('reports storage failures as a failed result and publishes nothing', async () => {
      const blocker = path.join(dir, 'file');
      await fs.writeFile(blocker, 'x');
      const broken = new ReportService(new ReportStore({ dir: path.join(blocker, 'reports') }), broadcaster);

      const result = await broken.publishReport('Report A');

      expect(result).toMatchObject({ success: false, code: 'STORAGE_ERROR' });
      expect(broadcaster.generationCount()).toBe(0);
    });
  });

  describe('writeReport', () => {
    it('saves without notifying', async () => {
      broadcaster.subscribe();

      const result = await service.writeReport('Report A');

      expect(result).toMatchObject({ success: true, subscribersNotified: 0 });
      expect(broadcaster.generationCount()).toBe(0);
    });
  });

  describe('submit', () => {
    it('throws EmptyContentError for missing content', async () => {
      await expect(service.submit(undefined, { notify: true })).rejects.toBeInstanceOf(EmptyContentError);
    });

    it('returns the saved report and the census at publish time', async () => {
      broadcaster.subscribe();
      broadcaster.subscribe();

      const submitted = await service.submit('Report A', { notify: true });

      expect(submitted.notified).toBe(true);
      expect(submitted.subscribersNotified).toBe(2);
      expect(submitted.report.createdAt).toEqual(new Date(2024, 2, 30, 10, 15, 0));
    });
  });

  it('subscriberCount mirrors the registry', () => {
    broadcaster.subscribe();
    expect(service.subscriberCount()).toBe(1);
  });
});
