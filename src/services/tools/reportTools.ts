/**
 * Report tools, one set per deployment mode.
 *
 * plain      → write_weekly_report
 * streaming  → write_weekly_report_sse, get_connected_clients
 */

import { z } from 'zod';
import type { ServerMode } from '../../config/env';
import type { PublishReportResult } from '../../types/report';
import type { ReportService } from '../report/reportService';
import { ToolRegistry } from './registry';
import type { ToolDefinition } from './types';

export const reportInputSchema = z.object({
  content: z.string({ error: 'content must be a string' }),
});

export const emptyInputSchema = z.object({});

/**
 * Tool results keep the snake_case keys tool clients already read
 * (`clients_notified`, `connected_clients`).
 */
export type ReportToolOutput =
  | {
      success: true;
      message: string;
      reportId: string;
      filename: string;
      filepath: string;
      clients_notified?: number;
    }
  | { success: false; error: string; code: string };

export interface ConnectedClientsOutput {
  success: true;
  connected_clients: number;
}

function toToolOutput(result: PublishReportResult, message: string, withCount: boolean): ReportToolOutput {
  if (!result.success) {
    return result;
  }
  return {
    success: true,
    message,
    reportId: result.reportId,
    filename: result.filename,
    filepath: result.filepath,
    ...(withCount ? { clients_notified: result.subscribersNotified } : {}),
  };
}

export function writeReportTool(
  service: ReportService,
): ToolDefinition<typeof reportInputSchema, ReportToolOutput> {
  return {
    name: 'write_weekly_report',
    description: 'Write a weekly report to a text file in the reports directory',
    inputSchema: reportInputSchema,
    async execute({ content }) {
      return toToolOutput(await service.writeReport(content), 'Weekly report saved successfully', false);
    },
  };
}

export function writeReportAndNotifyTool(
  service: ReportService,
): ToolDefinition<typeof reportInputSchema, ReportToolOutput> {
  return {
    name: 'write_weekly_report_sse',
    description: 'Write a weekly report and notify connected clients via SSE',
    inputSchema: reportInputSchema,
    async execute({ content }) {
      return toToolOutput(
        await service.publishReport(content),
        'Weekly report saved successfully and clients notified',
        true,
      );
    },
  };
}

export function connectedClientsTool(
  service: ReportService,
): ToolDefinition<typeof emptyInputSchema, ConnectedClientsOutput> {
  return {
    name: 'get_connected_clients',
    description: 'Get the number of connected SSE clients',
    inputSchema: emptyInputSchema,
    async execute() {
      return { success: true, connected_clients: service.subscriberCount() };
    },
  };
}

export function createReportToolRegistry(service: ReportService, mode: ServerMode): ToolRegistry {
  const registry = new ToolRegistry();
  if (mode === 'plain') {
    registry.register(writeReportTool(service));
  } else {
    registry.register(writeReportAndNotifyTool(service));
    registry.register(connectedClientsTool(service));
  }
  return registry;
}
