import 'dotenv/config';
import type { Server } from 'http';
import { createApp, type AppContext } from './app';
import { getEnv } from './config/env';
import { setSubscriberCountSource } from './infrastructure';
import { createReportBroadcaster } from './services/notification/reportBroadcaster';
import { SubscriberRegistry } from './services/notification/subscriberRegistry';
import { ReportService } from './services/report/reportService';
import { ReportStore } from './services/report/reportStore';
import { createReportToolRegistry } from './services/tools/reportTools';
import { createLogger, errorMessage } from './utils/logger';

const logger = createLogger('server');

/** Build the broadcaster, registry, store and services for one server lifetime. */
export function buildContext(): AppContext {
  const env = getEnv();
  const store = new ReportStore({ dir: env.REPORTS_DIR, prefix: env.REPORT_FILE_PREFIX });
  const subscribers = new SubscriberRegistry();
  const broadcaster = createReportBroadcaster(subscribers);
  const reportService = new ReportService(store, broadcaster);

  return {
    mode: env.SERVER_MODE,
    store,
    subscribers,
    broadcaster,
    reportService,
    tools: createReportToolRegistry(reportService, env.SERVER_MODE),
    heartbeatMs: env.SSE_HEARTBEAT_MS,
    corsAllowedOrigins: env.CORS_ALLOWED_ORIGINS,
  };
}

async function main(): Promise<void> {
  const env = getEnv();
  const ctx = buildContext();
  await ctx.store.ensureDirectory();
  setSubscriberCountSource(() => ctx.subscribers.count());

  const app = createApp(ctx);
  const server: Server = app.listen(env.PORT, env.HOST, () => {
    logger.info(
      { host: env.HOST, port: env.PORT, mode: ctx.mode, reportsDir: ctx.store.dir },
      'Weekly report server listening',
    );
    logger.info(
      { tools: ctx.tools.list().map((t) => t.name) },
      `MCP endpoint available at http://${env.HOST}:${env.PORT}/mcp`,
    );
    if (ctx.mode === 'streaming') {
      logger.info(`SSE endpoint available at http://${env.HOST}:${env.PORT}/api/reports/stream`);
    }
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down...');
    // Ends every open stream session, which lets the server close
    ctx.broadcaster.close();
    setSubscriberCountSource(null);
    server.close((err) => {
      if (err) {
        logger.error({ error: err.message }, 'Error closing HTTP server');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error({ error: errorMessage(err) }, 'Error starting server');
    process.exit(1);
  });
}
