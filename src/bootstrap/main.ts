import { loadConfig, type AppConfigRequired } from '../infra/config/config.js';
import { createLogger, type Logger } from '../infra/logger/logger.js';
import { openChatStore, type ChatStore } from '../core/storage/index.js';
import { OpenAICompatibleClient } from '../core/llm/openaiClient.js';
import type { CompletionClient } from '../core/llm/types.js';
import { DigestPipeline } from '../core/digest/DigestPipeline.js';
import { ActivityAnalytics } from '../core/analytics/ActivityAnalytics.js';
import { ContentStrategy } from '../core/analytics/ContentStrategy.js';
import { IngestionService } from '../core/ingest/IngestionService.js';
import { IngestionPool } from '../core/ingest/IngestionPool.js';
import { TelegramAdapter } from '../adapter/telegram/TelegramAdapter.js';
import { ApiController } from '../adapter/http/ApiController.js';
import { HttpServer } from '../adapter/http/HttpServer.js';

export interface Application {
  logger: Logger;
  store: ChatStore;
  pool: IngestionPool;
  stop(): Promise<void>;
}

export async function start(cfg: AppConfigRequired = loadConfig()): Promise<Application> {
  const logger = createLogger(cfg);
  logger.info('bootstrap', `Starting ${cfg.app.name} in ${cfg.app.env}`);

  const store = await openChatStore(cfg.database, logger);

  // Initialize completion client if enabled
  let completion: CompletionClient | null = null;
  if (cfg.llm.enabled && cfg.llm.apiKey) {
    logger.info('bootstrap', `Initializing LLM (${cfg.llm.model})...`);
    completion = new OpenAICompatibleClient(logger, {
      baseUrl: cfg.llm.baseUrl,
      apiKey: cfg.llm.apiKey,
      model: cfg.llm.model,
      temperature: cfg.llm.temperature,
    });
  } else {
    logger.warn('bootstrap', 'LLM not configured - digests, strategy reports and activity comments are off');
  }

  const digest = completion
    ? new DigestPipeline(store, completion, logger, {
        settings: cfg.digest,
        timezone: cfg.database.timezone,
        timeoutMs: cfg.llm.timeoutMs,
      })
    : null;
  const strategy = completion
    ? new ContentStrategy(store, completion, logger, { timezone: cfg.database.timezone })
    : null;
  const analytics = new ActivityAnalytics(store, completion, logger, {
    timezone: cfg.database.timezone,
    timeoutMs: cfg.llm.timeoutMs,
  });

  const ingestion = new IngestionService(store, logger);
  const pool = new IngestionPool((event) => ingestion.ingest(event), logger, cfg.ingest);

  let telegram: TelegramAdapter | null = null;
  if (cfg.telegram.enabled && cfg.telegram.token) {
    logger.info('bootstrap', 'Starting Telegram adapter...');
    telegram = new TelegramAdapter(cfg.telegram.token, pool, logger);
    telegram.start();
  } else {
    logger.warn('bootstrap', 'Telegram adapter disabled (missing token or config)');
  }

  let http: HttpServer | null = null;
  if (cfg.http.enabled) {
    const controller = new ApiController({
      store,
      analytics,
      digest,
      strategy,
      timezone: cfg.database.timezone,
      logger,
    });
    http = new HttpServer(controller, logger, cfg.http.port);
    await http.start();
  }

  // Transport first, then the queue it feeds, then storage
  const stop = async (): Promise<void> => {
    logger.info('bootstrap', 'Shutting down...');
    await telegram?.stop();
    await http?.stop();
    await pool.stop();
    await store.close();
    logger.info('bootstrap', 'Shutdown complete');
  };

  return { logger, store, pool, stop };
}
