import express, { type Express } from 'express';
import type { Pool } from 'pg';
import type { AppConfig } from './config';
import { getPool } from './db/pg-client';
import { PgVectorStore } from './db/pg-vector-store';
import { createEmbeddings } from './agents/embeddings';
import { createChatModel, createLangfuseHandler } from './agents/llm';
import { ChatModelGenerator } from './agents/answer-generator';
import { ChatModelCondenser } from './agents/question-condenser';
import { VectorIndexManager } from './search/vector-index';
import { SessionMemoryStore } from './memory/session-store';
import { ConversationalRetrievalEngine } from './engine/conversational-engine';
import { IngestionQueue } from './ingestion/queue';
import { runPipeline } from './ingestion/pipeline';
import { createScraper } from './ingestion/scraper';
import { IngestionJob } from './jobs/ingestion-job';
import { JobScheduler } from './jobs/scheduler';
import { createQueryHandler } from './api/query';
import { createStatsHandler } from './api/stats';
import { createSessionsRouter } from './api/sessions';
import { createJobStatusRouter } from './api/job-status';
import { createHealthHandler } from './api/health';
import {
  apiKeyAuth,
  corsMiddleware,
  errorHandler,
  queryRateLimiter,
  requestLogger,
  securityHeaders,
} from './api/middleware';

export interface Services {
  config: AppConfig;
  pool: Pool;
  index: VectorIndexManager;
  sessions: SessionMemoryStore;
  engine: ConversationalRetrievalEngine;
  queue: IngestionQueue;
  job: IngestionJob;
  scheduler: JobScheduler | null;
}

/**
 * Vector index over the configured Postgres collection
 */
export function createIndex(config: AppConfig): { pool: Pool; index: VectorIndexManager } {
  const pool = getPool({ connectionString: config.vectorDb.connectionString });
  const store = new PgVectorStore(pool, config.embeddings.dimensions);
  const index = new VectorIndexManager(store, createEmbeddings(config.embeddings), config.vectorDb.collectionName);
  return { pool, index };
}

export function createServices(config: AppConfig): Services {
  const { pool, index } = createIndex(config);
  const sessions = new SessionMemoryStore(config.sessions);

  const model = createChatModel(config.llm);
  const generator = new ChatModelGenerator(model, sessionId =>
    createLangfuseHandler({ sessionId, tags: ['financial-news-rag', 'query'] })
  );
  const condenser = new ChatModelCondenser(model, sessionId =>
    createLangfuseHandler({ sessionId, tags: ['financial-news-rag', 'condense'] })
  );
  const engine = new ConversationalRetrievalEngine(index, generator, sessions, {
    topK: config.rag.topK,
    retrievalType: config.rag.retrievalType,
    condenser,
  });

  const scraper = createScraper(config.scraping);
  const queue = new IngestionQueue(() => runPipeline(config.newsSources, config.chunking, index, scraper));
  const job = new IngestionJob(queue);
  const scheduler = config.jobs.ingestionEnabled ? new JobScheduler(job, config.jobs.ingestionCron) : null;

  return { config, pool, index, sessions, engine, queue, job, scheduler };
}

export function createApp(services: Services): Express {
  const app = express();

  // Trust only the first proxy so rate limiting sees client IPs
  if (process.env.NODE_ENV === 'production') {
    app.set('trust proxy', 1);
  }

  app.use(securityHeaders);
  app.use(express.json({ limit: '16kb' }));
  app.use(corsMiddleware);
  app.use(requestLogger);

  app.get('/health', createHealthHandler(services.pool, services.index));

  const api = express.Router();
  api.use(apiKeyAuth);
  api.post('/query/stream', queryRateLimiter, createQueryHandler(services.engine));
  api.get('/db/stats', createStatsHandler(services.index));
  api.use('/sessions', createSessionsRouter(services.sessions));
  api.use('/job-status', createJobStatusRouter(services.job, services.scheduler));
  app.use('/api/v1', api);

  app.use(errorHandler);
  return app;
}
