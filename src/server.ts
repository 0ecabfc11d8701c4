import './instrumentation'; // Must be first: loads .env and initializes LangFuse tracing
import { loadConfig, type AppConfig } from './config';
import { createApp, createServices } from './app';
import { closePool } from './db/pg-client';
import { flushTraces } from './instrumentation';
import { modelName } from './agents/llm';
import { ConfigurationError } from './utils/errors';

function start(): void {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const services = createServices(config);
  const app = createApp(services);

  const PORT = parseInt(process.env.PORT || '3001', 10);
  const HOST = process.env.HOST || '0.0.0.0';

  const server = app.listen(PORT, HOST, () => {
    console.log(`🚀 Server running on ${HOST}:${PORT}`);
    console.log(`🤖 Model: ${config.llm.provider} / ${modelName(config.llm)}`);
    console.log(`📊 Health check: http://localhost:${PORT}/health`);
    console.log(`📈 Job status: http://localhost:${PORT}/api/v1/job-status`);

    services.scheduler?.start({ runImmediately: true });
  });

  const shutdown = async () => {
    console.log('Shutting down gracefully...');
    server.close();
    await services.scheduler?.shutdown();
    await flushTraces();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

start();
