import dotenv from 'dotenv';

// Load env vars before anything else
dotenv.config();

import { LangfuseSpanProcessor } from '@langfuse/otel';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { setLangfuseTracerProvider } from '@langfuse/tracing';

/**
 * Langfuse tracing over OpenTelemetry.
 *
 * The @langfuse/langchain CallbackHandler creates spans through
 * @langfuse/tracing; they are only exported when a TracerProvider carrying
 * the LangfuseSpanProcessor is registered. The provider is Langfuse-specific
 * and leaves any global OTel setup alone.
 */
export const spanProcessor =
  process.env.LANGFUSE_PUBLIC_KEY && process.env.LANGFUSE_SECRET_KEY
    ? new LangfuseSpanProcessor({
        publicKey: process.env.LANGFUSE_PUBLIC_KEY,
        secretKey: process.env.LANGFUSE_SECRET_KEY,
        baseUrl: process.env.LANGFUSE_HOST || 'https://cloud.langfuse.com',
      })
    : null;

if (spanProcessor) {
  setLangfuseTracerProvider(new NodeTracerProvider({ spanProcessors: [spanProcessor] }));
  console.log('LangFuse: TracerProvider initialized with LangfuseSpanProcessor');
}

export async function flushTraces(): Promise<void> {
  if (!spanProcessor) return;
  try {
    await spanProcessor.forceFlush();
  } catch (error) {
    console.warn('Failed to flush LangFuse traces:', error);
  }
}
