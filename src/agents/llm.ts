import { AzureChatOpenAI, ChatOpenAI } from '@langchain/openai';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { CallbackHandler } from '@langfuse/langchain';
import type { LlmConfig } from '../config';

/**
 * LangFuse handler options
 */
export interface LangfuseHandlerOptions {
  sessionId?: string;
  tags?: string[];
}

export function isLangfuseConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.LANGFUSE_PUBLIC_KEY && env.LANGFUSE_SECRET_KEY);
}

/**
 * Create a LangFuse callback handler for tracing LLM calls, or null when
 * LangFuse credentials are absent. Spans are exported by the processor
 * registered in instrumentation.ts.
 */
export function createLangfuseHandler(options?: LangfuseHandlerOptions): CallbackHandler | null {
  if (!isLangfuseConfigured()) {
    return null;
  }

  return new CallbackHandler({
    sessionId: options?.sessionId,
    tags: options?.tags ?? ['financial-news-rag'],
  });
}

export function modelName(llm: LlmConfig): string {
  return llm.provider === 'azure_openai' ? llm.deploymentName : llm.model;
}

/**
 * Build the chat model for the configured provider. Exactly one provider is
 * active per process.
 */
export function createChatModel(llm: LlmConfig): BaseChatModel {
  switch (llm.provider) {
    case 'openrouter':
      return new ChatOpenAI({
        model: llm.model,
        apiKey: llm.apiKey,
        configuration: {
          baseURL: llm.baseUrl,
          defaultHeaders: {
            'HTTP-Referer': process.env.APP_URL || 'http://localhost:3001',
            'X-Title': 'Financial News RAG',
          },
        },
        temperature: llm.temperature,
        maxTokens: llm.maxTokens,
        streaming: true,
      });

    case 'azure_openai':
      return new AzureChatOpenAI({
        azureOpenAIApiKey: llm.apiKey,
        azureOpenAIEndpoint: llm.endpoint,
        azureOpenAIApiDeploymentName: llm.deploymentName,
        azureOpenAIApiVersion: llm.apiVersion,
        temperature: llm.temperature,
        maxTokens: llm.maxTokens,
        streaming: true,
      });

    case 'ollama':
      // Ollama serves an OpenAI-compatible API under /v1 and ignores the key
      return new ChatOpenAI({
        model: llm.model,
        apiKey: 'ollama',
        configuration: { baseURL: `${llm.baseUrl.replace(/\/+$/, '')}/v1` },
        temperature: llm.temperature,
        maxTokens: llm.maxTokens,
        streaming: true,
      });
  }
}
