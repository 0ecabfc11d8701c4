import OpenAI from 'openai';
import { Embeddings, type EmbeddingsParams } from '@langchain/core/embeddings';
import type { AppConfig } from '../config';
import { debugLogger } from '../utils/debug-logger';

export const EMBEDDING_BATCH_SIZE = 100;
export const EMBEDDING_MAX_LENGTH = 8000;

export interface OpenAICompatibleEmbeddingsParams extends EmbeddingsParams {
  model: string;
  apiKey?: string;
  baseURL: string;
  dimensions?: number;
  /** Injected client, used in tests */
  client?: OpenAI;
}

function truncate(text: string): string {
  return text.length > EMBEDDING_MAX_LENGTH ? text.substring(0, EMBEDDING_MAX_LENGTH) : text;
}

/**
 * Embeddings against any OpenAI-compatible /embeddings endpoint
 * (OpenRouter, Azure, a local server)
 */
export class OpenAICompatibleEmbeddings extends Embeddings {
  private readonly model: string;
  private readonly dimensions?: number;
  private readonly client: OpenAI;

  constructor(params: OpenAICompatibleEmbeddingsParams) {
    super(params);
    this.model = params.model;
    this.dimensions = params.dimensions;
    this.client = params.client ?? new OpenAI({
      apiKey: params.apiKey ?? 'unset',
      baseURL: params.baseURL,
    });
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < documents.length; i += EMBEDDING_BATCH_SIZE) {
      const batch = documents.slice(i, i + EMBEDDING_BATCH_SIZE).map(truncate);
      const stepId = debugLogger.stepStart('EMBED', `Embedding batch ${i / EMBEDDING_BATCH_SIZE + 1}`, {
        size: batch.length,
        model: this.model,
      });

      const response = await this.caller.call(() =>
        this.client.embeddings.create({
          model: this.model,
          input: batch,
          ...(this.dimensions ? { dimensions: this.dimensions } : {}),
        })
      );

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map(item => item.embedding));
      debugLogger.stepFinish(stepId, { tokens: response.usage?.total_tokens });
    }

    return vectors;
  }

  async embedQuery(query: string): Promise<number[]> {
    const [vector] = await this.embedDocuments([query]);
    return vector;
  }
}

export function createEmbeddings(config: AppConfig['embeddings']): OpenAICompatibleEmbeddings {
  return new OpenAICompatibleEmbeddings({
    model: config.model,
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    dimensions: config.dimensions,
    maxRetries: 2,
  });
}
