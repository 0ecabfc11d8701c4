import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_CONFIG_PATH = 'config/config.yaml';

const SourceSchema = z.object({
  name: z.string().min(1),
  baseUrl: z.string().url(),
  sections: z.array(z.string().min(1)).min(1),
  requiresRendering: z.boolean().default(false),
  enabled: z.boolean().default(true),
});

const generation = {
  temperature: z.number().min(0).max(2).default(0.2),
  maxTokens: z.number().int().positive().default(1024),
};

const LlmSchema = z.discriminatedUnion('provider', [
  z.object({
    provider: z.literal('openrouter'),
    model: z.string().min(1),
    apiKey: z.string({ required_error: 'OPENROUTER_API_KEY is not set' }).min(1),
    baseUrl: z.string().url().default(OPENROUTER_BASE_URL),
    ...generation,
  }),
  z.object({
    provider: z.literal('azure_openai'),
    apiKey: z.string({ required_error: 'AZURE_OPENAI_API_KEY is not set' }).min(1),
    endpoint: z.string({ required_error: 'AZURE_OPENAI_ENDPOINT is not set' }).url(),
    deploymentName: z.string({ required_error: 'AZURE_OPENAI_DEPLOYMENT_NAME is not set' }).min(1),
    apiVersion: z.string().default('2024-02-01'),
    ...generation,
  }),
  z.object({
    provider: z.literal('ollama'),
    model: z.string().min(1),
    baseUrl: z.string().url().default('http://localhost:11434'),
    ...generation,
  }),
]);

export const ConfigSchema = z.object({
  embeddings: z.object({
    model: z.string().min(1),
    baseUrl: z.string().url().default(OPENROUTER_BASE_URL),
    apiKey: z.string().min(1).optional(),
    dimensions: z.number().int().positive(),
  }),
  vectorDb: z.object({
    connectionString: z.string({ required_error: 'DATABASE_URL is not set' }).min(1),
    collectionName: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]{0,62}$/, 'must be a plain SQL identifier'),
  }),
  llm: LlmSchema,
  rag: z.object({
    topK: z.number().int().positive().default(5),
    retrievalType: z.enum(['similarity', 'mmr']).default('similarity'),
  }).default({}),
  chunking: z.object({
    chunkSize: z.number().int().positive().default(800),
    chunkOverlap: z.number().int().min(0).default(100),
  }).default({}).refine(c => c.chunkOverlap < c.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
  }),
  scraping: z.object({
    requestTimeoutMs: z.number().int().positive().default(15_000),
    sectionTimeoutMs: z.number().int().positive().default(120_000),
    articleDelayMs: z.number().int().min(0).default(1_000),
    maxArticlesPerSection: z.number().int().positive().default(7),
    sourceConcurrency: z.number().int().positive().default(1),
    maxRetries: z.number().int().min(1).default(2),
    renderSettleMs: z.number().int().min(0).default(3_000),
    userAgent: z.string().default('Mozilla/5.0 (compatible; FinancialNewsRAG/1.0)'),
  }).default({}),
  sessions: z.object({
    maxSessions: z.number().int().positive().default(1000),
    maxTurnsPerSession: z.number().int().positive().default(20),
    sessionTtlMs: z.number().int().min(0).default(24 * 60 * 60 * 1000),
  }).default({}),
  jobs: z.object({
    ingestionEnabled: z.boolean().default(false),
    ingestionCron: z.string().default('0 */6 * * *'),
  }).default({}),
  newsSources: z.array(SourceSchema).default([]),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type LlmConfig = z.infer<typeof LlmSchema>;
export type ScrapingConfig = AppConfig['scraping'];
export type SessionConfig = AppConfig['sessions'];

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function envValue(env: Env, key: string): string | undefined {
  const value = env[key];
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Overlay secrets and deployment-specific settings from the environment.
 * Environment values win over the file.
 */
function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const llm: Record<string, unknown> = isRecord(raw.llm) ? { ...raw.llm } : {};
  const overrides: Record<string, string | undefined> = {};

  switch (llm.provider) {
    case 'openrouter':
      overrides.apiKey = envValue(env, 'OPENROUTER_API_KEY');
      break;
    case 'azure_openai':
      overrides.apiKey = envValue(env, 'AZURE_OPENAI_API_KEY');
      overrides.endpoint = envValue(env, 'AZURE_OPENAI_ENDPOINT');
      overrides.deploymentName = envValue(env, 'AZURE_OPENAI_DEPLOYMENT_NAME');
      overrides.apiVersion = envValue(env, 'AZURE_OPENAI_API_VERSION');
      break;
    case 'ollama':
      overrides.baseUrl = envValue(env, 'OLLAMA_BASE_URL');
      break;
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) llm[key] = value;
  }

  const embeddings: Record<string, unknown> = isRecord(raw.embeddings) ? { ...raw.embeddings } : {};
  const embeddingsKey = envValue(env, 'EMBEDDINGS_API_KEY') ?? envValue(env, 'OPENROUTER_API_KEY');
  if (embeddingsKey !== undefined) embeddings.apiKey = embeddingsKey;

  const vectorDb: Record<string, unknown> = isRecord(raw.vectorDb) ? { ...raw.vectorDb } : {};
  const databaseUrl = envValue(env, 'DATABASE_URL');
  if (databaseUrl !== undefined) vectorDb.connectionString = databaseUrl;

  return { ...raw, llm, embeddings, vectorDb };
}

/**
 * Validate an already-parsed configuration document against the schema
 */
export function parseConfig(raw: unknown, env: Env = process.env): AppConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Configuration must be a mapping');
  }

  const result = ConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError('Invalid configuration', issues);
  }

  return result.data;
}

export function loadConfig(options: { path?: string; env?: Env } = {}): AppConfig {
  const env = options.env ?? process.env;
  const configPath = path.resolve(options.path ?? envValue(env, 'CONFIG_PATH') ?? DEFAULT_CONFIG_PATH);

  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(`Configuration file is not valid YAML: ${configPath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const config = parseConfig(raw, env);

  debugLogger.info('CONFIG', 'Configuration loaded', {
    path: configPath,
    provider: config.llm.provider,
    collection: config.vectorDb.collectionName,
    sources: config.newsSources.filter(s => s.enabled).map(s => s.name),
  });

  return config;
}
