// Configuration
import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError } from '../utils/errors.js';

dotenv.config();

// Configuration schema with validation
const ConfigSchema = z.object({
  // OpenAI collaborators (embeddings, rewordings, QA pair generation)
  openai: z.object({
    apiKey: z.string().optional(),
    embeddingModel: z.string().min(1).default('text-embedding-3-small'),
    rewordingModel: z.string().min(1).default('gpt-4o-mini'),
    qaPairsModel: z.string().min(1).default('gpt-4o-mini'),
  }),

  // Persistent state
  store: z.object({
    dbDir: z.string().min(1).default('./data'),
    collectionName: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, 'collection name may only contain letters, digits, "_" and "-"')
      .default('qa_kb'),
    metric: z.enum(['cosine', 'l2']).default('cosine'),
  }),

  // Retrieval defaults
  retrieval: z.object({
    nResults: z.number().int().positive().default(5),
    numRewordings: z.number().int().min(0).default(0),
    minSimilarity: z.number().default(0.3),
  }),

  // Application Settings
  app: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function parseIntFromEnv(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number.parseInt(value, 10);
}

function parseFloatFromEnv(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number.parseFloat(value);
}

function orUndefined(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

/**
 * Build a validated configuration from environment variables.
 * Unset variables fall back to the schema defaults.
 *
 * @throws ConfigError listing every invalid setting
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    openai: {
      apiKey: orUndefined(env.OPENAI_API_KEY),
      embeddingModel: orUndefined(env.EMBEDDING_MODEL_NAME),
      rewordingModel: orUndefined(env.REWORDING_MODEL_NAME),
      qaPairsModel: orUndefined(env.QA_PAIRS_MODEL_NAME),
    },
    store: {
      dbDir: orUndefined(env.DB_DIR),
      collectionName: orUndefined(env.DEFAULT_COLLECTION_NAME),
      metric: orUndefined(env.VECTOR_METRIC),
    },
    retrieval: {
      nResults: parseIntFromEnv(env.RAG_MAX_RESULTS),
      numRewordings: parseIntFromEnv(env.RAG_NUM_REWORDINGS),
      minSimilarity: parseFloatFromEnv(env.RAG_MIN_SIMILARITY),
    },
    app: {
      logLevel: orUndefined(env.LOG_LEVEL),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}

/**
 * The OpenAI key, or a ConfigError when the OpenAI-backed collaborators are
 * requested without one.
 */
export function requireOpenAIKey(config: Config): string {
  if (!config.openai.apiKey) {
    throw new ConfigError(['openai.apiKey: OPENAI_API_KEY is required']);
  }
  return config.openai.apiKey;
}
