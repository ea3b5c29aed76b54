import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const booleanString = z.enum(['true', 'false']);

// Environment variables schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Reasoning service
  ANTHROPIC_API_KEY: z.string().optional(),
  AI_MODEL: z.string().default('claude-3-5-sonnet-20241022'),
  AI_MAX_TOKENS: z.coerce.number().int().positive().default(64),
  AI_TEMPERATURE: z.coerce.number().min(0).max(1).default(0),
  AI_TIMEOUT: z.coerce.number().int().positive().default(30000),
  AI_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(1),

  // Classifier
  CLASSIFIER_USE_LLM: booleanString.default('true'),
  CLASSIFIER_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).default(0),
  CLASSIFIER_AXIS_ORDER: z.string().optional(),
  AXIS_KEYWORDS_PATH: z.string().optional(),
  MAX_CONCURRENT_CLASSIFICATIONS: z.coerce.number().int().min(1).default(4),
});

// Parse and validate environment variables
const env = envSchema.parse(process.env);

const parseList = (value?: string) =>
  value
    ?.split(',')
    .map((entry) => entry.trim())
    .filter(Boolean) ?? [];

// Export typed configuration
export const config = {
  env: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,

  ai: {
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    model: env.AI_MODEL,
    maxTokens: env.AI_MAX_TOKENS,
    temperature: env.AI_TEMPERATURE,
    timeoutMs: env.AI_TIMEOUT,
    retryAttempts: env.AI_RETRY_ATTEMPTS,
  },

  classification: {
    useLlm: env.CLASSIFIER_USE_LLM === 'true',
    confidenceThreshold: env.CLASSIFIER_CONFIDENCE_THRESHOLD,
    // Empty means "use the default processing order"
    axisOrder: parseList(env.CLASSIFIER_AXIS_ORDER),
    axisKeywordsPath: env.AXIS_KEYWORDS_PATH,
    maxConcurrent: env.MAX_CONCURRENT_CLASSIFICATIONS,
  },
};

export type AppConfig = typeof config;

export default config;
