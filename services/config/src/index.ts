import { z } from 'zod';
import { ClassifyOnError, Provider } from '@sector-report/schemas';
import { ConfigError } from '@sector-report/pipeline-core';
import { DEFAULT_MODELS } from '@sector-report/llm';

const API_KEY_VARS: Record<Provider, 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY'> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY'
};

// blank values count as unset, as they do in a .env with `KEY=`
const optional = z.string().trim().optional().transform((v) => (v ? v : undefined));

const Env = z.object({
  LLM_PROVIDER: optional.pipe(Provider.default('openai')),
  OPENAI_API_KEY: optional,
  ANTHROPIC_API_KEY: optional,
  SECTOR_MODEL: optional,
  RECOMMENDATION_MODEL: optional,
  CONSTITUENTS_FILE: optional.transform((v) => v ?? 'nasdaq100.csv'),
  PRICE_CHANGE_FILE: optional.transform((v) => v ?? 'nasdaq100_price_change.csv'),
  INDEX_NAME: optional.transform((v) => v ?? 'Nasdaq-100'),
  CLASSIFY_ON_ERROR: optional.pipe(ClassifyOnError.default('abort')),
  // createLogger falls back to info on an unknown level; the error is raised here
  LOG_LEVEL: optional.pipe(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'))
});

export type AppConfig = {
  provider: Provider;
  apiKey: string;
  models: { sector: string; recommendation: string };
  files: { constituents: string; priceChange: string };
  indexName: string;
  onClassifyError: ClassifyOnError;
};

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = Env.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid configuration: ${issues}`, { cause: parsed.error });
  }
  const e = parsed.data;
  const keyVar = API_KEY_VARS[e.LLM_PROVIDER];
  const apiKey = e[keyVar];
  if (!apiKey) {
    throw new ConfigError(`${keyVar} not found in environment variables. Please check your .env file.`);
  }
  return {
    provider: e.LLM_PROVIDER,
    apiKey,
    models: {
      sector: e.SECTOR_MODEL ?? DEFAULT_MODELS[e.LLM_PROVIDER],
      recommendation: e.RECOMMENDATION_MODEL ?? DEFAULT_MODELS[e.LLM_PROVIDER]
    },
    files: { constituents: e.CONSTITUENTS_FILE, priceChange: e.PRICE_CHANGE_FILE },
    indexName: e.INDEX_NAME,
    onClassifyError: e.CLASSIFY_ON_ERROR
  };
}
