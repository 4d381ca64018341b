import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import defaultConfig from './default.json';
import { errorMessage } from '../core/utils';

export class SetupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SetupError';
  }
}

const fraction = z.number().min(0).max(1);

export const pipelineConfigSchema = z
  .object({
    llm: z.object({
      provider: z.enum(['stub', 'openai']),
      model: z.string().min(1),
      premiumModel: z.string().min(1),
      baseUrl: z.string().url(),
      apiKey: z.string().optional()
    }),
    risk: z.object({
      maxPositionSize: fraction,
      maxPortfolioRisk: fraction,
      maxSectorConcentration: fraction
    }),
    sizing: z.object({
      minPositionFraction: fraction,
      maxPositionFraction: fraction
    }),
    portfolio: z.object({
      totalValue: z.number().positive(),
      currentVar: z.number().min(0),
      sectorExposures: z.record(z.string(), z.number().min(0))
    }),
    analysis: z.object({
      concurrent: z.boolean(),
      headlineLimit: z.number().int().min(0)
    }),
    debate: z.object({
      rounds: z.number().int().min(1).max(10)
    }),
    marketData: z.object({
      cacheTtlSeconds: z.number().min(0)
    }),
    executionAdvisor: z.object({
      enabled: z.boolean(),
      endpoint: z.string().url(),
      timeoutMs: z.number().int().positive()
    }),
    broker: z.object({
      slippageBps: z.number().min(0),
      commissionPerTradeUSD: z.number().min(0)
    }),
    storage: z.object({
      episodicStoreFile: z.string().min(1),
      ledgerFile: z.string().min(1)
    }),
    ui: z.object({
      port: z.number().int().min(0),
      bind: z.string().min(1)
    })
  })
  .refine((cfg) => cfg.sizing.minPositionFraction <= cfg.sizing.maxPositionFraction, {
    message: 'sizing.minPositionFraction must not exceed sizing.maxPositionFraction',
    path: ['sizing']
  });

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export type ConfigOverrides = { [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]> };

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const deepMerge = (base: unknown, patch: unknown): unknown => {
  if (!isPlainObject(base) || !isPlainObject(patch)) {
    return patch === undefined ? base : patch;
  }
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
};

const parseBool = (raw: string | undefined): boolean | undefined => {
  if (raw === undefined || raw === '') return undefined;
  return raw.toLowerCase() === 'true' || raw === '1';
};

const parseNumber = (raw: string | undefined): number | undefined => {
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
};

export const envOverrides = (env: NodeJS.ProcessEnv): PlainObject => ({
  llm: {
    provider: env.LLM_PROVIDER?.toLowerCase() || undefined,
    model: env.OPENAI_MODEL || undefined,
    apiKey: env.OPENAI_API_KEY || env.LLM_API_KEY || undefined,
    baseUrl: env.OPENAI_BASE_URL || undefined
  },
  analysis: { concurrent: parseBool(env.ENABLE_CONCURRENT_ANALYSIS) },
  debate: { rounds: parseNumber(env.MAX_DEBATE_ROUNDS) },
  executionAdvisor: {
    enabled: parseBool(env.EXECUTION_ADVISOR_ENABLED),
    endpoint: env.EXECUTION_ADVISOR_ENDPOINT || undefined
  },
  storage: {
    episodicStoreFile: env.EPISODIC_STORE_FILE || undefined,
    ledgerFile: env.LEDGER_FILE || undefined
  },
  ui: { port: parseNumber(env.UI_PORT), bind: env.UI_BIND || undefined }
});

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

/**
 * Builds the run configuration once: defaults, then an optional JSON file,
 * then environment variables, then explicit overrides.
 *
 * Throws SetupError when the result is invalid or a required credential is
 * missing, so nothing downstream starts with a half-built configuration.
 */
export const loadConfig = (options: LoadConfigOptions = {}): PipelineConfig => {
  let raw: unknown = defaultConfig;
  if (options.configPath) {
    const filePath = path.resolve(options.configPath);
    if (!fs.existsSync(filePath)) {
      throw new SetupError(`Config file not found: ${filePath}`);
    }
    try {
      raw = deepMerge(raw, JSON.parse(fs.readFileSync(filePath, 'utf-8')));
    } catch (err) {
      throw new SetupError(`Config file ${filePath} is not valid JSON: ${errorMessage(err)}`);
    }
  }
  raw = deepMerge(raw, envOverrides(options.env ?? {}));
  raw = deepMerge(raw, options.overrides ?? {});

  const result = pipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new SetupError(`Invalid configuration: ${errors.join('; ')}`);
  }
  const config = result.data;
  if (config.llm.provider === 'openai' && !config.llm.apiKey) {
    throw new SetupError('LLM_PROVIDER=openai but OPENAI_API_KEY is not set.');
  }
  return config;
};
