import Conf from 'conf';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { KnowledgeStoreType } from '../knowledge/factory.js';

// Zod schemas for validation
const ModelConfigSchema = z.object({
  endpoint: z.string().url(),
  apiKey: z.string(),
  model: z.string(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
});

const BenchmarkConfigSchema = z.object({
  baseUrl: z.string().url(),
  apiKey: z.string().optional(),
  benchmark: z.string().default('erc3-test'),
  workspace: z.string().default('my'),
});

const AgentSettingsSchema = z.object({
  maxSteps: z.number().int().positive().default(20),
  initialPageSize: z.number().int().min(4).default(32),
});

const CacheConfigSchema = z.object({
  provider: z.nativeEnum(KnowledgeStoreType).default(KnowledgeStoreType.LOCAL),
  dir: z.string().optional(),
});

const AppConfigSchema = z.object({
  model: ModelConfigSchema.optional(),
  benchmark: BenchmarkConfigSchema.optional(),
  agent: AgentSettingsSchema.optional(),
  cache: CacheConfigSchema.optional(),
  debug: z.boolean().optional(),
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type BenchmarkConfig = z.infer<typeof BenchmarkConfigSchema>;
export type AgentSettings = z.infer<typeof AgentSettingsSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Fully resolved settings for one process: stored values with environment
 * overrides applied and defaults filled in.
 */
export interface RuntimeConfig {
  model: ModelConfig;
  benchmark: BenchmarkConfig;
  agent: AgentSettings;
  cache: CacheConfig;
  debug: boolean;
}

export const ENV_VARS = {
  MODEL_ENDPOINT: 'NEXTSTEP_MODEL_ENDPOINT',
  MODEL_API_KEY: 'NEXTSTEP_MODEL_API_KEY',
  MODEL_NAME: 'NEXTSTEP_MODEL',
  BENCHMARK_URL: 'NEXTSTEP_BENCHMARK_URL',
  BENCHMARK_API_KEY: 'NEXTSTEP_BENCHMARK_API_KEY',
  MAX_STEPS: 'NEXTSTEP_MAX_STEPS',
  DEBUG: 'NEXTSTEP_DEBUG',
} as const;

function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Merge stored configuration with environment overrides and validate the result.
 */
export function resolveRuntimeConfig(stored: AppConfig, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const candidate = {
    model: {
      ...stored.model,
      endpoint: env[ENV_VARS.MODEL_ENDPOINT] || stored.model?.endpoint,
      apiKey: env[ENV_VARS.MODEL_API_KEY] || stored.model?.apiKey,
      model: env[ENV_VARS.MODEL_NAME] || stored.model?.model,
    },
    benchmark: {
      ...stored.benchmark,
      baseUrl: env[ENV_VARS.BENCHMARK_URL] || stored.benchmark?.baseUrl,
      apiKey: env[ENV_VARS.BENCHMARK_API_KEY] || stored.benchmark?.apiKey,
    },
    agent: {
      ...stored.agent,
      maxSteps: parseIntEnv(env[ENV_VARS.MAX_STEPS], ENV_VARS.MAX_STEPS) ?? stored.agent?.maxSteps,
    },
    cache: { ...stored.cache },
    debug: env[ENV_VARS.DEBUG] === '1' || env[ENV_VARS.DEBUG] === 'true' || stored.debug === true,
  };

  const result = z
    .object({
      model: ModelConfigSchema,
      benchmark: BenchmarkConfigSchema,
      agent: AgentSettingsSchema,
      cache: CacheConfigSchema,
      debug: z.boolean(),
    })
    .safeParse(candidate);

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(
      `Configuration incomplete or invalid (${problems.join('; ')}). Run "nextstep setup" or set the NEXTSTEP_* environment variables.`
    );
  }

  return result.data;
}

export class ConfigManager {
  private store: Conf<AppConfig>;
  private static instance: ConfigManager;

  private constructor() {
    this.store = new Conf<AppConfig>({
      projectName: 'nextstep-agent',
    });
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  isConfigured(): boolean {
    const config = this.store.store;
    return !!(config.model?.apiKey && config.benchmark?.baseUrl);
  }

  getConfig(): AppConfig {
    return this.store.store;
  }

  setModel(config: ModelConfig) {
    this.store.set('model', ModelConfigSchema.parse(config));
  }

  getModel(): ModelConfig | undefined {
    return this.store.get('model');
  }

  setBenchmark(config: z.input<typeof BenchmarkConfigSchema>) {
    this.store.set('benchmark', BenchmarkConfigSchema.parse(config));
  }

  getBenchmark(): BenchmarkConfig | undefined {
    return this.store.get('benchmark');
  }

  setAgentSettings(settings: z.input<typeof AgentSettingsSchema>) {
    this.store.set('agent', AgentSettingsSchema.parse(settings));
  }

  setCache(config: z.input<typeof CacheConfigSchema>) {
    this.store.set('cache', CacheConfigSchema.parse(config));
  }

  setDebug(enabled: boolean) {
    this.store.set('debug', enabled);
  }

  isDebug(): boolean {
    return this.store.get('debug') === true;
  }

  reset() {
    this.store.clear();
  }

  getConfigPath(): string {
    return this.store.path;
  }

  /**
   * Validate configuration and throw if invalid
   */
  validateConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
    const stored = AppConfigSchema.safeParse(this.getConfig());
    if (!stored.success) {
      throw new ConfigurationError(`Stored configuration at ${this.getConfigPath()} is invalid: ${stored.error.message}`);
    }
    return resolveRuntimeConfig(stored.data, env);
  }
}

/**
 * Lazily created so that importing this module never touches the user's config directory.
 */
export function getConfigManager(): ConfigManager {
  return ConfigManager.getInstance();
}
