import { readFile, writeFile, mkdir } from 'fs/promises';
import { join, resolve } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { PermanentError } from './errors.js';

export const AGENT_ROLES = [
  'structureGenerator',
  'structureCritic',
  'pageGenerator',
  'pageCritic',
  'readmeGenerator',
  'readmeCritic',
] as const;

export type AgentRole = (typeof AGENT_ROLES)[number];

const agentModelsSchema = z
  .object({
    structureGenerator: z.string().min(1),
    structureCritic: z.string().min(1),
    pageGenerator: z.string().min(1),
    pageCritic: z.string().min(1),
    readmeGenerator: z.string().min(1),
    readmeCritic: z.string().min(1),
  })
  .partial();

const positiveInt = z.coerce.number().int().positive();

/**
 * Everything the pipeline needs, resolved once and passed down explicitly.
 */
export const settingsSchema = z.object({
  provider: z.enum(['anthropic', 'ollama']).default('anthropic'),
  apiKey: z.string().optional(),
  ollamaHost: z.string().url().default('http://localhost:11434'),
  defaultModel: z.string().min(1).default('claude-sonnet-4-20250514'),
  agentModels: agentModelsSchema.default({}),

  qualityThreshold: z.coerce.number().min(1).max(10).default(7.0),
  maxAgentAttempts: positiveInt.default(3),
  structureCoverageFloor: z.coerce.number().min(0).max(10).default(5.0),
  pageAccuracyFloor: z.coerce.number().min(0).max(10).default(5.0),

  chunkMaxTokens: positiveInt.default(512),
  chunkOverlapTokens: z.coerce.number().int().min(0).default(50),
  chunkMinTokens: z.coerce.number().int().min(0).default(50),

  maxFileSize: positiveInt.default(1_048_576),
  maxTotalFiles: positiveInt.default(5000),
  maxRepoSize: positiveInt.default(524_288_000),

  embeddingModel: z.string().min(1).default('nomic-embed-text'),
  embeddingBatchSize: positiveInt.default(100),

  agentTimeoutMs: positiveInt.default(600_000),
  embeddingTimeoutMs: positiveInt.default(120_000),
  maxToolTurns: positiveInt.default(20),
  maxOutputTokens: positiveInt.default(8192),

  storePath: z.string().min(1).default(join('.wikiforge', 'store.json')),
  verbose: z.boolean().default(false),
});

export type Settings = z.output<typeof settingsSchema>;
export type Config = Partial<Settings>;

/**
 * Model name for an agent role, falling back to the default model.
 */
export function modelForRole(settings: Settings, role: AgentRole): string {
  return settings.agentModels[role] ?? settings.defaultModel;
}

/**
 * Validate a raw config object into Settings.
 */
export function resolveSettings(config: unknown = {}): Settings {
  const parsed = settingsSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new PermanentError(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
  return parsed.data;
}

const configFileSchema = settingsSchema.partial();

export interface ConfigManagerOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

const ENV_OVERRIDES: Array<[string, keyof Config]> = [
  ['WIKIFORGE_PROVIDER', 'provider'],
  ['WIKIFORGE_MODEL', 'defaultModel'],
  ['WIKIFORGE_QUALITY_THRESHOLD', 'qualityThreshold'],
  ['WIKIFORGE_MAX_ATTEMPTS', 'maxAgentAttempts'],
  ['WIKIFORGE_STORE', 'storePath'],
  ['OLLAMA_HOST', 'ollamaHost'],
];

function definedEntries(config: Config): Record<string, unknown> {
  return Object.fromEntries(Object.entries(config).filter(([, value]) => value !== undefined));
}

export class ConfigManager {
  private config: Config = {};
  private envOverrides: Record<string, string> = {};
  private readonly configDir: string;
  private readonly configFile: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.configDir = options.configDir ?? join(homedir(), '.wikiforge');
    this.configFile = join(this.configDir, 'config.json');
    this.env = options.env ?? process.env;
  }

  async load(): Promise<Config> {
    this.config = await this.readConfigFile();

    // Environment wins over the config file
    if (this.env.ANTHROPIC_API_KEY) {
      this.config.apiKey = this.env.ANTHROPIC_API_KEY;
    }
    this.envOverrides = {};
    for (const [variable, key] of ENV_OVERRIDES) {
      const value = this.env[variable];
      if (value) this.envOverrides[key] = value;
    }

    return this.config;
  }

  /**
   * Merge into the config file. Undefined values leave stored keys alone, and
   * environment overrides are never written out.
   */
  async save(config: Config): Promise<void> {
    const defined = definedEntries(config);
    const stored = configFileSchema.parse({ ...(await this.readConfigFile()), ...defined });
    this.config = configFileSchema.parse({ ...this.config, ...defined });

    try {
      await mkdir(this.configDir, { recursive: true });
      await writeFile(this.configFile, JSON.stringify(stored, null, 2));
    } catch (error) {
      throw new Error(`Failed to save configuration: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Resolve the loaded config plus per-run overrides into Settings.
   * A relative store path is anchored at `cwd`.
   */
  resolve(overrides: Partial<Config> = {}, cwd: string = process.cwd()): Settings {
    const settings = resolveSettings({ ...this.config, ...this.envOverrides, ...definedEntries(overrides) });
    return { ...settings, storePath: resolve(cwd, settings.storePath) };
  }

  get(): Config {
    return { ...this.config };
  }

  getApiKey(): string | undefined {
    return this.config.apiKey;
  }

  hasApiKey(): boolean {
    return !!this.config.apiKey;
  }

  private async readConfigFile(): Promise<Config> {
    let raw: string;
    try {
      raw = await readFile(this.configFile, 'utf-8');
    } catch {
      return {};
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      return {};
    }

    // Missing keys stay missing; defaults are applied once, in resolve()
    const parsed = configFileSchema.safeParse(data);
    return parsed.success ? parsed.data : {};
  }
}
