import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import {
  LatsConfigSchema,
  MCTSConfigSchema,
  type LatsConfig,
  type LatsConfigInput,
  type MCTSConfig,
  type MCTSConfigInput,
} from './types.js';
import { ConfigError, toError } from './errors.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a partial search configuration, filling defaults.
 */
export function createMCTSConfig(input: MCTSConfigInput = {}): MCTSConfig {
  const parsed = MCTSConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid search configuration: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}

export class ConfigManager {
  private config: LatsConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir || join(homedir(), '.lats');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: LatsConfigInput): LatsConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.lats.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = LatsConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${parsed.error.message}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): LatsConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Create default project config if it doesn't exist
   */
  createDefaultConfig(): string {
    const configPath = join(this.projectDir, '.lats.yaml');
    if (!existsSync(this.projectDir)) {
      mkdirSync(this.projectDir, { recursive: true });
    }
    if (!existsSync(configPath)) {
      const defaultConfig = `# LATS search configuration
search:
  maxIterations: 10
  maxDepth: 3
  strategiesPerExpansion: 3
  maxCostUsd: 5.0

reflexion:
  enabled: true

persistence:
  saveWinningPaths: true
  winningPathDir: data/lats/winning_paths
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
    return configPath;
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
    return isRecord(parsed) ? parsed : {};
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const search: RawConfig = isRecord(raw.search) ? { ...raw.search } : {};
    const persistence: RawConfig = isRecord(raw.persistence) ? { ...raw.persistence } : {};
    const logging: RawConfig = isRecord(raw.logging) ? { ...raw.logging } : {};

    const numeric: Array<[string, string]> = [
      ['LATS_MAX_ITERATIONS', 'maxIterations'],
      ['LATS_MAX_DEPTH', 'maxDepth'],
      ['LATS_MAX_COST_USD', 'maxCostUsd'],
      ['LATS_MAX_TOTAL_TOKENS', 'maxTotalTokens'],
      ['LATS_SEED', 'seed'],
    ];
    for (const [envName, key] of numeric) {
      const value = process.env[envName];
      if (value === undefined || value === '') continue;
      const num = Number(value);
      if (Number.isNaN(num)) {
        throw new ConfigError(`Environment variable ${envName} is not a number: ${value}`);
      }
      search[key] = num;
    }

    if (process.env.LATS_WINNING_PATH_DIR) {
      persistence.winningPathDir = process.env.LATS_WINNING_PATH_DIR;
    }
    if (process.env.LATS_VERBOSE) {
      logging.verbose = process.env.LATS_VERBOSE === 'true' || process.env.LATS_VERBOSE === '1';
    }

    return { ...raw, search, persistence, logging };
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      const targetValue = target[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        result[key] = this.deepMerge(targetValue, sourceValue);
      } else if (sourceValue !== undefined) {
        result[key] = sourceValue;
      }
    }
    return result;
  }
}
