import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { CapflowConfigSchema, type CapflowConfig, type CapflowConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

export interface ConfigManagerOptions {
  projectDir?: string;
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: CapflowConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.capflow');
    this.projectDir = options.projectDir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: CapflowConfigInput): CapflowConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.capflow.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    const parsed = CapflowConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): CapflowConfig {
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

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const result = { ...raw };
    const section = (name: string): Record<string, unknown> => {
      const current = result[name];
      const copy = isRecord(current) ? { ...current } : {};
      result[name] = copy;
      return copy;
    };

    const maxEntries = this.numberEnv('CAPFLOW_CACHE_MAX_ENTRIES');
    if (maxEntries !== undefined) section('cache').maxEntries = maxEntries;

    const ttl = this.env.CAPFLOW_CACHE_TTL_MS;
    if (ttl !== undefined && ttl !== '') {
      section('cache').defaultTtlMs = ttl === 'none' ? null : this.numberEnv('CAPFLOW_CACHE_TTL_MS');
    }

    const windowSize = this.numberEnv('CAPFLOW_MONITOR_WINDOW');
    if (windowSize !== undefined) section('monitor').windowSize = windowSize;

    const threshold = this.numberEnv('CAPFLOW_REGRESSION_THRESHOLD');
    if (threshold !== undefined) section('monitor').threshold = { mode: 'relative', value: threshold };

    const concurrency = this.numberEnv('CAPFLOW_MAX_CONCURRENCY');
    if (concurrency !== undefined) section('orchestrator').maxConcurrency = concurrency;

    return result;
  }

  private numberEnv(name: string): number | undefined {
    const value = this.env[name];
    if (value === undefined || value === '') return undefined;
    const n = Number(value);
    if (!Number.isFinite(n)) {
      throw new ConfigError(`Environment variable ${name} must be a number, got "${value}"`);
    }
    return n;
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (isRecord(incoming) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else if (incoming !== undefined) {
        result[key] = incoming;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
