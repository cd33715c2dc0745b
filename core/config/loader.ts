import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { RpyfmtConfig, ResolvedConfig, EngineConfig, IndentationConfig } from './types';
import { parseDuration } from './utils';
import { DEFAULT_PARALLEL_LIMIT, getParallelLimit } from '@core/utils/parallel';
import { configLogger } from '@core/utils/logger';

export const DEFAULT_CONFIG: ResolvedConfig = {
  lineLength: 88,
  inlineLineLength: 1000,
  timeout: 10_000,
  concurrency: DEFAULT_PARALLEL_LIMIT,
  strict: false,
  engine: { name: 'black', args: [] },
  indentation: { policy: 'reject', tabWidth: 8 },
  exclude: []
};

/**
 * Load rpyfmt configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: RpyfmtConfig;

  constructor(projectPath?: string, homeDir: string = os.homedir()) {
    // Global config location: ~/.config/rpyfmt.json
    this.globalConfigPath = path.join(homeDir, '.config', 'rpyfmt.json');

    // Project config location: <project>/rpyfmt.config.json
    this.projectConfigPath = projectPath
      ? path.join(projectPath, 'rpyfmt.config.json')
      : path.join(process.cwd(), 'rpyfmt.config.json');
  }

  /**
   * Load and merge configurations
   */
  load(): RpyfmtConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    // Project overrides global
    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);
    return this.cachedConfig;
  }

  /**
   * Load a single config file. A missing file is an empty config; an
   * unreadable or invalid one is reported and ignored.
   */
  private loadConfigFile(filePath: string): RpyfmtConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    try {
      const content = fs.readFileSync(filePath, 'utf8');
      return toConfig(JSON.parse(content), filePath);
    } catch (error) {
      configLogger.warn(`Failed to load config from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return {};
    }
  }

  mergeConfigs(global: RpyfmtConfig, project: RpyfmtConfig): RpyfmtConfig {
    const merged: RpyfmtConfig = { ...global, ...project };

    if (global.engine || project.engine) {
      merged.engine = { ...global.engine, ...project.engine };
    }
    if (global.indentation || project.indentation) {
      merged.indentation = { ...global.indentation, ...project.indentation };
    }
    // Arrays merge (project adds to global)
    if (global.exclude || project.exclude) {
      merged.exclude = [...(global.exclude || []), ...(project.exclude || [])];
    }

    return merged;
  }

  /**
   * Resolve configuration to runtime values
   */
  resolve(config: RpyfmtConfig = this.load()): ResolvedConfig {
    // RPYFMT_PARALLEL_LIMIT overrides the configured value
    const concurrency = process.env.RPYFMT_PARALLEL_LIMIT !== undefined
      ? getParallelLimit()
      : config.concurrency ?? DEFAULT_CONFIG.concurrency;

    return {
      lineLength: config.lineLength ?? DEFAULT_CONFIG.lineLength,
      inlineLineLength: config.inlineLineLength ?? DEFAULT_CONFIG.inlineLineLength,
      timeout: config.timeout !== undefined ? parseDuration(config.timeout) : DEFAULT_CONFIG.timeout,
      concurrency,
      strict: config.strict ?? DEFAULT_CONFIG.strict,
      engine: {
        name: config.engine?.name ?? DEFAULT_CONFIG.engine.name,
        command: config.engine?.command,
        args: config.engine?.args ?? []
      },
      indentation: {
        policy: config.indentation?.policy ?? DEFAULT_CONFIG.indentation.policy,
        tabWidth: config.indentation?.tabWidth ?? DEFAULT_CONFIG.indentation.tabWidth
      },
      exclude: config.exclude ?? []
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Validate the parsed JSON of a config file
 */
export function toConfig(raw: unknown, source: string): RpyfmtConfig {
  if (!isRecord(raw)) {
    throw new Error(`${source}: configuration must be a JSON object`);
  }

  const config: RpyfmtConfig = {};
  const fail = (key: string, expected: string): never => {
    throw new Error(`${source}: "${key}" must be ${expected}`);
  };

  for (const key of ['lineLength', 'inlineLineLength', 'concurrency'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      fail(key, 'a positive integer');
    } else {
      config[key] = value;
    }
  }

  if (raw.timeout !== undefined) {
    if (typeof raw.timeout !== 'string' && typeof raw.timeout !== 'number') {
      fail('timeout', 'a duration such as "10s" or a number of milliseconds');
    } else {
      parseDuration(raw.timeout);
      config.timeout = raw.timeout;
    }
  }

  if (raw.strict !== undefined) {
    if (typeof raw.strict !== 'boolean') {
      fail('strict', 'a boolean');
    } else {
      config.strict = raw.strict;
    }
  }

  if (raw.exclude !== undefined) {
    if (!isStringArray(raw.exclude)) {
      fail('exclude', 'an array of glob strings');
    } else {
      config.exclude = raw.exclude;
    }
  }

  if (raw.engine !== undefined) {
    config.engine = toEngineConfig(raw.engine, fail);
  }
  if (raw.indentation !== undefined) {
    config.indentation = toIndentationConfig(raw.indentation, fail);
  }

  return config;
}

function toEngineConfig(raw: unknown, fail: (key: string, expected: string) => never): EngineConfig {
  if (!isRecord(raw)) {
    return fail('engine', 'an object');
  }
  const engine: EngineConfig = {};
  if (raw.name !== undefined) {
    if (raw.name !== 'black' && raw.name !== 'ruff') {
      fail('engine.name', '"black" or "ruff"');
    } else {
      engine.name = raw.name;
    }
  }
  if (raw.command !== undefined) {
    if (typeof raw.command !== 'string') {
      fail('engine.command', 'a string');
    } else {
      engine.command = raw.command;
    }
  }
  if (raw.args !== undefined) {
    if (!isStringArray(raw.args)) {
      fail('engine.args', 'an array of strings');
    } else {
      engine.args = raw.args;
    }
  }
  return engine;
}

function toIndentationConfig(raw: unknown, fail: (key: string, expected: string) => never): IndentationConfig {
  if (!isRecord(raw)) {
    return fail('indentation', 'an object');
  }
  const indentation: IndentationConfig = {};
  if (raw.policy !== undefined) {
    if (raw.policy !== 'reject' && raw.policy !== 'expand-tabs') {
      fail('indentation.policy', '"reject" or "expand-tabs"');
    } else {
      indentation.policy = raw.policy;
    }
  }
  if (raw.tabWidth !== undefined) {
    if (typeof raw.tabWidth !== 'number' || !Number.isInteger(raw.tabWidth) || raw.tabWidth < 1) {
      fail('indentation.tabWidth', 'a positive integer');
    } else {
      indentation.tabWidth = raw.tabWidth;
    }
  }
  return indentation;
}
