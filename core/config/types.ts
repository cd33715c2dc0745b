/**
 * Configuration types for rpyfmt
 */
import type { IndentationPolicy } from '@core/types/format';

export type EngineName = 'black' | 'ruff';

export interface EngineConfig {
  name?: EngineName;
  /** Executable to run instead of the engine's default */
  command?: string;
  /** Extra arguments passed to the engine verbatim */
  args?: string[];
}

export interface IndentationConfig {
  policy?: IndentationPolicy;
  tabWidth?: number;
}

/**
 * Shape of `rpyfmt.config.json` and `~/.config/rpyfmt.json`
 */
export interface RpyfmtConfig {
  lineLength?: number;
  inlineLineLength?: number;
  timeout?: string | number; // e.g. "10s" or 10000
  concurrency?: number;
  strict?: boolean;
  engine?: EngineConfig;
  indentation?: IndentationConfig;
  exclude?: string[];
}

// Runtime configuration after parsing and merging
export interface ResolvedConfig {
  lineLength: number;
  inlineLineLength: number;
  timeout: number; // In milliseconds
  concurrency: number;
  strict: boolean;
  engine: {
    name: EngineName;
    command?: string;
    args: string[];
  };
  indentation: {
    policy: IndentationPolicy;
    tabWidth: number;
  };
  exclude: string[];
}
