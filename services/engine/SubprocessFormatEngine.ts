import { spawn } from 'child_process';
import type { EngineFormatOptions } from '@core/types/format';
import type { EngineConfig, EngineName } from '@core/config/types';
import { EngineFailureError, EngineSyntaxError } from '@core/errors';
import { engineLogger } from '@core/utils/logger';
import type { IFormatEngine } from './IFormatEngine';

export interface SubprocessEngineSpec {
  name: string;
  command: string;
  /** Arguments for one invocation reading stdin and writing stdout */
  buildArgs(options: EngineFormatOptions): string[];
}

export const ENGINE_SPECS: Record<EngineName, SubprocessEngineSpec> = {
  black: {
    name: 'black',
    command: 'black',
    buildArgs: options => [
      '--quiet',
      '--line-length',
      String(options.lineLength),
      ...(options.extraArgs ?? []),
      '-'
    ]
  },
  ruff: {
    name: 'ruff',
    command: 'ruff',
    buildArgs: options => [
      'format',
      '--line-length',
      String(options.lineLength),
      ...(options.extraArgs ?? []),
      '-'
    ]
  }
};

interface SyntaxErrorPattern {
  pattern: RegExp;
  /** Added to the reported column to make it 1-based */
  columnOffset: number;
}

// black: "error: cannot format -: Cannot parse for target version Python 3.12: 2:4: x = = 1"
// (0-based column). ruff: "error: Failed to parse -:2:5: Expected an expression" (1-based).
const SYNTAX_ERROR_PATTERNS: SyntaxErrorPattern[] = [
  { pattern: /Cannot parse[^\n]*?:\s*(\d+):(\d+):\s*([^\n]*)/, columnOffset: 1 },
  { pattern: /Failed to parse[^\n]*?:(\d+):(\d+):\s*([^\n]*)/, columnOffset: 0 }
];

/**
 * Recognizes a syntax error report in engine stderr. The position is
 * returned 1-based whatever the engine reports.
 */
export function parseSyntaxError(stderr: string): EngineSyntaxError | undefined {
  for (const { pattern, columnOffset } of SYNTAX_ERROR_PATTERNS) {
    const match = pattern.exec(stderr);
    if (match) {
      const detail = match[3].trim();
      const message = detail ? `Cannot parse: ${detail}` : 'Cannot parse';
      return new EngineSyntaxError(message, Number(match[1]), Number(match[2]) + columnOffset);
    }
  }
  return undefined;
}

/**
 * Runs a formatter executable once per call, feeding the source on stdin.
 */
export class SubprocessFormatEngine implements IFormatEngine {
  readonly name: string;

  constructor(private readonly spec: SubprocessEngineSpec) {
    this.name = spec.name;
  }

  format(source: string, options: EngineFormatOptions, signal?: AbortSignal): Promise<string> {
    const args = this.spec.buildArgs(options);
    engineLogger.debug(`Running ${this.spec.command}`, { args });

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let stdinError: Error | undefined;

      const child = spawn(this.spec.command, args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        signal
      });

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (data: string) => {
        stdout += data;
      });
      child.stderr.on('data', (data: string) => {
        stderr += data;
      });

      // The engine may exit before reading all of stdin; the exit code tells the story
      child.stdin.on('error', (error: Error) => {
        stdinError = error;
      });

      child.on('error', (error: Error) => {
        if (error.name === 'AbortError') {
          reject(new EngineFailureError(`${this.name} was cancelled`, 'timeout', undefined, error));
          return;
        }
        reject(new EngineFailureError(
          `Failed to start ${this.spec.command}: ${error.message}`,
          'spawn',
          undefined,
          error
        ));
      });

      child.on('close', (code: number | null) => {
        if (code === 0) {
          resolve(stdout);
          return;
        }

        const syntaxError = parseSyntaxError(stderr);
        if (syntaxError) {
          reject(syntaxError);
          return;
        }

        const detail = stderr.trim() || stdinError?.message || 'no output';
        reject(new EngineFailureError(
          `${this.name} exited with code ${code ?? 'null'}: ${detail}`,
          'exit',
          { exitCode: code, stderr }
        ));
      });

      child.stdin.end(source, 'utf8');
    });
  }
}

/**
 * Engine for a configuration block, honouring a custom executable.
 */
export function createEngine(config: EngineConfig = {}): IFormatEngine {
  const base = ENGINE_SPECS[config.name ?? 'black'];
  const extraArgs = config.args ?? [];
  return new SubprocessFormatEngine({
    name: base.name,
    command: config.command ?? base.command,
    buildArgs: options => base.buildArgs({
      ...options,
      extraArgs: [...extraArgs, ...(options.extraArgs ?? [])]
    })
  });
}
