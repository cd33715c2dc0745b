import type { CLIOptions } from '../index';
import type { EngineName } from '@core/config/types';
import type { IndentationPolicy } from '@core/types/format';
import { parseDuration, parsePositiveInteger } from '@core/config/utils';

/**
 * Raised for command lines that cannot be run; the CLI exits with status 2.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const ENGINES: readonly EngineName[] = ['black', 'ruff'];
const INDENT_POLICIES: readonly IndentationPolicy[] = ['reject', 'expand-tabs'];

export class ArgumentParser {
  parseArgs(args: string[]): CLIOptions {
    const options: CLIOptions = {
      inputs: []
    };

    // Everything after `--` is a path
    let pathsOnly = false;

    for (let i = 0; i < args.length; i++) {
      const raw = args[i];

      if (pathsOnly || raw === '-' || !raw.startsWith('-')) {
        options.inputs.push(raw);
        continue;
      }
      if (raw === '--') {
        pathsOnly = true;
        continue;
      }

      // --line-length=100
      const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
      const arg = eq === -1 ? raw : raw.slice(0, eq);
      const inlineValue = eq === -1 ? undefined : raw.slice(eq + 1);

      const value = (): string => {
        if (inlineValue !== undefined) return inlineValue;
        const next = args[i + 1];
        if (next === undefined || (next.startsWith('-') && next !== '-')) {
          throw new UsageError(`${arg} requires a value`);
        }
        i++;
        return next;
      };

      switch (arg) {
        case '--version':
        case '-V':
          options.version = true;
          break;
        case '--help':
        case '-h':
          options.help = true;
          break;
        case '--verbose':
        case '-v':
          options.verbose = true;
          break;
        case '--debug':
        case '-d':
          options.debug = true;
          break;
        case '--check':
          options.check = true;
          break;
        case '--write':
        case '-w':
          options.write = true;
          break;
        case '--strict':
          options.strict = true;
          break;
        case '--line-length':
        case '-l':
          options.lineLength = this.positive(arg, value());
          break;
        case '--inline-line-length':
          options.inlineLineLength = this.positive(arg, value());
          break;
        case '--concurrency':
        case '-j':
          options.concurrency = this.positive(arg, value());
          break;
        case '--tab-width':
          options.tabWidth = this.positive(arg, value());
          break;
        case '--timeout':
          options.timeout = this.duration(arg, value());
          break;
        case '--engine':
          options.engine = this.engine(value());
          break;
        case '--engine-command':
          options.engineCommand = value();
          break;
        case '--indent-policy':
          options.indentPolicy = this.indentPolicy(value());
          break;
        default:
          throw new UsageError(`Unknown option: ${arg}`);
      }
    }

    this.validateOptions(options);
    return options;
  }

  validateOptions(options: CLIOptions): void {
    if (options.check && options.write) {
      throw new UsageError('--check and --write cannot be used together');
    }
    const stdinInputs = options.inputs.filter(input => input === '-').length;
    if (stdinInputs > 1 || (stdinInputs === 1 && options.inputs.length > 1)) {
      throw new UsageError('"-" (stdin) cannot be combined with other paths');
    }
    if (options.write && this.readsStdin(options)) {
      throw new UsageError('--write needs file paths; stdin is always written to stdout');
    }
  }

  readsStdin(options: CLIOptions): boolean {
    return options.inputs.length === 0 || (options.inputs.length === 1 && options.inputs[0] === '-');
  }

  private positive(flag: string, value: string): number {
    try {
      return parsePositiveInteger(value, flag);
    } catch (error) {
      throw new UsageError(error instanceof Error ? error.message : String(error));
    }
  }

  private duration(flag: string, value: string): number {
    let ms: number;
    try {
      ms = parseDuration(value);
    } catch {
      throw new UsageError(`${flag} must be a duration such as "10s" or "500ms", got: ${value}`);
    }
    if (ms < 1) {
      throw new UsageError(`${flag} must be greater than zero`);
    }
    return ms;
  }

  private engine(value: string): EngineName {
    const engine = ENGINES.find(name => name === value);
    if (!engine) {
      throw new UsageError(`--engine must be one of ${ENGINES.join(', ')}, got: ${value}`);
    }
    return engine;
  }

  private indentPolicy(value: string): IndentationPolicy {
    const policy = INDENT_POLICIES.find(name => name === value);
    if (!policy) {
      throw new UsageError(`--indent-policy must be one of ${INDENT_POLICIES.join(', ')}, got: ${value}`);
    }
    return policy;
  }
}
