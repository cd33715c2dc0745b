import type { FormatOptions, OutputMode } from '@api/index';
import type { ResolvedConfig } from '@core/config/types';
import type { CLIOptions } from '../index';

export interface RunSettings {
  format: FormatOptions;
  mode: OutputMode;
  strict: boolean;
  exclude: string[];
}

/**
 * Layers command line options over the resolved configuration files.
 */
export class OptionProcessor {
  cliToRunSettings(options: CLIOptions, config: ResolvedConfig): RunSettings {
    const mode: OutputMode = options.check ? 'check' : options.write ? 'write' : 'stdout';

    // Executable and flags configured for one engine do not carry over to another
    const sameEngine = options.engine === undefined || options.engine === config.engine.name;
    return {
      mode,
      strict: options.strict ?? config.strict,
      exclude: config.exclude,
      format: {
        mode,
        lineLength: options.lineLength ?? config.lineLength,
        inlineLineLength: options.inlineLineLength ?? config.inlineLineLength,
        timeout: options.timeout ?? config.timeout,
        concurrency: options.concurrency ?? config.concurrency,
        indentation: {
          policy: options.indentPolicy ?? config.indentation.policy,
          tabWidth: options.tabWidth ?? config.indentation.tabWidth
        },
        engine: {
          name: options.engine ?? config.engine.name,
          command: options.engineCommand ?? (sameEngine ? config.engine.command : undefined),
          args: sameEngine ? config.engine.args : []
        }
      }
    };
  }
}
