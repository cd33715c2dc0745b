import { shouldFail } from '@api/index';
import type { EngineName } from '@core/config/types';
import { ConfigLoader } from '@core/config/loader';
import type { IndentationPolicy } from '@core/types/format';
import { cliLogger, setLogLevel } from '@core/utils/logger';
import type { IFormatEngine } from '@services/engine/IFormatEngine';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { ErrorHandler } from './error/ErrorHandler';
import { FileProcessor, type CLIStreams } from './execution/FileProcessor';
import { HelpSystem } from './interaction/HelpSystem';
import { ArgumentParser } from './parsers/ArgumentParser';
import { OptionProcessor } from './parsers/OptionProcessor';

// CLI Options interface
export interface CLIOptions {
  /** Files, directories, or `-` for stdin */
  inputs: string[];
  check?: boolean;
  write?: boolean;
  strict?: boolean;
  lineLength?: number;
  inlineLineLength?: number;
  concurrency?: number;
  timeout?: number; // milliseconds
  engine?: EngineName;
  engineCommand?: string;
  indentPolicy?: IndentationPolicy;
  tabWidth?: number;
  verbose?: boolean;
  debug?: boolean;
  help?: boolean;
  version?: boolean;
}

/**
 * Everything the CLI touches outside itself; tests hand in stand-ins.
 */
export interface CLIContext {
  streams?: Partial<CLIStreams>;
  fileSystem?: IFileSystemService;
  /** Replaces the configured subprocess engine */
  engine?: IFormatEngine;
  cwd?: string;
  homeDir?: string;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

function defaultStreams(): CLIStreams {
  return {
    stdout: text => {
      process.stdout.write(text);
    },
    stderr: text => {
      process.stderr.write(text);
    },
    readStdin,
    colors: Boolean(process.stderr.isTTY)
  };
}

/**
 * Runs the CLI and resolves to its exit status.
 */
export async function main(args: string[], context: CLIContext = {}): Promise<number> {
  const streams: CLIStreams = { ...defaultStreams(), ...context.streams };
  const errorHandler = new ErrorHandler(streams.stderr, streams.colors);
  const parser = new ArgumentParser();

  let options: CLIOptions;
  try {
    options = parser.parseArgs(args);
  } catch (error) {
    return errorHandler.handleError(error);
  }

  if (options.help) {
    new HelpSystem(streams.stdout).displayHelp();
    return 0;
  }
  if (options.version) {
    new HelpSystem(streams.stdout).displayVersion();
    return 0;
  }

  if (options.debug) {
    setLogLevel('debug');
  } else if (options.verbose) {
    setLogLevel('info');
  }

  try {
    const cwd = context.cwd ?? process.cwd();
    const configLoader = new ConfigLoader(cwd, context.homeDir);
    const config = configLoader.resolve();
    const settings = new OptionProcessor().cliToRunSettings(options, config);
    if (context.engine) {
      settings.format.engine = context.engine;
    }
    cliLogger.debug('Resolved run settings', { mode: settings.mode, strict: settings.strict });

    const processor = new FileProcessor({
      fileSystem: context.fileSystem ?? new NodeFileSystem(),
      streams,
      cwd,
      verbose: Boolean(options.verbose)
    });

    const report = parser.readsStdin(options)
      ? await processor.processStdin(settings.format)
      : await processor.processFiles(options.inputs, settings.format, settings.exclude);

    return shouldFail(report, { strict: settings.strict, check: settings.mode === 'check' }) ? 1 : 0;
  } catch (error) {
    return errorHandler.handleError(error, options);
  }
}
