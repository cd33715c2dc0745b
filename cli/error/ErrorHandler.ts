import chalk from 'chalk';
import { RpyfmtError, ErrorSeverity, formatLocation } from '@core/errors/RpyfmtError';
import { cliLogger } from '@core/utils/logger';
import type { CLIOptions } from '../index';
import { UsageError } from '../parsers/ArgumentParser';

export type ErrorWriter = (text: string) => void;

export class ErrorHandler {
  private readonly style: chalk.Chalk;

  constructor(
    private readonly write: ErrorWriter = text => process.stderr.write(text),
    useColors = true
  ) {
    this.style = useColors ? chalk : new chalk.Instance({ level: 0 });
  }

  /**
   * Prints an error and returns the exit status it calls for.
   */
  handleError(error: unknown, options: Pick<CLIOptions, 'verbose' | 'debug'> = {}): number {
    if (error instanceof UsageError) {
      this.line(this.style.red('Error: ') + error.message);
      this.line(`Run ${this.style.bold('rpyfmt --help')} for usage.`);
      return 2;
    }

    if (error instanceof RpyfmtError) {
      this.handleRpyfmtError(error, options);
      return error.severity === ErrorSeverity.Fatal ? 1 : 0;
    }

    if (error instanceof Error) {
      this.handleGenericError(error, options);
      return 1;
    }

    cliLogger.error('An unknown error occurred', { error: String(error) });
    this.line(this.style.red(`Unknown Error: ${String(error)}`));
    return 1;
  }

  private handleRpyfmtError(error: RpyfmtError, options: Pick<CLIOptions, 'verbose' | 'debug'>): void {
    const location = error.sourceLocation ? `${formatLocation(error.sourceLocation)}: ` : '';
    const label = error.severity === ErrorSeverity.Fatal ? this.style.red('error') : this.style.yellow('warning');
    this.line(`${this.style.bold(location)}${label}: ${error.message} ${this.style.gray(`[${error.code}]`)}`);

    const context = error.getSourceContext(options.verbose ? 3 : 2);
    if (context) {
      this.line(this.style.gray(context.trimEnd()));
    }

    if (options.debug && error.details) {
      this.line(this.style.gray(JSON.stringify(error.details, null, 2)));
    }
  }

  private handleGenericError(error: Error, options: Pick<CLIOptions, 'verbose' | 'debug'>): void {
    cliLogger.error('An unexpected error occurred', { error: error.message });
    this.line('  ⎿  ' + this.style.red('Error: ') + error.message);

    const cause = error.cause;
    if (cause instanceof Error) {
      this.line(this.style.red(`  Cause: ${cause.message}`));
    }

    if (error.stack && (options.verbose || options.debug)) {
      this.line(this.style.gray(error.stack));
    }
  }

  private line(text: string): void {
    this.write(text + '\n');
  }
}
