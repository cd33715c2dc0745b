import type { EngineFormatOptions } from '@core/types/format';

/**
 * An external Python formatter, treated as a pure function of its input.
 *
 * Implementations throw `EngineSyntaxError` when the source does not parse
 * and any other error for engine failures. They must stop work when `signal`
 * is aborted.
 */
export interface IFormatEngine {
  readonly name: string;
  format(source: string, options: EngineFormatOptions, signal?: AbortSignal): Promise<string>;
}
