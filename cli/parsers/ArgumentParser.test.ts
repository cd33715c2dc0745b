import { describe, expect, it } from 'vitest';
import { ArgumentParser, UsageError } from './ArgumentParser';
import { OptionProcessor } from './OptionProcessor';
import { DEFAULT_CONFIG } from '@core/config/loader';

describe('ArgumentParser', () => {
  const parser = new ArgumentParser();

  it('collects paths and flags', () => {
    const options = parser.parseArgs(['game/', '--check', '-l', '100', 'extra.rpy', '--strict']);

    expect(options).toEqual({
      inputs: ['game/', 'extra.rpy'],
      check: true,
      lineLength: 100,
      strict: true
    });
  });

  it('accepts --flag=value', () => {
    const options = parser.parseArgs(['--inline-line-length=120', '--timeout=500ms', '--engine=ruff']);

    expect(options.inlineLineLength).toBe(120);
    expect(options.timeout).toBe(500);
    expect(options.engine).toBe('ruff');
  });

  it('parses the remaining options', () => {
    const options = parser.parseArgs([
      '-w', '-j', '2', '--engine-command', '/opt/black', '--indent-policy', 'expand-tabs',
      '--tab-width', '4', '-v', '-d', 'a.rpy'
    ]);

    expect(options).toEqual({
      inputs: ['a.rpy'],
      write: true,
      concurrency: 2,
      engineCommand: '/opt/black',
      indentPolicy: 'expand-tabs',
      tabWidth: 4,
      verbose: true,
      debug: true
    });
  });

  it('treats "-" and everything after "--" as paths', () => {
    expect(parser.parseArgs(['-']).inputs).toEqual(['-']);
    expect(parser.parseArgs(['--', '--odd-name.rpy']).inputs).toEqual(['--odd-name.rpy']);
  });

  it('reads stdin when no path is given', () => {
    expect(parser.readsStdin(parser.parseArgs([]))).toBe(true);
    expect(parser.readsStdin(parser.parseArgs(['-']))).toBe(true);
    expect(parser.readsStdin(parser.parseArgs(['a.rpy']))).toBe(false);
  });

  it.each([
    [['--bogus'], 'Unknown option: --bogus'],
    [['--line-length'], '--line-length requires a value'],
    [['-l', '--check'], '-l requires a value'],
    [['-l', 'wide'], '-l must be a positive integer, got: wide'],
    [['--timeout', 'later'], '--timeout must be a duration such as "10s" or "500ms", got: later'],
    [['--engine', 'yapf'], '--engine must be one of black, ruff, got: yapf'],
    [['--indent-policy', 'guess'], '--indent-policy must be one of reject, expand-tabs, got: guess'],
    [['--check', '--write', 'a.rpy'], '--check and --write cannot be used together'],
    [['-', 'a.rpy'], '"-" (stdin) cannot be combined with other paths'],
    [['--write'], '--write needs file paths; stdin is always written to stdout']
  ])('rejects %j', (args, message) => {
    expect(() => parser.parseArgs(args)).toThrow(new UsageError(message));
  });
});

describe('OptionProcessor', () => {
  const processor = new OptionProcessor();

  it('uses the configuration where no flag is given', () => {
    const settings = processor.cliToRunSettings({ inputs: [] }, DEFAULT_CONFIG);

    expect(settings).toEqual({
      mode: 'stdout',
      strict: false,
      exclude: [],
      format: {
        mode: 'stdout',
        lineLength: 88,
        inlineLineLength: 1000,
        timeout: 10000,
        concurrency: 4,
        indentation: { policy: 'reject', tabWidth: 8 },
        engine: { name: 'black', command: undefined, args: [] }
      }
    });
  });

  it('lets flags win over the configuration', () => {
    const settings = processor.cliToRunSettings(
      { inputs: ['a.rpy'], check: true, strict: true, lineLength: 79, tabWidth: 4 },
      { ...DEFAULT_CONFIG, lineLength: 100, exclude: ['tl/**'] }
    );

    expect(settings.mode).toBe('check');
    expect(settings.strict).toBe(true);
    expect(settings.exclude).toEqual(['tl/**']);
    expect(settings.format.lineLength).toBe(79);
    expect(settings.format.indentation).toEqual({ policy: 'reject', tabWidth: 4 });
  });

  it('drops the configured executable when another engine is chosen', () => {
    const config = { ...DEFAULT_CONFIG, engine: { name: 'black' as const, command: '/opt/black', args: ['--fast'] } };

    expect(processor.cliToRunSettings({ inputs: [], engine: 'ruff' }, config).format.engine)
      .toEqual({ name: 'ruff', command: undefined, args: [] });
    expect(processor.cliToRunSettings({ inputs: [], write: true }, config).format.engine)
      .toEqual({ name: 'black', command: '/opt/black', args: ['--fast'] });
  });
});
