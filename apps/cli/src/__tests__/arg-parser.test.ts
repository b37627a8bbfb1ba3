import { describe, it, expect } from 'vitest';
import { measureCommand } from '../commands/measure.js';
import { ArgumentError, createArgParser, generateHelp } from '../core/io/arg-parser.js';

const parse = createArgParser(measureCommand);

describe('createArgParser', () => {
  it('defaults to a single restart', () => {
    expect(parse([])).toEqual({ numbers: 1, help: false });
  });

  it('accepts the short and long forms of the count', () => {
    expect(parse(['-n', '3']).numbers).toBe(3);
    expect(parse(['--numbers', '5']).numbers).toBe(5);
    expect(parse(['--numbers=2']).numbers).toBe(2);
  });

  it('recognizes help', () => {
    expect(parse(['-h']).help).toBe(true);
    expect(parse(['--help']).help).toBe(true);
  });

  it('rejects counts that are not positive integers', () => {
    expect(() => parse(['-n', '0'])).toThrow(/^Invalid arguments:\n {2}numbers: /);
    expect(() => parse(['-n', '2.5'])).toThrow(/numbers/);
    expect(() => parse(['-n', 'many'])).toThrow(/^Invalid arguments/);
  });

  it('rejects unknown options', () => {
    expect(() => parse(['--verbose'])).toThrow(/^Invalid arguments: .*--verbose/);
    expect(() => parse(['--verbose'])).toThrow(ArgumentError);
    expect(() => parse(['-n', '0'])).toThrow(ArgumentError);
  });

  it('rejects stray positional arguments', () => {
    expect(() => parse(['restart'])).toThrow("Invalid arguments: unexpected argument 'restart'");
  });
});

describe('generateHelp', () => {
  it('lists the options with aliases and defaults, then the examples', () => {
    expect(generateHelp(measureCommand).split('\n')).toEqual([
      'restart-meter - Restart a systemd service and measure the time from its start to its first block',
      '',
      'OPTIONS:',
      '  -n, --numbers  numbers of restarts [default: 1]',
      '  -h, --help     show this help [default: false]',
      '',
      'EXAMPLES:',
      '  sudo restart-meter',
      '  sudo restart-meter -n 3',
    ]);
  });
});
