/**
 * Tests for the help formatter's escaping and message assembly.
 */

import { describe, expect, it } from 'vitest';
import { OPTION_TABLE, type OptionSpec } from '../../config/option-table.ts';
import { escapeHelpToken, formatOptionRow, showHelp } from './formatter.ts';

const spec = (name: string): OptionSpec => {
  const found = OPTION_TABLE.find((option) => option.long === name);
  if (found === undefined) {
    throw new Error(`no option ${name}`);
  }
  return found;
};

describe('help formatter', () => {
  it('escapeHelpToken removes control chars and non-ASCII', () => {
    expect(escapeHelpToken('ok')).toBe('ok');
    expect(escapeHelpToken('bad\nid')).toBe('badid');
    expect(escapeHelpToken('weirdé')).toBe('weird');
  });

  it('pads the option column for value options and flags', () => {
    expect(formatOptionRow(spec('bootscript'))).toBe(
      '  -b --bootscript FILE   Run additional bootstrap script',
    );
    expect(formatOptionRow(spec('debug'))).toBe(
      `  -d --debug${' '.repeat(12)} Run with debugger integration`,
    );
  });

  it('lists every option after the usage header', () => {
    const lines = showHelp().split('\n');

    expect(lines.slice(0, 3)).toEqual([
      'Usage:',
      '  spindle [option] ... [script] [arg] ...',
      'Options:',
    ]);
    expect(lines).toHaveLength(3 + OPTION_TABLE.length);
    expect(lines[3 + 6]).toBe('  -o --optlevel OPT      Set optimization level (-1 to 9)');
  });

  it('renders a custom table', () => {
    const table: OptionSpec[] = [{ short: 'x', long: 'debug', description: 'only', argPlaceholder: '' }];

    expect(showHelp(table).split('\n')[3]).toBe(`  -x --debug${' '.repeat(12)} only`);
  });
});
