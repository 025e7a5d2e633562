/**
 * Tests for the option table and its lookup helpers.
 */

import { describe, expect, it } from 'vitest';

import {
  findLongOption,
  findShortOption,
  OPTION_TABLE,
  type OptionSpec,
  takesValue,
} from './option-table.ts';

describe('option table', () => {
  it('lists options in help order', () => {
    expect(OPTION_TABLE.map((entry) => entry.long)).toEqual([
      'bootscript',
      'debug',
      'expression',
      'help',
      'history',
      'interactive',
      'optlevel',
      'policy',
      'silent',
      'verbose',
      'version',
    ]);
  });

  it('has unique short letters and long names', () => {
    expect(new Set(OPTION_TABLE.map((o) => o.short)).size).toBe(OPTION_TABLE.length);
    expect(new Set(OPTION_TABLE.map((o) => o.long)).size).toBe(OPTION_TABLE.length);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(OPTION_TABLE)).toBe(true);
  });

  it('marks value options by placeholder', () => {
    const valued = OPTION_TABLE.filter(takesValue).map((o) => o.long);
    expect(valued).toEqual(['bootscript', 'expression', 'history', 'optlevel', 'policy']);
  });

  it('finds short options case-sensitively', () => {
    const history = findShortOption('H');
    const help = findShortOption('h');

    expect(history.kind).toBe('value');
    expect(help.kind).toBe('flag');
    expect(history.kind === 'value' && history.spec.long).toBe('history');
    expect(help.kind === 'flag' && help.spec.long).toBe('help');
    expect(findShortOption('z')).toEqual({ kind: 'not-found' });
  });

  it('matches long options exactly or with an attached value', () => {
    const exact = findLongOption('optlevel');
    const attached = findLongOption('optlevel=5');

    expect(exact.kind).toBe('value');
    expect(attached.kind === 'value' && attached.spec.long).toBe('optlevel');
    expect(findLongOption('opt')).toEqual({ kind: 'not-found' });
    expect(findLongOption('optlevelx')).toEqual({ kind: 'not-found' });
  });

  it('never matches a flag carrying a value', () => {
    expect(findLongOption('debug').kind).toBe('flag');
    expect(findLongOption('debug=yes')).toEqual({ kind: 'not-found' });
  });

  it('prefers the first table entry on ties', () => {
    const table: OptionSpec[] = [
      { short: 'x', long: 'debug', description: 'first', argPlaceholder: '' },
      { short: 'x', long: 'verbose', description: 'second', argPlaceholder: '' },
    ];

    const match = findShortOption('x', table);
    expect(match.kind === 'flag' && match.spec.description).toBe('first');
  });
});
