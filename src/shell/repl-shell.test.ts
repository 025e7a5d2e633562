/**
 * Tests for the interactive shell over in-memory streams.
 */

import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { fakeConsole } from '../__test-utils__/index.ts';
import { VmEngine } from '../engine/vm-engine.ts';
import { ScriptExecutionError } from '../errors/errors.ts';
import { incompleteInputCause, ReplShell } from './repl-shell.ts';

const runShell = async (lines: readonly string[]) => {
  const engine = new VmEngine({
    home: '.',
    modulePath: [],
    bootScripts: [],
    optLevel: 0,
    debug: false,
    sandboxed: false,
  });
  const input = new PassThrough();
  const output = new PassThrough();
  const errorSink = fakeConsole();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString('utf8');
  });

  const shell = new ReplShell({
    engine,
    silent: true,
    verbose: false,
    input,
    output,
    errorSink,
    terminal: false,
  });
  const done = shell.run();
  input.end(lines.map((line) => `${line}\n`).join(''));
  await done;
  await new Promise((resolve) => setImmediate(resolve));

  return { printed: written.split('\n').filter((line) => line.length > 0), errorSink };
};

describe('shell/repl-shell.ts', () => {
  it('prints evaluation results without a prompt in silent mode', async () => {
    const { printed, errorSink } = await runShell(['var x = 20', 'x + 1']);

    expect(printed).toEqual(['21']);
    expect(errorSink.error).not.toHaveBeenCalled();
  });

  it('reports failures and keeps reading', async () => {
    const { printed, errorSink } = await runShell(['throw "nope"', '"still here"']);

    expect(errorSink.error).toHaveBeenCalledWith('nope');
    expect(printed).toEqual(["'still here'"]);
  });

  it('recognizes incomplete input', () => {
    const cause = new SyntaxError('Unexpected end of input');
    const incomplete = new ScriptExecutionError('SyntaxError: Unexpected end of input', { cause });
    const complete = new ScriptExecutionError('SyntaxError: Unexpected token', {
      cause: new SyntaxError("Unexpected token ')'"),
    });

    expect(incompleteInputCause(incomplete)).toBe(cause);
    expect(incompleteInputCause(complete)).toBeUndefined();
    expect(incompleteInputCause(new Error('Unexpected end of input'))).toBeUndefined();
  });
});
