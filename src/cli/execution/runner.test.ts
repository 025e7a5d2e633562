/**
 * Tests for the one-shot runner: expression, script and shell sequencing.
 */

import { describe, expect, it, vi } from 'vitest';

import { fakeConsole } from '../../__test-utils__/index.ts';
import { FakeEngine, fakeEngineFactory } from '../../__test-utils__/mocks/engine/fake-engine.ts';
import { ScriptExecutionError } from '../../errors/errors.ts';
import type { ShellOptions } from '../../shell/repl-shell.ts';
import { EXIT_FAILURE, EXIT_SUCCESS } from '../constants/exit-codes.ts';
import { showHelp } from '../core/help/formatter.ts';
import { HELP_HINT } from '../input/parser.ts';
import { executeRun, type RunnerDeps, shouldStartShell } from './runner.ts';

const setup = (engine = new FakeEngine(), overrides: Partial<RunnerDeps> = {}) => {
  const out = fakeConsole();
  const shellRuns: ShellOptions[] = [];
  const factory = fakeEngineFactory(engine);
  const deps: RunnerDeps = {
    console: out,
    engineFactory: factory,
    environment: { home: '/opt/spindle', modulePath: ['lib'], structuredLogs: false },
    logSink: { write: () => true },
    isInteractiveTerminal: () => true,
    shellFactory: (options) => ({
      run: () => {
        shellRuns.push(options);
        return Promise.resolve();
      },
    }),
    ...overrides,
  };
  return { out, deps, shellRuns, factory, engine };
};

describe('executeRun', () => {
  it('prints help and exits 0 without building an engine', async () => {
    const { out, deps, factory } = setup();

    await expect(executeRun(['-V', '-h', 'ignored.js'], deps)).resolves.toEqual({
      exitCode: EXIT_SUCCESS,
    });
    expect(out.log).toHaveBeenCalledWith(showHelp());
    expect(factory.received).toHaveLength(0);
  });

  it('prints option errors followed by the help hint', async () => {
    const { out, deps } = setup();

    const result = await executeRun(['--bogus'], deps);

    expect(result.exitCode).toBe(EXIT_FAILURE);
    expect(out.error.mock.calls).toEqual([['Unknown option: --bogus'], [HELP_HINT]]);
  });

  it('passes configuration and environment to the engine factory', async () => {
    const { deps, factory } = setup();

    await executeRun(
      ['-o', '3', '-b', 'a.js', '-b', 'b.js', '-p', 'policy.json', 'main.js', 'x'],
      deps,
    );

    expect(factory.received).toHaveLength(1);
    expect(factory.received[0]).toMatchObject({
      home: '/opt/spindle',
      modulePath: ['lib'],
      bootScripts: ['a.js', 'b.js'],
      optLevel: 3,
      debug: false,
      sandboxed: true,
      systemArgs: ['main.js', 'x'],
    });
  });

  it('evaluates an expression without starting the shell', async () => {
    const { deps, engine, shellRuns } = setup();

    const result = await executeRun(['-e', '1+1'], deps);

    expect(result.exitCode).toBe(EXIT_SUCCESS);
    expect(engine.calls).toEqual(['evaluate 1+1']);
    expect(shellRuns).toHaveLength(0);
  });

  it('runs the expression before the script with its arguments', async () => {
    const { deps, engine, shellRuns } = setup();

    await executeRun(['-e', 'boot()', 'main.js', 'x', '-y'], deps);

    expect(engine.calls).toEqual(['evaluate boot()', 'run main.js x -y']);
    expect(shellRuns).toHaveLength(0);
  });

  it('starts the shell after the script when interactive is requested', async () => {
    const { deps, engine, shellRuns } = setup();

    await executeRun(['-i', '-H', '/tmp/hist', 'main.js'], deps);

    expect(engine.calls).toEqual(['run main.js']);
    expect(shellRuns).toHaveLength(1);
    expect(shellRuns[0]).toMatchObject({ silent: false, verbose: false, historyFile: '/tmp/hist' });
  });

  it('starts a non-silent shell when nothing else is given on a terminal', async () => {
    const { deps, shellRuns } = setup();

    await executeRun([], deps);

    expect(shellRuns).toHaveLength(1);
    expect(shellRuns[0]?.silent).toBe(false);
    expect(shellRuns[0]?.historyFile).toBeUndefined();
  });

  it('switches to silent mode when not attached to a terminal', async () => {
    const { deps, shellRuns } = setup(new FakeEngine(), { isInteractiveTerminal: () => false });

    await executeRun([], deps);

    expect(shellRuns[0]?.silent).toBe(true);
  });

  it('reports script failures with the engine syntax errors and exits -1', async () => {
    const engine = new FakeEngine({
      scriptError: new ScriptExecutionError('SyntaxError: Unexpected token', {
        scriptStack: 'at main.js:2:1',
      }),
      failureSyntaxErrors: [{ sourceName: 'main.js', line: 2, message: 'Unexpected token' }],
    });
    const { out, deps, shellRuns } = setup(engine);

    const result = await executeRun(['-i', 'main.js'], deps);

    expect(result.exitCode).toBe(EXIT_FAILURE);
    expect(out.error.mock.calls).toEqual([
      ['SyntaxError: Unexpected token'],
      ['main.js, line 2: Unexpected token'],
      ['at main.js:2:1'],
    ]);
    expect(shellRuns).toHaveLength(0);
  });

  it('reports engine construction failures', async () => {
    const { out, deps } = setup(new FakeEngine(), {
      engineFactory: () => {
        throw new Error('no home');
      },
    });

    const result = await executeRun(['main.js'], deps);

    expect(result.exitCode).toBe(EXIT_FAILURE);
    expect(out.error.mock.calls).toEqual([
      ['EngineConstructionError: Failed to construct engine: no home'],
    ]);
  });

  it('reports shell failures', async () => {
    const { out, deps } = setup(new FakeEngine(), {
      shellFactory: () => ({ run: () => Promise.reject(new Error('tty gone')) }),
    });

    const result = await executeRun([], deps);

    expect(result.exitCode).toBe(EXIT_FAILURE);
    expect(out.error).toHaveBeenCalledWith('Error: tty gone');
  });

  it('writes debug traces only when debug is enabled', async () => {
    const write = vi.fn(() => true);
    const { deps } = setup(new FakeEngine(), { logSink: { write } });

    await executeRun(['-d'], deps);
    expect(write).toHaveBeenCalledWith(
      expect.stringMatching(/\[spindle\] starting shell \(silent=false\)\n$/),
    );

    write.mockClear();
    await executeRun([], deps);
    expect(write).not.toHaveBeenCalled();
  });
});

describe('shouldStartShell', () => {
  const base = {
    runShell: false,
    debug: false,
    silent: false,
    verbose: false,
    optLevel: 0,
    bootScripts: [],
    scriptArgs: [],
  };

  it('starts only without script and expression, or when requested', () => {
    expect(shouldStartShell(base)).toBe(true);
    expect(shouldStartShell({ ...base, expression: '1+1' })).toBe(false);
    expect(shouldStartShell({ ...base, scriptName: 'main.js' })).toBe(false);
    expect(shouldStartShell({ ...base, expression: '1+1', runShell: true })).toBe(true);
  });
});
