/**
 * End-to-end runs of the runner and the lifecycle controller on the real
 * `node:vm` engine against scripts in a temporary directory.
 */

import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  createTempDir,
  fakeConsole,
  removeTempDir,
  writeScript,
} from '../../__test-utils__/index.ts';
import type { EngineOptions, ScriptEngine } from '../../engine/types.ts';
import { createVmEngine } from '../../engine/vm-engine.ts';
import { EXIT_FAILURE, EXIT_SUCCESS } from '../constants/exit-codes.ts';
import { LifecycleController } from '../execution/lifecycle.ts';
import { executeRun } from '../execution/runner.ts';

let dir: string;

beforeEach(async () => {
  dir = await createTempDir('spindle-cli-');
});

afterEach(async () => {
  await removeTempDir(dir);
});

const capturingFactory = () => {
  const engines: ScriptEngine[] = [];
  const factory = (options: EngineOptions): ScriptEngine => {
    const engine = createVmEngine(options);
    engines.push(engine);
    return engine;
  };
  return { engines, factory };
};

const baseDeps = () => ({
  cwd: dir,
  environment: { home: dir, modulePath: [], structuredLogs: false },
  logSink: { write: () => true },
});

describe('spindle runner on the vm engine', () => {
  it('evaluates the expression before running the script with its arguments', async () => {
    await writeScript(
      dir,
      'main.js',
      "globalThis.seen.push('script');\nglobalThis.args = require('system').args.join(',');",
    );
    const { engines, factory } = capturingFactory();
    const out = fakeConsole();

    const argv = ['-e', "globalThis.seen = ['expression']", 'main.js', 'a', '-b'];

    const result = await executeRun(argv, { ...baseDeps(), console: out, engineFactory: factory });

    expect(result).toEqual({ exitCode: EXIT_SUCCESS });
    expect(out.error).not.toHaveBeenCalled();
    const [engine] = engines;
    expect(engine?.evaluateExpression('seen.join()')).toBe('expression,script');
    expect(engine?.evaluateExpression('args')).toBe('main.js,a,-b');
  });

  it('runs bootstrap scripts and resolves modules from the home modules directory', async () => {
    await writeScript(dir, 'boot.js', 'globalThis.greeting = "hi";');
    await writeScript(
      dir,
      'modules/greeter/index.js',
      'exports.greet = (n) => greeting + " " + n;',
    );
    await writeScript(dir, 'main.js', "globalThis.out = require('greeter').greet('there');");
    const { engines, factory } = capturingFactory();

    const result = await executeRun(['-b', 'boot.js', 'main.js'], {
      ...baseDeps(),
      console: fakeConsole(),
      engineFactory: factory,
    });

    expect(result.exitCode).toBe(EXIT_SUCCESS);
    expect(engines[0]?.evaluateExpression('out')).toBe('hi there');
  });

  it('prints the syntax error list for a broken script', async () => {
    const file = await writeScript(dir, 'broken.js', 'exports.ok = 1;\nexports.bad = ;');
    const out = fakeConsole();

    const result = await executeRun(['broken.js'], { ...baseDeps(), console: out });

    expect(result.exitCode).toBe(EXIT_FAILURE);
    expect(out.errorLines()).toEqual([
      "SyntaxError: Unexpected token ';'",
      `${file}, line 2: Unexpected token ';'`,
    ]);
  });

  it('denies host modules under a policy', async () => {
    await writeScript(dir, 'main.js', "require('node:fs');");
    const out = fakeConsole();

    const result = await executeRun(['-p', 'file:/etc/spindle.policy', 'main.js'], {
      ...baseDeps(),
      console: out,
    });

    expect(result.exitCode).toBe(EXIT_FAILURE);
    expect(out.errorLines()[0]).toBe('Access to host module "node:fs" is denied by policy');
  });
});

describe('lifecycle controller on the vm engine', () => {
  it('drives the module hooks in order', async () => {
    await writeScript(
      dir,
      'service.js',
      [
        'const calls = [];',
        'exports.init = (...args) => calls.push("init:" + args.join(","));',
        'exports.start = () => calls.push("start");',
        'exports.stop = () => calls.push("stop");',
        'exports.destroy = () => { globalThis.calls = calls.concat("destroy"); };',
      ].join('\n'),
    );
    const { engines, factory } = capturingFactory();
    const controller = new LifecycleController({
      ...baseDeps(),
      console: fakeConsole(),
      engineFactory: factory,
    });

    expect(controller.init(['service.js', '8080']).exitCode).toBe(EXIT_SUCCESS);
    controller.start();
    controller.stop();
    controller.destroy();

    expect(controller.state).toBe('destroyed');
    expect(engines[0]?.evaluateExpression('calls.join(" ")')).toBe(
      'init:8080 start stop destroy',
    );
  });

  it('gives the daemon module its system args during init', async () => {
    await writeScript(
      dir,
      'svc.js',
      "exports.init = () => { globalThis.sysArgs = require('system').args.join(','); };",
    );
    const { engines, factory } = capturingFactory();
    const controller = new LifecycleController({
      ...baseDeps(),
      console: fakeConsole(),
      engineFactory: factory,
    });

    expect(controller.init(['svc.js', 'a', 'b']).exitCode).toBe(EXIT_SUCCESS);
    expect(engines[0]?.evaluateExpression('sysArgs')).toBe('svc.js,a,b');
  });

  it('reports a throwing hook with its script frame', async () => {
    const file = await writeScript(
      dir,
      'service.js',
      'exports.start = function () {\n  throw new Error("no port");\n};',
    );
    const out = fakeConsole();
    const controller = new LifecycleController({ ...baseDeps(), console: out });

    controller.init(['service.js']);
    expect(controller.start()).toEqual({ exitCode: EXIT_FAILURE });

    const [message, frames] = out.errorLines();
    expect(message).toBe('Error: no port');
    expect(frames).toContain(`${path.join(dir, 'service.js')}:2:`);
    expect(file).toBe(path.join(dir, 'service.js'));
    expect(controller.state).toBe('destroyed');
  });
});
