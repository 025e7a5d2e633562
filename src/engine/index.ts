/**
 * Script engine public surface.
 */

export {
  buildSearchRoots,
  isPathLike,
  MODULES_DIRNAME,
  resolveModulePath,
} from './module-resolver.ts';
export type {
  EngineFactory,
  EngineOptions,
  InvokeResult,
  ScriptEngine,
  ScriptModule,
} from './types.ts';
export {
  createVmEngine,
  EXPRESSION_SOURCE,
  SYSTEM_MODULE,
  toSyntaxDiagnostic,
  VmEngine,
} from './vm-engine.ts';
