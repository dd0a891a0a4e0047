// Generation driver: validates a module once and renders it for each target

import { Diagnostic, InternalConsistencyError, SealedModule, TargetLanguage } from './types';
import { ICodeRenderer, RenderOptionsByTarget, RenderedFile } from './codegen-interface';
import { CapabilityMode, ValidatedModule, validate } from './validation/validator';
import { TypeScriptRenderer } from './codegen/tsgen';
import { PythonRenderer } from './codegen/pygen';
import { PhpRenderer } from './codegen/phpgen';
import { logger } from './logger';

export type RenderOverrides = { [T in TargetLanguage]?: Partial<RenderOptionsByTarget[T]> };

export interface GenerateOptions {
  capabilityMode: CapabilityMode;
  render: RenderOverrides;
  verbose: boolean;
  // Sealed modules the generated module may import from
  availableModules: readonly SealedModule[];
}

export const DEFAULT_GENERATE_OPTIONS: GenerateOptions = {
  capabilityMode: 'per-target',
  render: {},
  verbose: false,
  availableModules: []
};

export type TargetOutput =
  | { kind: 'rendered'; files: RenderedFile[] }
  | { kind: 'unsupported'; diagnostics: readonly Diagnostic[] }
  | { kind: 'failed'; error: InternalConsistencyError };

export type GenerationResult =
  | { kind: 'invalid'; diagnostics: readonly Diagnostic[] }
  | { kind: 'generated'; outputs: Map<TargetLanguage, TargetOutput>; diagnostics: readonly Diagnostic[] };

const RENDERERS: { [T in TargetLanguage]: () => ICodeRenderer<T> } = {
  typescript: () => new TypeScriptRenderer(),
  python: () => new PythonRenderer(),
  php: () => new PhpRenderer()
};

export function createRenderer<T extends TargetLanguage>(target: T): ICodeRenderer<T> {
  return RENDERERS[target]();
}

function log(options: GenerateOptions, message: string): void {
  if (options.verbose) {
    logger.info(`[Generator] ${message}`);
  } else {
    logger.debug(`[Generator] ${message}`);
  }
}

// Renders one target; a renderer fault is reported for that target alone
function renderTarget<T extends TargetLanguage>(
  target: T,
  renderer: ICodeRenderer<T>,
  validated: ValidatedModule,
  options: GenerateOptions
): TargetOutput {
  const unsupported = validated.unsupported.get(target);
  if (unsupported) {
    log(options, `${validated.module.name}: ${target} skipped, ${unsupported.length} unsupported construct(s)`);
    return { kind: 'unsupported', diagnostics: unsupported };
  }
  try {
    const files = renderer.render(validated, options.render[target]);
    log(options, `${validated.module.name}: ${target} rendered ${files.length} file(s)`);
    return { kind: 'rendered', files };
  } catch (error) {
    const failure = error instanceof InternalConsistencyError
      ? error
      : new InternalConsistencyError(`renderer failed: ${error instanceof Error ? error.message : String(error)}`, target);
    logger.error(`[Generator] ${failure.message}`);
    return { kind: 'failed', error: failure };
  }
}

function generateValidated(
  sealed: SealedModule,
  targets: readonly TargetLanguage[],
  availableImports: readonly SealedModule[],
  options: GenerateOptions
): GenerationResult {
  const unique = [...new Set(targets)];
  const renderers = unique.map(target => createRenderer(target));
  const result = validate(sealed, availableImports, {
    targets: renderers.map(renderer => renderer.capabilities),
    capabilityMode: options.capabilityMode,
    verbose: options.verbose
  });
  if (result.state === 'invalid') {
    log(options, `${sealed.module.name}: invalid, ${result.diagnostics.length} diagnostic(s)`);
    return { kind: 'invalid', diagnostics: result.diagnostics };
  }

  const outputs = new Map<TargetLanguage, TargetOutput>();
  for (const renderer of renderers) {
    outputs.set(renderer.target, renderTarget(renderer.target, renderer, result.validated, options));
  }
  return { kind: 'generated', outputs, diagnostics: result.diagnostics };
}

/**
 * Validates `module` and renders it for every requested target. A target
 * that cannot express the module, or whose renderer fails, does not stop
 * the others.
 */
export function generate(
  module: SealedModule,
  targets: readonly TargetLanguage[],
  options: Partial<GenerateOptions> = {}
): GenerationResult {
  const merged: GenerateOptions = { ...DEFAULT_GENERATE_OPTIONS, ...options };
  return generateValidated(module, targets, merged.availableModules, merged);
}

// Each module is validated against all the others, so they may import one another
export function generateProject(
  modules: readonly SealedModule[],
  targets: readonly TargetLanguage[],
  options: Partial<GenerateOptions> = {}
): Map<string, GenerationResult> {
  const merged: GenerateOptions = { ...DEFAULT_GENERATE_OPTIONS, ...options };
  const results = new Map<string, GenerationResult>();
  for (const sealed of modules) {
    const others = [...modules.filter(other => other !== sealed), ...merged.availableModules];
    log(merged, `Generating ${sealed.module.name} for ${targets.join(', ')}`);
    results.set(sealed.module.name, generateValidated(sealed, targets, others, merged));
  }
  return results;
}
