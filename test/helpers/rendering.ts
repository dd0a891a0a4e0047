import { generate, GenerateOptions, GenerationResult, TargetOutput } from '../../src/generator';
import type { RenderedFile } from '../../src/codegen-interface';
import type { SealedModule, TargetLanguage } from '../../src/types';
import { formatDiagnostic } from '../../src/types';

export function outputFor(result: GenerationResult, target: TargetLanguage): TargetOutput {
  if (result.kind === 'invalid') {
    throw new Error(`module is invalid:\n${result.diagnostics.map(formatDiagnostic).join('\n')}`);
  }
  const output = result.outputs.get(target);
  if (!output) {
    throw new Error(`no output for ${target}`);
  }
  return output;
}

export function filesFor(result: GenerationResult, target: TargetLanguage): RenderedFile[] {
  const output = outputFor(result, target);
  if (output.kind === 'failed') {
    throw output.error;
  }
  if (output.kind === 'unsupported') {
    throw new Error(`${target} unsupported:\n${output.diagnostics.map(formatDiagnostic).join('\n')}`);
  }
  return output.files;
}

export function fileContent(files: readonly RenderedFile[], path: string): string {
  const file = files.find(candidate => candidate.path === path);
  if (!file) {
    throw new Error(`no file '${path}' among ${files.map(candidate => candidate.path).join(', ')}`);
  }
  return file.content;
}

// Renders a module for one target and returns the content of its single file
export function renderSingle(
  sealed: SealedModule,
  target: TargetLanguage,
  options: Partial<GenerateOptions> = {}
): string {
  const files = filesFor(generate(sealed, [target], options), target);
  if (files.length !== 1) {
    throw new Error(`expected one file, got ${files.map(file => file.path).join(', ')}`);
  }
  return files[0].content;
}
