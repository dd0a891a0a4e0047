// Main exports for crossgen

export * from './types';
export * from './type-utils';
export * from './builder';
export { validate } from './validation/validator';
export type { CapabilityMode, ValidateOptions, ValidatedModule, ValidationResult } from './validation/validator';
export { Formatter, formatModule, DEFAULT_FORMATTER_OPTIONS } from './formatter';
export type { FormatterOptions, IRListing } from './formatter';
export {
  DEFAULT_TYPESCRIPT_OPTIONS, DEFAULT_PYTHON_OPTIONS, DEFAULT_PHP_OPTIONS
} from './codegen-interface';
export type {
  CaseConvention, NamingOptions, RenderOptions, TypeScriptRenderOptions, PythonRenderOptions, PhpRenderOptions,
  RenderOptionsByTarget, RenderedFile, ICodeRenderer
} from './codegen-interface';
export { TypeScriptRenderer, TYPESCRIPT_CAPABILITIES } from './codegen/tsgen';
export { PythonRenderer, PYTHON_CAPABILITIES } from './codegen/pygen';
export { PhpRenderer, PHP_CAPABILITIES } from './codegen/phpgen';
export { generate, generateProject, createRenderer, DEFAULT_GENERATE_OPTIONS } from './generator';
export type { GenerateOptions, GenerationResult, RenderOverrides, TargetOutput } from './generator';
export { logger, Logger, LogLevel } from './logger';
