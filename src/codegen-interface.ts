// Interface for renderers to support multiple target languages

import { CapabilityProfile, TargetLanguage } from './types';
import { ValidatedModule } from './validation/validator';

export type CaseConvention = 'preserve' | 'camel' | 'pascal' | 'snake' | 'upper-snake';

// Case conventions applied to IR names before sanitising, per kind of name
export interface NamingOptions {
  // functions, methods, fields, parameters and locals
  values: CaseConvention;
  // classes, interfaces and type aliases
  types: CaseConvention;
  // module-level constants
  constants: CaseConvention;
}

export interface RenderOptions {
  indentSize: number;
  naming: NamingOptions;
  // Emit a Source Map V3 file next to every rendered file
  sourceMap: boolean;
  // Placed before the module's own header comments
  headerComment?: string;
}

export interface TypeScriptRenderOptions extends RenderOptions {
  // Appended to relative import specifiers, e.g. '.js' for NodeNext output
  importExtension: string;
}

export type PythonRenderOptions = RenderOptions;

export interface PhpRenderOptions extends RenderOptions {
  // Prepended to every namespace derived from a module name, e.g. 'App'
  namespacePrefix?: string;
}

export interface RenderOptionsByTarget {
  typescript: TypeScriptRenderOptions;
  python: PythonRenderOptions;
  php: PhpRenderOptions;
}

const PRESERVE_NAMES: NamingOptions = {
  values: 'preserve',
  types: 'preserve',
  constants: 'preserve'
};

export const DEFAULT_TYPESCRIPT_OPTIONS: TypeScriptRenderOptions = {
  indentSize: 2,
  naming: PRESERVE_NAMES,
  sourceMap: false,
  importExtension: ''
};

export const DEFAULT_PYTHON_OPTIONS: PythonRenderOptions = {
  indentSize: 4,
  naming: PRESERVE_NAMES,
  sourceMap: false
};

export const DEFAULT_PHP_OPTIONS: PhpRenderOptions = {
  indentSize: 4,
  naming: PRESERVE_NAMES,
  sourceMap: false
};

export interface RenderedFile {
  // Relative, '/'-separated, derived from the module name
  path: string;
  content: string;
}

export interface ICodeRenderer<T extends TargetLanguage = TargetLanguage> {
  readonly target: T;
  readonly capabilities: CapabilityProfile;
  render(validated: ValidatedModule, options?: Partial<RenderOptionsByTarget[T]>): RenderedFile[];
}
