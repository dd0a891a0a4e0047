// Validator for crossgen modules: namespace, reference, type and capability passes

import {
  Module, SealedModule, Diagnostic, IRPath, Type, ClassDeclaration, MemberResolution,
  TargetLanguage, CapabilityProfile, ConstructKind, StructuralError, formatIRPath
} from "../types";
import { isAssignable, typeToString } from "../type-utils";
import { logger } from "../logger";
import { ModuleSymbols, ResolvedSymbol } from "./symbols";
import { validateNamespaces } from "./namespace-validator";
import { validateModuleDeclarations } from "./declaration-validator";
import { validateCapabilities } from "./capability-validator";

export type CapabilityMode = 'per-target' | 'all-targets';

export interface ValidateOptions {
  // Renderer capability sets to check against; none means no capability pass
  targets?: readonly CapabilityProfile[];
  capabilityMode?: CapabilityMode;
  verbose?: boolean;
}

/**
 * A module that passed validation, together with everything the validator
 * learned about it. Renderers accept nothing else.
 */
export interface ValidatedModule {
  readonly state: 'valid';
  readonly module: Module;
  readonly symbols: ModuleSymbols;
  // Inferred expression types keyed by formatted IR path
  readonly types: ReadonlyMap<string, Type>;
  readonly members: ReadonlyMap<string, MemberResolution>;
  // Module-level symbols that names, types and error classes resolved to
  readonly references: ReadonlyMap<string, ResolvedSymbol>;
  readonly supportedTargets: readonly TargetLanguage[];
  readonly unsupported: ReadonlyMap<TargetLanguage, readonly Diagnostic[]>;
}

export type ValidationResult =
  | { state: 'valid'; validated: ValidatedModule; diagnostics: readonly Diagnostic[] }
  | { state: 'invalid'; diagnostics: readonly Diagnostic[] };

export type ValidationPass = 'namespace' | 'reference' | 'type' | 'capability';

const PASS_ORDER: readonly ValidationPass[] = ['namespace', 'reference', 'type', 'capability'];

// A construct whose support depends on the target, found while checking types
export interface ConstructUse {
  construct: ConstructKind;
  path: IRPath;
  detail: string;
}

interface FunctionContext {
  returnType: Type;
  isAsync: boolean;
}

export class Validator {
  readonly symbols: ModuleSymbols;
  readonly types = new Map<string, Type>();
  readonly members = new Map<string, MemberResolution>();
  readonly references = new Map<string, ResolvedSymbol>();
  readonly constructs: ConstructUse[] = [];
  currentClass?: ClassDeclaration;
  // True where `self` is unavailable: free functions, static methods, defaults
  inStaticContext = true;
  private readonly diagnostics: Record<ValidationPass, Diagnostic[]> = {
    namespace: [],
    reference: [],
    type: [],
    capability: []
  };
  private readonly reported = new Set<string>();
  private readonly functionStack: FunctionContext[] = [];
  private readonly typeParameterStack: Array<readonly string[]> = [];

  constructor(readonly module: Module, readonly available: ReadonlyMap<string, Module>, readonly verbose: boolean = false) {
    this.symbols = new ModuleSymbols(module, available);
  }

  log(message: string): void {
    if (this.verbose) {
      logger.info(`[Validator] ${message}`);
    } else {
      logger.debug(`[Validator] ${message}`);
    }
  }

  // At most one diagnostic of each kind per IR position
  addDiagnostic(pass: ValidationPass, diagnostic: Diagnostic): void {
    const key = `${diagnostic.kind}|${diagnostic.target ?? ''}|${formatIRPath(diagnostic.path)}`;
    if (this.reported.has(key)) {
      return;
    }
    this.reported.add(key);
    this.diagnostics[pass].push(diagnostic);
  }

  reportDuplicate(path: IRPath, message: string): void {
    this.addDiagnostic('namespace', { kind: 'duplicate-name', message, path });
  }

  reportUnresolved(path: IRPath, message: string): void {
    this.addDiagnostic('reference', { kind: 'unresolved-reference', message, path });
  }

  reportMismatch(path: IRPath, expected: Type | string, inferred: Type | string, message?: string): void {
    const expectedText = typeof expected === 'string' ? expected : typeToString(expected);
    const inferredText = typeof inferred === 'string' ? inferred : typeToString(inferred);
    this.addDiagnostic('type', {
      kind: 'type-mismatch',
      message: message ?? `expected ${expectedText}, got ${inferredText}`,
      path,
      expected: expectedText,
      inferred: inferredText
    });
  }

  reportUnsupported(path: IRPath, target: TargetLanguage, construct: ConstructKind, message: string): void {
    this.addDiagnostic('capability', { kind: 'unsupported-construct', message, path, target, construct });
  }

  // Reports a mismatch at `path` unless `inferred` fits `expected`
  expectAssignable(path: IRPath, inferred: Type, expected: Type, message?: string): boolean {
    if (isAssignable(inferred, expected, this.symbols)) {
      return true;
    }
    this.reportMismatch(path, expected, inferred, message);
    return false;
  }

  recordType(path: IRPath, type: Type): Type {
    this.types.set(formatIRPath(path), type);
    return type;
  }

  recordMember(path: IRPath, resolution: MemberResolution): void {
    this.members.set(formatIRPath(path), resolution);
  }

  recordReference(path: IRPath, resolved: ResolvedSymbol): void {
    this.references.set(formatIRPath(path), resolved);
  }

  recordConstruct(construct: ConstructKind, path: IRPath, detail: string): void {
    this.constructs.push({ construct, path, detail });
  }

  pushTypeParameters(names: readonly string[]): void {
    this.typeParameterStack.push(names);
  }

  popTypeParameters(): void {
    this.typeParameterStack.pop();
  }

  isTypeParameter(name: string): boolean {
    return this.typeParameterStack.some(names => names.includes(name));
  }

  pushFunction(context: FunctionContext): void {
    this.functionStack.push(context);
  }

  popFunction(): void {
    this.functionStack.pop();
  }

  get currentFunction(): FunctionContext | undefined {
    return this.functionStack[this.functionStack.length - 1];
  }

  diagnosticsFor(pass: ValidationPass): readonly Diagnostic[] {
    return this.diagnostics[pass];
  }

  // Diagnostics of the first three passes, in pass order
  get errors(): Diagnostic[] {
    return PASS_ORDER.filter(pass => pass !== 'capability').flatMap(pass => this.diagnostics[pass]);
  }
}

function availableModules(module: Module, imports: Iterable<SealedModule>): Map<string, Module> {
  const available = new Map<string, Module>();
  for (const sealed of imports) {
    if (sealed.module.name !== module.name) {
      available.set(sealed.module.name, sealed.module);
    }
  }
  return available;
}

/**
 * Validates a sealed module against the modules it may import. The passes
 * run in order and every diagnostic is collected; nothing short-circuits.
 */
export function validate(
  sealed: SealedModule,
  availableImports: Iterable<SealedModule> = [],
  options: ValidateOptions = {}
): ValidationResult {
  if (sealed.state !== 'sealed' || !Object.isFrozen(sealed.module)) {
    throw new StructuralError('module must be sealed before validation', 'validate');
  }
  const module = sealed.module;
  const validator = new Validator(module, availableModules(module, availableImports), options.verbose ?? false);
  validator.log(`Validating module ${module.name}`);

  validateNamespaces(validator);
  validateModuleDeclarations(validator);
  const targets = options.targets ?? [];
  const unsupported = validateCapabilities(validator, targets);

  const errors = validator.errors;
  const capabilityDiagnostics = validator.diagnosticsFor('capability');
  validator.log(`${errors.length} error(s), ${capabilityDiagnostics.length} capability diagnostic(s) in ${module.name}`);

  const mode = options.capabilityMode ?? 'per-target';
  if (errors.length > 0 || (mode === 'all-targets' && capabilityDiagnostics.length > 0)) {
    return { state: 'invalid', diagnostics: [...errors, ...capabilityDiagnostics] };
  }

  const validated: ValidatedModule = {
    state: 'valid',
    module,
    symbols: validator.symbols,
    types: validator.types,
    members: validator.members,
    references: validator.references,
    supportedTargets: targets.map(profile => profile.target).filter(target => !unsupported.has(target)),
    unsupported
  };
  return { state: 'valid', validated, diagnostics: capabilityDiagnostics };
}
