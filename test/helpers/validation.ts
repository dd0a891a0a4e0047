import { validate, ValidatedModule, ValidateOptions } from '../../src/validation/validator';
import type { Diagnostic, SealedModule } from '../../src/types';
import { formatDiagnostic } from '../../src/types';

type TestValidationOptions = ValidateOptions & {
  imports?: readonly SealedModule[];
};

// Validates a sealed module and fails the test with every diagnostic if it is invalid
export function validateForTests(sealed: SealedModule, options: TestValidationOptions = {}): ValidatedModule {
  const result = validate(sealed, options.imports ?? [], options);
  if (result.state === 'invalid') {
    const details = result.diagnostics.map(formatDiagnostic).join('\n');
    throw new Error(`Validation failed for test module:\n${details}`);
  }
  return result.validated;
}

// The diagnostics of a module expected to be invalid
export function diagnosticsFor(sealed: SealedModule, options: TestValidationOptions = {}): readonly Diagnostic[] {
  const result = validate(sealed, options.imports ?? [], options);
  if (result.state === 'valid') {
    throw new Error(`expected module '${sealed.module.name}' to be invalid`);
  }
  return result.diagnostics;
}
