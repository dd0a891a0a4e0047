// Bindings for the handful of environment symbols most generated modules need

import { ExternBinding, TargetLanguage, Type } from '../types';
import { commonTypes, createFunctionType } from '../type-utils';
import { ModuleBuilder } from './module-builder';

interface StandardExtern {
  entity: 'value' | 'class';
  type: Type;
  bindings: Record<TargetLanguage, ExternBinding>;
}

const STANDARD_EXTERNS = {
  print: {
    entity: 'value',
    type: createFunctionType([commonTypes.any], commonTypes.void),
    bindings: {
      typescript: { name: 'console.log' },
      python: { name: 'print' },
      php: { name: 'print', appendLine: true }
    }
  },
  Error: {
    entity: 'class',
    type: commonTypes.any,
    bindings: {
      typescript: { name: 'Error' },
      python: { name: 'Exception' },
      php: { name: 'Exception' }
    }
  },
  ValueError: {
    entity: 'class',
    type: commonTypes.any,
    bindings: {
      typescript: { name: 'RangeError' },
      python: { name: 'ValueError' },
      php: { name: 'InvalidArgumentException' }
    }
  }
} satisfies Record<string, StandardExtern>;

export type StandardExternName = keyof typeof STANDARD_EXTERNS;

// Declares the named standard externs on a module under their own names
export function useStandardExterns(module: ModuleBuilder, ...names: StandardExternName[]): void {
  for (const name of names) {
    const extern: StandardExtern = STANDARD_EXTERNS[name];
    module.extern(name, { entity: extern.entity, type: extern.type, bindings: extern.bindings });
  }
}
