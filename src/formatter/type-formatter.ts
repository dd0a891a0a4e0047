import { Parameter, Type } from '../types';
import { typeToString } from '../type-utils';

export class TypeFormatter {
  formatType(type: Type): string {
    return typeToString(type);
  }

  formatTypeParameters(names: readonly string[]): string {
    return names.length === 0 ? '' : `<${names.join(', ')}>`;
  }

  formatOptionalAnnotation(type: Type | undefined): string {
    return type ? `: ${this.formatType(type)}` : '';
  }

  formatParameterType(parameter: Parameter): string {
    return `${parameter.name}: ${this.formatType(parameter.type)}`;
  }
}
