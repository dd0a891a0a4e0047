import {
  BinaryExpression,
  CallArgument,
  Expression,
  LambdaExpression,
  LiteralExpression,
  MappingLiteral,
  TemplateExpression,
} from '../types';
import { TypeFormatter } from './type-formatter';

// Operands that are themselves operator expressions are always parenthesised,
// so the listing never depends on a precedence table
function isCompound(expr: Expression): boolean {
  return expr.kind === 'binary' || expr.kind === 'conditional' || expr.kind === 'lambda'
    || (expr.kind === 'unary' && expr.operator === 'not');
}

export function formatFloat(value: number): string {
  const text = String(value);
  return Number.isInteger(value) && !/[eE]/.test(text) ? `${text}.0` : text;
}

export class ExpressionFormatter {
  constructor(private readonly typeFormatter: TypeFormatter) {}

  formatExpression(expr: Expression): string {
    switch (expr.kind) {
      case 'literal':
        return this.formatLiteral(expr);
      case 'name':
        return expr.name;
      case 'self':
        return 'self';
      case 'member':
        return `${this.formatOperand(expr.object)}.${expr.property}`;
      case 'index':
        return `${this.formatOperand(expr.object)}[${this.formatExpression(expr.index)}]`;
      case 'call':
        return `${this.formatOperand(expr.callee)}(${this.formatArguments(expr.arguments)})`;
      case 'instantiate':
        return `new ${this.typeFormatter.formatType(expr.type)}(${this.formatArguments(expr.arguments)})`;
      case 'binary':
        return this.formatBinaryExpression(expr);
      case 'unary':
        return expr.operator === 'not'
          ? `not ${this.formatOperand(expr.operand)}`
          : `-${this.formatOperand(expr.operand)}`;
      case 'conditional':
        return `${this.formatOperand(expr.test)} ? ${this.formatOperand(expr.consequent)} : ${this.formatOperand(expr.alternate)}`;
      case 'sequenceLiteral': {
        const prefix = expr.elements.length === 0 && expr.elementType
          ? `Sequence<${this.typeFormatter.formatType(expr.elementType)}>`
          : '';
        return `${prefix}[${expr.elements.map(e => this.formatExpression(e)).join(', ')}]`;
      }
      case 'setLiteral': {
        const prefix = expr.elementType ? `Set<${this.typeFormatter.formatType(expr.elementType)}>` : 'Set';
        return `${prefix}{${expr.elements.map(e => this.formatExpression(e)).join(', ')}}`;
      }
      case 'mappingLiteral':
        return this.formatMappingLiteral(expr);
      case 'lambda':
        return this.formatLambdaExpression(expr);
      case 'template':
        return this.formatTemplate(expr);
      case 'cast':
        return `cast<${this.typeFormatter.formatType(expr.type)}>(${this.formatExpression(expr.expression)})`;
      case 'length':
        return `len(${this.formatExpression(expr.target)})`;
      case 'typeTest':
        return `is ${expr.tested}(${this.formatExpression(expr.operand)})`;
      case 'omit':
        return 'omit';
    }
  }

  formatArguments(args: readonly CallArgument[]): string {
    return args
      .map(arg => (arg.name === undefined ? '' : `${arg.name}=`) + this.formatExpression(arg.value))
      .join(', ');
  }

  private formatOperand(expr: Expression): string {
    const text = this.formatExpression(expr);
    return isCompound(expr) ? `(${text})` : text;
  }

  private formatLiteral(expr: LiteralExpression): string {
    const value = expr.value;
    if (value === null) {
      return 'null';
    }
    if (typeof value === 'string') {
      return JSON.stringify(value);
    }
    if (typeof value === 'number') {
      return expr.literalType === 'float' ? formatFloat(value) : String(value);
    }
    return value ? 'true' : 'false';
  }

  private formatBinaryExpression(expr: BinaryExpression): string {
    return `${this.formatOperand(expr.left)} ${expr.operator} ${this.formatOperand(expr.right)}`;
  }

  private formatMappingLiteral(expr: MappingLiteral): string {
    const entries = expr.entries
      .map(entry => `${this.formatExpression(entry.key)}: ${this.formatExpression(entry.value)}`)
      .join(', ');
    if (expr.entries.length === 0 && expr.keyType && expr.valueType) {
      return `Mapping<${this.typeFormatter.formatType(expr.keyType)}, ${this.typeFormatter.formatType(expr.valueType)}>{}`;
    }
    return `{${entries}}`;
  }

  private formatLambdaExpression(expr: LambdaExpression): string {
    const params = expr.parameters.map(p => `${p.name}: ${this.typeFormatter.formatType(p.type)}`).join(', ');
    return `(${params})${this.typeFormatter.formatOptionalAnnotation(expr.returnType)} => ${this.formatExpression(expr.body)}`;
  }

  private formatTemplate(expr: TemplateExpression): string {
    const body = expr.parts
      .map(part => (typeof part === 'string' ? part.replace(/[`\\$]/g, c => `\\${c}`) : `\${${this.formatExpression(part)}}`))
      .join('');
    return `\`${body}\``;
  }
}
