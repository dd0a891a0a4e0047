// Parenthesisation shared by the renderers; each target supplies its own table

export interface RenderedExpression {
  code: string;
  // Higher binds tighter
  precedence: number;
}

// 'associative' operators regroup freely, so equal precedence never needs parens
export type Associativity = 'left' | 'right' | 'none' | 'associative';

export function rendered(code: string, precedence: number): RenderedExpression {
  return { code, precedence };
}

export function parenthesize(expr: RenderedExpression): string {
  return `(${expr.code})`;
}

// Wraps `expr` when it binds looser than `minimum`
export function atLeast(expr: RenderedExpression, minimum: number): string {
  return expr.precedence < minimum ? parenthesize(expr) : expr.code;
}

/**
 * Renders one operand of a binary operator. Equal precedence keeps the
 * operand bare only on the side the operator associates towards.
 */
export function binaryOperand(
  operand: RenderedExpression,
  parentPrecedence: number,
  side: 'left' | 'right',
  associativity: Associativity
): string {
  if (operand.precedence < parentPrecedence) {
    return parenthesize(operand);
  }
  if (operand.precedence > parentPrecedence || associativity === 'associative') {
    return operand.code;
  }
  if (associativity === 'none') {
    return parenthesize(operand);
  }
  return (associativity === 'left') === (side === 'left') ? operand.code : parenthesize(operand);
}
