// TypeScript expression code generation

import {
    BinaryExpression, BinaryOperator, CallArgument, CallExpression, Expression, IRPath, LambdaExpression,
    LiteralExpression, MappingLiteral, MemberExpression, TemplateExpression, TypeTestExpression
} from '../../types';
import { Associativity, RenderedExpression, atLeast, binaryOperand, rendered } from '../shared/precedence';
import { TsRenderContext } from './ts-context';
import { generateType } from './ts-type-codegen';

export const TS_PRECEDENCE = {
    lambda: 1,
    conditional: 2,
    or: 3,
    and: 4,
    equality: 5,
    relational: 6,
    additive: 7,
    multiplicative: 8,
    unary: 9,
    postfix: 10,
    primary: 11
} as const;

interface OperatorInfo {
    token: string;
    precedence: number;
    associativity: Associativity;
}

const BINARY_OPERATORS: Record<BinaryOperator, OperatorInfo> = {
    '+': { token: '+', precedence: TS_PRECEDENCE.additive, associativity: 'left' },
    '-': { token: '-', precedence: TS_PRECEDENCE.additive, associativity: 'left' },
    '*': { token: '*', precedence: TS_PRECEDENCE.multiplicative, associativity: 'left' },
    '/': { token: '/', precedence: TS_PRECEDENCE.multiplicative, associativity: 'left' },
    '%': { token: '%', precedence: TS_PRECEDENCE.multiplicative, associativity: 'left' },
    '==': { token: '===', precedence: TS_PRECEDENCE.equality, associativity: 'none' },
    '!=': { token: '!==', precedence: TS_PRECEDENCE.equality, associativity: 'none' },
    '<': { token: '<', precedence: TS_PRECEDENCE.relational, associativity: 'none' },
    '<=': { token: '<=', precedence: TS_PRECEDENCE.relational, associativity: 'none' },
    '>': { token: '>', precedence: TS_PRECEDENCE.relational, associativity: 'none' },
    '>=': { token: '>=', precedence: TS_PRECEDENCE.relational, associativity: 'none' },
    'and': { token: '&&', precedence: TS_PRECEDENCE.and, associativity: 'associative' },
    'or': { token: '||', precedence: TS_PRECEDENCE.or, associativity: 'associative' }
};

const IDENTIFIER_KEY = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function renderExpression(ctx: TsRenderContext, expr: Expression, path: IRPath): string {
    return generateExpression(ctx, expr, path).code;
}

export function generateExpression(ctx: TsRenderContext, expr: Expression, path: IRPath): RenderedExpression {
    switch (expr.kind) {
        case 'literal':
            return generateLiteral(expr);
        case 'name':
            return rendered(ctx.valueName(expr.name, path), TS_PRECEDENCE.primary);
        case 'self':
            return rendered('this', TS_PRECEDENCE.primary);
        case 'member':
            return generateMemberExpression(ctx, expr, path, false);
        case 'index': {
            const object = generateExpression(ctx, expr.object, [...path, 'object']);
            const index = renderExpression(ctx, expr.index, [...path, 'index']);
            return rendered(`${atLeast(object, TS_PRECEDENCE.postfix)}[${index}]`, TS_PRECEDENCE.postfix);
        }
        case 'call':
            return generateCallExpression(ctx, expr, path);
        case 'instantiate': {
            const type = generateType(ctx, expr.type, [...path, 'type']);
            return rendered(`new ${type}(${generateArguments(ctx, expr.arguments, path)})`, TS_PRECEDENCE.postfix);
        }
        case 'binary':
            return generateBinaryExpression(ctx, expr, path);
        case 'unary': {
            const operand = generateExpression(ctx, expr.operand, [...path, 'operand']);
            if (expr.operator === 'not') {
                return rendered(`!${atLeast(operand, TS_PRECEDENCE.unary)}`, TS_PRECEDENCE.unary);
            }
            // '--x' would be a decrement
            const text = operand.code.startsWith('-') ? `(${operand.code})` : atLeast(operand, TS_PRECEDENCE.unary);
            return rendered(`-${text}`, TS_PRECEDENCE.unary);
        }
        case 'conditional': {
            const test = generateExpression(ctx, expr.test, [...path, 'test']);
            const consequent = generateExpression(ctx, expr.consequent, [...path, 'consequent']);
            const alternate = generateExpression(ctx, expr.alternate, [...path, 'alternate']);
            return rendered(
                `${atLeast(test, TS_PRECEDENCE.or)} ? ${atLeast(consequent, TS_PRECEDENCE.conditional)} : ${atLeast(alternate, TS_PRECEDENCE.conditional)}`,
                TS_PRECEDENCE.conditional
            );
        }
        case 'sequenceLiteral': {
            const elements = expr.elements.map((element, i) => renderExpression(ctx, element, [...path, 'elements', i]));
            return rendered(`[${elements.join(', ')}]`, TS_PRECEDENCE.primary);
        }
        case 'setLiteral': {
            const elements = expr.elements.map((element, i) => renderExpression(ctx, element, [...path, 'elements', i]));
            const typeArgument = expr.elementType ? `<${generateType(ctx, expr.elementType, [...path, 'elementType'])}>` : '';
            const initial = elements.length > 0 ? `[${elements.join(', ')}]` : '';
            return rendered(`new Set${typeArgument}(${initial})`, TS_PRECEDENCE.postfix);
        }
        case 'mappingLiteral':
            return generateMappingLiteral(ctx, expr, path);
        case 'lambda':
            return generateLambdaExpression(ctx, expr, path);
        case 'template':
            return generateTemplate(ctx, expr, path);
        case 'cast': {
            const inner = generateExpression(ctx, expr.expression, [...path, 'expression']);
            const type = generateType(ctx, expr.type, [...path, 'type']);
            return rendered(`${atLeast(inner, TS_PRECEDENCE.relational)} as ${type}`, TS_PRECEDENCE.relational);
        }
        case 'length': {
            const targetPath = [...path, 'target'];
            const target = atLeast(generateExpression(ctx, expr.target, targetPath), TS_PRECEDENCE.postfix);
            const type = ctx.underlyingType(ctx.typeOf(targetPath));
            if (type.kind === 'set') {
                return rendered(`${target}.size`, TS_PRECEDENCE.postfix);
            }
            if (type.kind === 'mapping') {
                return rendered(`Object.keys(${renderExpression(ctx, expr.target, targetPath)}).length`, TS_PRECEDENCE.postfix);
            }
            return rendered(`${target}.length`, TS_PRECEDENCE.postfix);
        }
        case 'typeTest':
            return generateTypeTest(ctx, expr, path);
        case 'omit':
            return rendered('undefined', TS_PRECEDENCE.primary);
    }
}

function generateTypeTest(ctx: TsRenderContext, expr: TypeTestExpression, path: IRPath): RenderedExpression {
    const operand = generateExpression(ctx, expr.operand, [...path, 'operand']);
    const compared = (right: string): RenderedExpression => rendered(
        `${binaryOperand(operand, TS_PRECEDENCE.equality, 'left', 'none')} === ${right}`,
        TS_PRECEDENCE.equality
    );
    const typeOf = (name: string): RenderedExpression => rendered(
        `typeof ${atLeast(operand, TS_PRECEDENCE.unary)} === ${JSON.stringify(name)}`,
        TS_PRECEDENCE.equality
    );
    switch (expr.tested) {
        case 'null':
            return compared('null');
        case 'omitted':
            return compared('undefined');
        case 'bool':
            return typeOf('boolean');
        case 'string':
            return typeOf('string');
        case 'int':
            return rendered(`Number.isInteger(${operand.code})`, TS_PRECEDENCE.postfix);
        case 'list':
            return rendered(`Array.isArray(${operand.code})`, TS_PRECEDENCE.postfix);
    }
}

function generateLiteral(expr: LiteralExpression): RenderedExpression {
    const value = expr.value;
    if (value === null) {
        return rendered('null', TS_PRECEDENCE.primary);
    }
    if (typeof value === 'string') {
        return rendered(JSON.stringify(value), TS_PRECEDENCE.primary);
    }
    if (typeof value === 'number') {
        return rendered(String(value), value < 0 ? TS_PRECEDENCE.unary : TS_PRECEDENCE.primary);
    }
    return rendered(value ? 'true' : 'false', TS_PRECEDENCE.primary);
}

/**
 * `object.member`. An instance method used as a value is bound to its
 * receiver so `this` survives the call.
 */
function generateMemberExpression(
    ctx: TsRenderContext,
    expr: MemberExpression,
    path: IRPath,
    asCallee: boolean
): RenderedExpression {
    const resolution = ctx.memberOf(path);
    const name = ctx.memberName(resolution, expr.property);
    const object = generateExpression(ctx, expr.object, [...path, 'object']);
    const access = `${atLeast(object, TS_PRECEDENCE.postfix)}.${name}`;
    if (asCallee || !resolution || resolution.member !== 'method' || resolution.isStatic) {
        return rendered(access, TS_PRECEDENCE.postfix);
    }
    if (expr.object.kind === 'self' || expr.object.kind === 'name') {
        return rendered(`${access}.bind(${object.code})`, TS_PRECEDENCE.postfix);
    }
    const receiver = ctx.withScope(() => ctx.freshLocal('receiver'));
    return rendered(
        `((${receiver}) => ${receiver}.${name}.bind(${receiver}))(${object.code})`,
        TS_PRECEDENCE.postfix
    );
}

function generateCallExpression(ctx: TsRenderContext, expr: CallExpression, path: IRPath): RenderedExpression {
    const calleePath = [...path, 'callee'];
    const callee = expr.callee.kind === 'member'
        ? generateMemberExpression(ctx, expr.callee, calleePath, true)
        : generateExpression(ctx, expr.callee, calleePath);
    const args = generateArguments(ctx, expr.arguments, path, ctx.appendsLine(calleePath));
    return rendered(`${atLeast(callee, TS_PRECEDENCE.postfix)}(${args})`, TS_PRECEDENCE.postfix);
}

export function generateArguments(
    ctx: TsRenderContext,
    args: readonly CallArgument[],
    path: IRPath,
    appendLine = false
): string {
    return args
        .map((arg, i) => {
            const argPath = [...path, 'arguments', i];
            if (arg.name !== undefined) {
                return ctx.fail(`named argument '${arg.name}' reached the TypeScript renderer`, argPath);
            }
            const value = generateExpression(ctx, arg.value, [...argPath, 'value']);
            if (appendLine && i === args.length - 1) {
                return `${binaryOperand(value, TS_PRECEDENCE.additive, 'left', 'left')} + "\\n"`;
            }
            return value.code;
        })
        .join(', ');
}

function generateBinaryExpression(ctx: TsRenderContext, expr: BinaryExpression, path: IRPath): RenderedExpression {
    const info = BINARY_OPERATORS[expr.operator];
    const left = generateExpression(ctx, expr.left, [...path, 'left']);
    const right = generateExpression(ctx, expr.right, [...path, 'right']);
    return rendered(
        `${binaryOperand(left, info.precedence, 'left', info.associativity)} ${info.token} ${binaryOperand(right, info.precedence, 'right', info.associativity)}`,
        info.precedence
    );
}

function generateMappingKey(ctx: TsRenderContext, key: Expression, path: IRPath): string {
    if (key.kind === 'literal' && typeof key.value === 'string') {
        return IDENTIFIER_KEY.test(key.value) ? key.value : JSON.stringify(key.value);
    }
    if (key.kind === 'literal' && typeof key.value === 'number' && key.value >= 0) {
        return String(key.value);
    }
    return `[${renderExpression(ctx, key, path)}]`;
}

function generateMappingLiteral(ctx: TsRenderContext, expr: MappingLiteral, path: IRPath): RenderedExpression {
    if (expr.entries.length === 0) {
        return rendered('{}', TS_PRECEDENCE.primary);
    }
    const entries = expr.entries.map((entry, i) => {
        const entryPath = [...path, 'entries', i];
        return `${generateMappingKey(ctx, entry.key, [...entryPath, 'key'])}: ${renderExpression(ctx, entry.value, [...entryPath, 'value'])}`;
    });
    return rendered(`{ ${entries.join(', ')} }`, TS_PRECEDENCE.primary);
}

function generateLambdaExpression(ctx: TsRenderContext, expr: LambdaExpression, path: IRPath): RenderedExpression {
    return ctx.withScope(() => {
        const params = expr.parameters.map((param, i) => {
            const name = ctx.declareLocal(param.name);
            return `${name}: ${generateType(ctx, param.type, [...path, 'parameters', i, 'type'])}`;
        });
        const returnType = expr.returnType ? `: ${generateType(ctx, expr.returnType, [...path, 'returnType'])}` : '';
        const body = generateExpression(ctx, expr.body, [...path, 'body']);
        // an object literal body would read as a block
        const bodyText = expr.body.kind === 'mappingLiteral' ? `(${body.code})` : atLeast(body, TS_PRECEDENCE.conditional);
        return rendered(`(${params.join(', ')})${returnType} => ${bodyText}`, TS_PRECEDENCE.lambda);
    });
}

function generateTemplate(ctx: TsRenderContext, expr: TemplateExpression, path: IRPath): RenderedExpression {
    const body = expr.parts
        .map((part, i) => {
            if (typeof part === 'string') {
                return part.replace(/[`\\]/g, c => `\\${c}`).replace(/\$\{/g, '\\${');
            }
            return `\${${renderExpression(ctx, part, [...path, 'parts', i])}}`;
        })
        .join('');
    return rendered(`\`${body}\``, TS_PRECEDENCE.primary);
}
