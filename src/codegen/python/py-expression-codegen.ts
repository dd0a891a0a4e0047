// Python expression code generation

import {
    BinaryExpression, BinaryOperator, CallArgument, ClassDeclaration, Expression, IRPath, LambdaExpression, LiteralExpression,
    TemplateExpression, Type, TypeTestExpression
} from '../../types';
import { constructorParameters } from '../../validation/symbols';
import { applyCase, sanitizeIdentifier } from '../shared/naming';
import { Associativity, RenderedExpression, atLeast, binaryOperand, rendered } from '../shared/precedence';
import { PyRenderContext } from './py-context';
import { generateAnnotation } from './py-type-codegen';

export const PY_PRECEDENCE = {
    lambda: 1,
    conditional: 2,
    or: 3,
    and: 4,
    not: 5,
    comparison: 6,
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
    '+': { token: '+', precedence: PY_PRECEDENCE.additive, associativity: 'left' },
    '-': { token: '-', precedence: PY_PRECEDENCE.additive, associativity: 'left' },
    '*': { token: '*', precedence: PY_PRECEDENCE.multiplicative, associativity: 'left' },
    '/': { token: '/', precedence: PY_PRECEDENCE.multiplicative, associativity: 'left' },
    '%': { token: '%', precedence: PY_PRECEDENCE.multiplicative, associativity: 'left' },
    // comparisons chain in Python, so a nested one always gets parentheses
    '==': { token: '==', precedence: PY_PRECEDENCE.comparison, associativity: 'none' },
    '!=': { token: '!=', precedence: PY_PRECEDENCE.comparison, associativity: 'none' },
    '<': { token: '<', precedence: PY_PRECEDENCE.comparison, associativity: 'none' },
    '<=': { token: '<=', precedence: PY_PRECEDENCE.comparison, associativity: 'none' },
    '>': { token: '>', precedence: PY_PRECEDENCE.comparison, associativity: 'none' },
    '>=': { token: '>=', precedence: PY_PRECEDENCE.comparison, associativity: 'none' },
    'and': { token: 'and', precedence: PY_PRECEDENCE.and, associativity: 'associative' },
    'or': { token: 'or', precedence: PY_PRECEDENCE.or, associativity: 'associative' }
};

export function renderExpression(ctx: PyRenderContext, expr: Expression, path: IRPath): string {
    return generateExpression(ctx, expr, path).code;
}

export function generateExpression(ctx: PyRenderContext, expr: Expression, path: IRPath): RenderedExpression {
    switch (expr.kind) {
        case 'literal':
            return generateLiteral(expr);
        case 'name':
            return rendered(ctx.valueName(expr.name, path), PY_PRECEDENCE.primary);
        case 'self':
            return rendered('self', PY_PRECEDENCE.primary);
        case 'member': {
            const object = generateExpression(ctx, expr.object, [...path, 'object']);
            const name = ctx.memberName(ctx.memberOf(path), expr.property);
            return rendered(`${atLeast(object, PY_PRECEDENCE.postfix)}.${name}`, PY_PRECEDENCE.postfix);
        }
        case 'index': {
            const object = generateExpression(ctx, expr.object, [...path, 'object']);
            const index = renderExpression(ctx, expr.index, [...path, 'index']);
            return rendered(`${atLeast(object, PY_PRECEDENCE.postfix)}[${index}]`, PY_PRECEDENCE.postfix);
        }
        case 'call': {
            const callee = generateExpression(ctx, expr.callee, [...path, 'callee']);
            const spellings = calleeParameters(ctx, expr.callee, [...path, 'callee']);
            const args = generateArguments(ctx, expr.arguments, spellings, path, ctx.appendsLine([...path, 'callee']));
            return rendered(`${atLeast(callee, PY_PRECEDENCE.postfix)}(${args})`, PY_PRECEDENCE.postfix);
        }
        case 'instantiate': {
            const typePath = [...path, 'type'];
            const name = ctx.typeName(expr.type.name, typePath);
            const declaration = constructedClass(ctx, expr.type.name, typePath);
            const spellings = declaration ? ctx.parametersOf(constructorParameters(declaration)) : undefined;
            return rendered(`${name}(${generateArguments(ctx, expr.arguments, spellings, path)})`, PY_PRECEDENCE.postfix);
        }
        case 'binary':
            return generateBinaryExpression(ctx, expr, path);
        case 'unary': {
            const operand = generateExpression(ctx, expr.operand, [...path, 'operand']);
            if (expr.operator === 'not') {
                return rendered(`not ${atLeast(operand, PY_PRECEDENCE.not)}`, PY_PRECEDENCE.not);
            }
            const text = operand.code.startsWith('-') ? `(${operand.code})` : atLeast(operand, PY_PRECEDENCE.unary);
            return rendered(`-${text}`, PY_PRECEDENCE.unary);
        }
        case 'conditional': {
            const test = generateExpression(ctx, expr.test, [...path, 'test']);
            const consequent = generateExpression(ctx, expr.consequent, [...path, 'consequent']);
            const alternate = generateExpression(ctx, expr.alternate, [...path, 'alternate']);
            return rendered(
                `${atLeast(consequent, PY_PRECEDENCE.or)} if ${atLeast(test, PY_PRECEDENCE.or)} else ${atLeast(alternate, PY_PRECEDENCE.conditional)}`,
                PY_PRECEDENCE.conditional
            );
        }
        case 'sequenceLiteral': {
            const elements = expr.elements.map((element, i) => renderExpression(ctx, element, [...path, 'elements', i]));
            return rendered(`[${elements.join(', ')}]`, PY_PRECEDENCE.primary);
        }
        case 'setLiteral': {
            if (expr.elements.length === 0) {
                return rendered('set()', PY_PRECEDENCE.postfix);
            }
            const elements = expr.elements.map((element, i) => renderExpression(ctx, element, [...path, 'elements', i]));
            return rendered(`{${elements.join(', ')}}`, PY_PRECEDENCE.primary);
        }
        case 'mappingLiteral': {
            const entries = expr.entries.map((entry, i) => {
                const entryPath = [...path, 'entries', i];
                return `${renderExpression(ctx, entry.key, [...entryPath, 'key'])}: ${renderExpression(ctx, entry.value, [...entryPath, 'value'])}`;
            });
            return rendered(`{${entries.join(', ')}}`, PY_PRECEDENCE.primary);
        }
        case 'lambda':
            return generateLambdaExpression(ctx, expr, path);
        case 'template':
            return generateTemplate(ctx, expr, path);
        case 'cast': {
            const type = generateAnnotation(ctx, expr.type, [...path, 'type']);
            const inner = renderExpression(ctx, expr.expression, [...path, 'expression']);
            return rendered(`${ctx.typing('cast')}(${type}, ${inner})`, PY_PRECEDENCE.postfix);
        }
        case 'length':
            return rendered(`len(${renderExpression(ctx, expr.target, [...path, 'target'])})`, PY_PRECEDENCE.postfix);
        case 'typeTest':
            return generateTypeTest(ctx, expr, path);
        case 'omit':
            return rendered('...', PY_PRECEDENCE.primary);
    }
}

// bool is a subclass of int, so an int test excludes it
function generateTypeTest(ctx: PyRenderContext, expr: TypeTestExpression, path: IRPath): RenderedExpression {
    const operand = generateExpression(ctx, expr.operand, [...path, 'operand']);
    const identity = (right: string): RenderedExpression => rendered(
        `${binaryOperand(operand, PY_PRECEDENCE.comparison, 'left', 'none')} is ${right}`,
        PY_PRECEDENCE.comparison
    );
    const instance = (name: string): string => `isinstance(${operand.code}, ${name})`;
    switch (expr.tested) {
        case 'null':
            return identity('None');
        case 'omitted':
            return identity('...');
        case 'bool':
            return rendered(instance('bool'), PY_PRECEDENCE.postfix);
        case 'int':
            return rendered(`${instance('int')} and not ${instance('bool')}`, PY_PRECEDENCE.and);
        case 'string':
            return rendered(instance('str'), PY_PRECEDENCE.postfix);
        case 'list':
            return rendered(instance('list'), PY_PRECEDENCE.postfix);
    }
}

function isPrimitiveOf(type: Type, name: 'int' | 'float' | 'bool'): boolean {
    return type.kind === 'primitive' && type.name === name;
}

export function formatFloat(value: number): string {
    const text = String(value);
    return Number.isInteger(value) && !/[e.]/.test(text) ? `${text}.0` : text;
}

function generateLiteral(expr: LiteralExpression): RenderedExpression {
    const value = expr.value;
    if (value === null) {
        return rendered('None', PY_PRECEDENCE.primary);
    }
    if (typeof value === 'string') {
        return rendered(JSON.stringify(value), PY_PRECEDENCE.primary);
    }
    if (typeof value === 'number') {
        const text = expr.literalType === 'float' ? formatFloat(value) : String(value);
        return rendered(text, value < 0 ? PY_PRECEDENCE.unary : PY_PRECEDENCE.primary);
    }
    return rendered(value ? 'True' : 'False', PY_PRECEDENCE.primary);
}

function constructedClass(ctx: PyRenderContext, name: string, typePath: IRPath): ClassDeclaration | undefined {
    const declaration = ctx.referenceOf(typePath)?.declaration;
    return declaration && declaration.kind === 'class' ? declaration : ctx.classDeclarationOf(name);
}

// Parameter spellings of a declared callee, for keyword arguments
function calleeParameters(ctx: PyRenderContext, callee: Expression, calleePath: IRPath): Map<string, string> | undefined {
    if (callee.kind === 'name') {
        const declaration = ctx.referenceOf(calleePath)?.declaration;
        return declaration && declaration.kind === 'function' ? ctx.parametersOf(declaration.parameters) : undefined;
    }
    if (callee.kind === 'member') {
        const resolution = ctx.memberOf(calleePath);
        if (!resolution || resolution.member !== 'method') {
            return undefined;
        }
        const owner = ctx.ownerDeclaration(resolution);
        const method = owner.kind === 'class' ? owner.methods.find(m => m.name === callee.property) : undefined;
        return method ? ctx.parametersOf(method.parameters) : undefined;
    }
    return undefined;
}

export function generateArguments(
    ctx: PyRenderContext,
    args: readonly CallArgument[],
    spellings: ReadonlyMap<string, string> | undefined,
    path: IRPath,
    appendLine = false
): string {
    return args
        .map((arg, i) => {
            let value = renderExpression(ctx, arg.value, [...path, 'arguments', i, 'value']);
            if (appendLine && i === args.length - 1) {
                value = `str(${value}) + "\\n"`;
            }
            if (arg.name === undefined) {
                return value;
            }
            const keyword = spellings?.get(arg.name)
                ?? sanitizeIdentifier(applyCase(arg.name, ctx.options.naming.values), ctx.rules.local);
            return `${keyword}=${value}`;
        })
        .join(', ');
}

function isNullLiteral(expr: Expression): boolean {
    return expr.kind === 'literal' && expr.value === null;
}

/**
 * `%` keeps the sign of the dividend, as in the other targets; Python's own
 * operator takes the sign of the divisor.
 */
function generateRemainder(ctx: PyRenderContext, expr: BinaryExpression, path: IRPath): RenderedExpression | undefined {
    const type = ctx.underlyingType(ctx.typeOf(path));
    const isFloat = isPrimitiveOf(type, 'float');
    if (!isFloat && !isPrimitiveOf(type, 'int')) {
        return undefined;
    }
    const left = renderExpression(ctx, expr.left, [...path, 'left']);
    const right = renderExpression(ctx, expr.right, [...path, 'right']);
    const fmod = `${ctx.qualified('math', 'fmod')}(${left}, ${right})`;
    return rendered(isFloat ? fmod : `int(${fmod})`, PY_PRECEDENCE.postfix);
}

function generateBinaryExpression(ctx: PyRenderContext, expr: BinaryExpression, path: IRPath): RenderedExpression {
    if (expr.operator === '%') {
        const remainder = generateRemainder(ctx, expr, path);
        if (remainder) {
            return remainder;
        }
    }
    const info = BINARY_OPERATORS[expr.operator];
    let token = info.token;
    if ((expr.operator === '==' || expr.operator === '!=') && (isNullLiteral(expr.left) || isNullLiteral(expr.right))) {
        token = expr.operator === '==' ? 'is' : 'is not';
    }
    const left = generateExpression(ctx, expr.left, [...path, 'left']);
    const right = generateExpression(ctx, expr.right, [...path, 'right']);
    return rendered(
        `${binaryOperand(left, info.precedence, 'left', info.associativity)} ${token} ${binaryOperand(right, info.precedence, 'right', info.associativity)}`,
        info.precedence
    );
}

function generateLambdaExpression(ctx: PyRenderContext, expr: LambdaExpression, path: IRPath): RenderedExpression {
    return ctx.withScope(() => {
        const params = expr.parameters.map(param => ctx.declareLocal(param.name));
        const body = renderExpression(ctx, expr.body, [...path, 'body']);
        const head = params.length > 0 ? `lambda ${params.join(', ')}` : 'lambda';
        return rendered(`${head}: ${body}`, PY_PRECEDENCE.lambda);
    });
}

// Escapes text for the inside of a literal delimited by `quote`
function escapeText(text: string, quote: '"' | "'"): string {
    const body = JSON.stringify(text).slice(1, -1);
    return quote === '"' ? body : body.replace(/\\"/g, '"').replace(/'/g, "\\'");
}

function doubleBraces(text: string): string {
    return text.replace(/[{}]/g, brace => brace + brace);
}

// Booleans read as lowercase `true` and `false` in every target
function generateTemplateField(ctx: PyRenderContext, part: Expression, path: IRPath): RenderedExpression {
    const value = generateExpression(ctx, part, path);
    if (!isPrimitiveOf(ctx.underlyingType(ctx.typeOf(path)), 'bool')) {
        return value;
    }
    return rendered(`"true" if ${atLeast(value, PY_PRECEDENCE.or)} else "false"`, PY_PRECEDENCE.conditional);
}

/**
 * An f-string whose quote is one the embedded expressions do not use.
 * Before Python 3.12 a replacement field cannot reuse the quote, so when
 * both quotes occur the template falls back to `str.format`.
 */
function generateTemplate(ctx: PyRenderContext, expr: TemplateExpression, path: IRPath): RenderedExpression {
    const parts = expr.parts.map((part, i) =>
        typeof part === 'string'
            ? part
            : generateTemplateField(ctx, part, [...path, 'parts', i])
    );
    const fields = parts.filter((part): part is RenderedExpression => typeof part !== 'string');
    const usable = (quote: string): boolean => fields.every(field => !field.code.includes(quote) && !field.code.includes('\\'));
    const quote = usable('"') ? '"' : usable("'") ? "'" : undefined;

    if (quote !== undefined) {
        const body = parts
            .map(part => {
                if (typeof part === 'string') {
                    return doubleBraces(escapeText(part, quote));
                }
                const code = atLeast(part, PY_PRECEDENCE.conditional);
                return code.startsWith('{') ? `{ ${code} }` : `{${code}}`;
            })
            .join('');
        return rendered(`f${quote}${body}${quote}`, PY_PRECEDENCE.primary);
    }

    const format = parts.map(part => (typeof part === 'string' ? doubleBraces(escapeText(part, '"')) : '{}')).join('');
    const args = fields.map(field => field.code).join(', ');
    return rendered(`"${format}".format(${args})`, PY_PRECEDENCE.postfix);
}
