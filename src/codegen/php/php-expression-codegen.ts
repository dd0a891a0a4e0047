// PHP expression code generation

import {
    BinaryExpression, BinaryOperator, CallArgument, CallExpression, Expression, IRPath, LiteralExpression, MemberExpression,
    PrimitiveName, TemplateExpression, TypeTestExpression
} from '../../types';
import { Associativity, RenderedExpression, atLeast, binaryOperand, parenthesize, rendered } from '../shared/precedence';
import { PhpRenderContext } from './php-context';

export const PHP_PRECEDENCE = {
    conditional: 2,
    or: 3,
    and: 4,
    equality: 5,
    relational: 6,
    concat: 7,
    additive: 8,
    multiplicative: 9,
    not: 10,
    unary: 11,
    new: 12,
    postfix: 13,
    primary: 14
} as const;

interface OperatorInfo {
    token: string;
    precedence: number;
    associativity: Associativity;
}

const BINARY_OPERATORS: Record<BinaryOperator, OperatorInfo> = {
    '+': { token: '+', precedence: PHP_PRECEDENCE.additive, associativity: 'left' },
    '-': { token: '-', precedence: PHP_PRECEDENCE.additive, associativity: 'left' },
    '*': { token: '*', precedence: PHP_PRECEDENCE.multiplicative, associativity: 'left' },
    '/': { token: '/', precedence: PHP_PRECEDENCE.multiplicative, associativity: 'left' },
    '%': { token: '%', precedence: PHP_PRECEDENCE.multiplicative, associativity: 'left' },
    '==': { token: '===', precedence: PHP_PRECEDENCE.equality, associativity: 'none' },
    '!=': { token: '!==', precedence: PHP_PRECEDENCE.equality, associativity: 'none' },
    '<': { token: '<', precedence: PHP_PRECEDENCE.relational, associativity: 'none' },
    '<=': { token: '<=', precedence: PHP_PRECEDENCE.relational, associativity: 'none' },
    '>': { token: '>', precedence: PHP_PRECEDENCE.relational, associativity: 'none' },
    '>=': { token: '>=', precedence: PHP_PRECEDENCE.relational, associativity: 'none' },
    'and': { token: '&&', precedence: PHP_PRECEDENCE.and, associativity: 'associative' },
    'or': { token: '||', precedence: PHP_PRECEDENCE.or, associativity: 'associative' }
};

export function renderExpression(ctx: PhpRenderContext, expr: Expression, path: IRPath): string {
    return generateExpression(ctx, expr, path).code;
}

export function generateExpression(ctx: PhpRenderContext, expr: Expression, path: IRPath): RenderedExpression {
    switch (expr.kind) {
        case 'literal':
            return generateLiteral(expr);
        case 'name': {
            const resolved = ctx.referenceOf(path);
            const name = resolved ? ctx.symbolName(resolved, path) : `$${ctx.lookupLocal(expr.name, path)}`;
            return rendered(name, PHP_PRECEDENCE.primary);
        }
        case 'self':
            return rendered('$this', PHP_PRECEDENCE.primary);
        case 'member':
            return generateMemberExpression(ctx, expr, path);
        case 'index': {
            const object = generateExpression(ctx, expr.object, [...path, 'object']);
            const index = renderExpression(ctx, expr.index, [...path, 'index']);
            return rendered(`${atLeast(object, PHP_PRECEDENCE.postfix)}[${index}]`, PHP_PRECEDENCE.postfix);
        }
        case 'call':
            return generateCallExpression(ctx, expr, path);
        case 'instantiate': {
            const name = ctx.typeName(expr.type.name, [...path, 'type']);
            return rendered(`new ${name}(${generateArguments(ctx, expr.arguments, path)})`, PHP_PRECEDENCE.new);
        }
        case 'binary':
            return generateBinaryExpression(ctx, expr, path);
        case 'unary': {
            const operand = generateExpression(ctx, expr.operand, [...path, 'operand']);
            if (expr.operator === 'not') {
                return rendered(`!${atLeast(operand, PHP_PRECEDENCE.not)}`, PHP_PRECEDENCE.not);
            }
            const text = operand.code.startsWith('-') ? parenthesize(operand) : atLeast(operand, PHP_PRECEDENCE.unary);
            return rendered(`-${text}`, PHP_PRECEDENCE.unary);
        }
        case 'conditional': {
            // nested ternaries need parentheses in PHP 8
            const part = (e: Expression, segment: string): string =>
                atLeast(generateExpression(ctx, e, [...path, segment]), PHP_PRECEDENCE.conditional + 1);
            return rendered(
                `${part(expr.test, 'test')} ? ${part(expr.consequent, 'consequent')} : ${part(expr.alternate, 'alternate')}`,
                PHP_PRECEDENCE.conditional
            );
        }
        case 'sequenceLiteral': {
            const elements = expr.elements.map((element, i) => renderExpression(ctx, element, [...path, 'elements', i]));
            return rendered(`[${elements.join(', ')}]`, PHP_PRECEDENCE.primary);
        }
        case 'mappingLiteral': {
            const entries = expr.entries.map((entry, i) => {
                const entryPath = [...path, 'entries', i];
                return `${renderExpression(ctx, entry.key, [...entryPath, 'key'])} => ${renderExpression(ctx, entry.value, [...entryPath, 'value'])}`;
            });
            return rendered(`[${entries.join(', ')}]`, PHP_PRECEDENCE.primary);
        }
        case 'template':
            return generateTemplate(ctx, expr, path);
        case 'length': {
            const targetPath = [...path, 'target'];
            const target = renderExpression(ctx, expr.target, targetPath);
            const type = ctx.underlyingType(ctx.typeOf(targetPath));
            const fn = type.kind === 'primitive' && type.name === 'string' ? 'mb_strlen' : 'count';
            return rendered(`${fn}(${target})`, PHP_PRECEDENCE.postfix);
        }
        case 'typeTest':
            return generateTypeTest(ctx, expr, path);
        case 'setLiteral':
        case 'lambda':
        case 'cast':
        case 'omit':
            return ctx.fail(`${expr.kind} expression reached the PHP renderer`, path);
    }
}

const TYPE_TEST_FUNCTIONS = {
    bool: 'is_bool',
    int: 'is_int',
    string: 'is_string',
    list: 'is_array'
} as const;

function generateTypeTest(ctx: PhpRenderContext, expr: TypeTestExpression, path: IRPath): RenderedExpression {
    const operand = generateExpression(ctx, expr.operand, [...path, 'operand']);
    switch (expr.tested) {
        case 'null':
            return rendered(`${binaryOperand(operand, PHP_PRECEDENCE.equality, 'left', 'none')} === null`, PHP_PRECEDENCE.equality);
        case 'omitted':
            return ctx.fail('test for an omitted argument reached the PHP renderer', path);
        default:
            return rendered(`${TYPE_TEST_FUNCTIONS[expr.tested]}(${operand.code})`, PHP_PRECEDENCE.postfix);
    }
}

export function formatFloat(value: number): string {
    const text = String(value);
    return Number.isInteger(value) && !/[e.]/.test(text) ? `${text}.0` : text;
}

// Single quotes unless the text needs an escape sequence
export function phpString(text: string): string {
    if (!/[\x00-\x1f\x7f]/.test(text)) {
        return `'${text.replace(/[\\']/g, c => `\\${c}`)}'`;
    }
    const escaped = text.replace(/[\\"$\x00-\x1f\x7f]/g, c => {
        switch (c) {
            case '\n':
                return '\\n';
            case '\r':
                return '\\r';
            case '\t':
                return '\\t';
            case '\\':
            case '"':
            case '$':
                return `\\${c}`;
            default:
                return `\\x${c.charCodeAt(0).toString(16).padStart(2, '0')}`;
        }
    });
    return `"${escaped}"`;
}

function generateLiteral(expr: LiteralExpression): RenderedExpression {
    const value = expr.value;
    if (value === null) {
        return rendered('null', PHP_PRECEDENCE.primary);
    }
    if (typeof value === 'string') {
        return rendered(phpString(value), PHP_PRECEDENCE.primary);
    }
    if (typeof value === 'number') {
        const text = expr.literalType === 'float' ? formatFloat(value) : String(value);
        return rendered(text, value < 0 ? PHP_PRECEDENCE.unary : PHP_PRECEDENCE.primary);
    }
    return rendered(value ? 'true' : 'false', PHP_PRECEDENCE.primary);
}

// `$object->member`, or `Class::method` for a static method
function generateMemberExpression(ctx: PhpRenderContext, expr: MemberExpression, path: IRPath): RenderedExpression {
    const resolution = ctx.memberOf(path);
    const name = ctx.memberName(resolution, expr.property);
    const object = generateExpression(ctx, expr.object, [...path, 'object']);
    const operator = resolution?.isStatic ? '::' : '->';
    return rendered(`${atLeast(object, PHP_PRECEDENCE.postfix)}${operator}${name}`, PHP_PRECEDENCE.postfix);
}

function generateCallExpression(ctx: PhpRenderContext, expr: CallExpression, path: IRPath): RenderedExpression {
    const calleePath = [...path, 'callee'];
    const callee = generateExpression(ctx, expr.callee, calleePath);
    const args = generateArguments(ctx, expr.arguments, path, ctx.appendsLine(calleePath));
    return rendered(`${atLeast(callee, PHP_PRECEDENCE.postfix)}(${args})`, PHP_PRECEDENCE.postfix);
}

export function generateArguments(
    ctx: PhpRenderContext,
    args: readonly CallArgument[],
    path: IRPath,
    appendLine = false
): string {
    return args
        .map((arg, i) => {
            const argPath = [...path, 'arguments', i];
            if (arg.name !== undefined) {
                return ctx.fail(`named argument '${arg.name}' reached the PHP renderer`, argPath);
            }
            const value = generateExpression(ctx, arg.value, [...argPath, 'value']);
            if (appendLine && i === args.length - 1) {
                return `${concatOperand(value)} . PHP_EOL`;
            }
            return value.code;
        })
        .join(', ');
}

function primitiveAt(ctx: PhpRenderContext, path: IRPath): PrimitiveName | undefined {
    const type = ctx.underlyingType(ctx.typeOf(path));
    return type.kind === 'primitive' ? type.name : undefined;
}

function isStringType(ctx: PhpRenderContext, path: IRPath): boolean {
    return primitiveAt(ctx, path) === 'string';
}

function isFloatType(ctx: PhpRenderContext, path: IRPath): boolean {
    return primitiveAt(ctx, path) === 'float';
}

// `0 === 0.0` is false in PHP, so an int compared with a float is compared loosely
function isMixedNumeric(ctx: PhpRenderContext, path: IRPath): boolean {
    const left = primitiveAt(ctx, [...path, 'left']);
    const right = primitiveAt(ctx, [...path, 'right']);
    const numeric = (name: PrimitiveName | undefined): boolean => name === 'int' || name === 'float';
    return numeric(left) && numeric(right) && left !== right;
}

// An operand of `.` that is itself arithmetic is always parenthesised
function concatOperand(operand: RenderedExpression): string {
    return atLeast(operand, PHP_PRECEDENCE.multiplicative);
}

function generateBinaryExpression(ctx: PhpRenderContext, expr: BinaryExpression, path: IRPath): RenderedExpression {
    const left = generateExpression(ctx, expr.left, [...path, 'left']);
    const right = generateExpression(ctx, expr.right, [...path, 'right']);

    if (expr.operator === '+' && isStringType(ctx, path)) {
        const text = [left, right]
            .map(operand => (operand.precedence === PHP_PRECEDENCE.concat ? operand.code : concatOperand(operand)))
            .join(' . ');
        return rendered(text, PHP_PRECEDENCE.concat);
    }
    if (expr.operator === '%' && isFloatType(ctx, path)) {
        return rendered(`fmod(${left.code}, ${right.code})`, PHP_PRECEDENCE.postfix);
    }

    const info = BINARY_OPERATORS[expr.operator];
    const token = (expr.operator === '==' || expr.operator === '!=') && isMixedNumeric(ctx, path)
        ? expr.operator
        : info.token;
    return rendered(
        `${binaryOperand(left, info.precedence, 'left', info.associativity)} ${token} ${binaryOperand(right, info.precedence, 'right', info.associativity)}`,
        info.precedence
    );
}

interface TemplateField {
    value: RenderedExpression;
    // already a string, so no `strval` is needed on its own
    isText: boolean;
}

// Booleans read as lowercase `true` and `false` in every target
function generateTemplateField(ctx: PhpRenderContext, part: Expression, path: IRPath): TemplateField {
    const value = generateExpression(ctx, part, path);
    if (primitiveAt(ctx, path) !== 'bool') {
        return { value, isText: false };
    }
    const test = atLeast(value, PHP_PRECEDENCE.conditional + 1);
    return { value: rendered(`${test} ? 'true' : 'false'`, PHP_PRECEDENCE.conditional), isText: true };
}

/**
 * Interpolation becomes concatenation; a lone expression part is converted
 * with `strval`.
 */
function generateTemplate(ctx: PhpRenderContext, expr: TemplateExpression, path: IRPath): RenderedExpression {
    const fields = expr.parts
        .map((part, i) => (typeof part === 'string' ? part : generateTemplateField(ctx, part, [...path, 'parts', i])))
        .filter(part => typeof part !== 'string' || part.length > 0);
    if (fields.length === 0) {
        return rendered("''", PHP_PRECEDENCE.primary);
    }
    const [only] = fields;
    if (fields.length === 1) {
        if (typeof only === 'string') {
            return rendered(phpString(only), PHP_PRECEDENCE.primary);
        }
        return only.isText ? only.value : rendered(`strval(${only.value.code})`, PHP_PRECEDENCE.postfix);
    }
    const parts = fields.map(field => (typeof field === 'string' ? field : field.value));
    const text = parts.map(part => (typeof part === 'string' ? phpString(part) : concatOperand(part))).join(' . ');
    return rendered(text, PHP_PRECEDENCE.concat);
}
