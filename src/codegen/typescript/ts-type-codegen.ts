// TypeScript spelling of IR types

import { IRPath, Type } from '../../types';
import { TsRenderContext } from './ts-context';

// Types that need parentheses inside an array suffix or a union
function isCompound(type: Type): boolean {
    return type.kind === 'function' || type.kind === 'union' || type.kind === 'optional';
}

function wrapped(ctx: TsRenderContext, type: Type, path: IRPath): string {
    const text = generateType(ctx, type, path);
    return isCompound(type) ? `(${text})` : text;
}

export function generateType(ctx: TsRenderContext, type: Type, path: IRPath = []): string {
    switch (type.kind) {
        case 'primitive':
            switch (type.name) {
                case 'int':
                case 'float':
                    return 'number';
                case 'bool':
                    return 'boolean';
                default:
                    return type.name;
            }
        case 'optional': {
            const inner = type.inner.kind === 'function'
                ? `(${generateType(ctx, type.inner, [...path, 'inner'])})`
                : generateType(ctx, type.inner, [...path, 'inner']);
            return `${inner} | null`;
        }
        case 'sequence':
            return `${wrapped(ctx, type.element, [...path, 'element'])}[]`;
        case 'set':
            return `Set<${generateType(ctx, type.element, [...path, 'element'])}>`;
        case 'mapping':
            return `Record<${generateType(ctx, type.key, [...path, 'key'])}, ${generateType(ctx, type.value, [...path, 'value'])}>`;
        case 'named': {
            const name = ctx.typeName(type.name, path);
            if (type.typeArguments.length === 0) {
                return name;
            }
            const args = type.typeArguments.map((arg, i) => generateType(ctx, arg, [...path, 'typeArguments', i]));
            return `${name}<${args.join(', ')}>`;
        }
        case 'function': {
            const params = type.parameters.map((param, i) => `p${i}: ${generateType(ctx, param, [...path, 'parameters', i])}`);
            return `(${params.join(', ')}) => ${generateType(ctx, type.returnType, [...path, 'returnType'])}`;
        }
        case 'union':
            return type.members
                .map((member, i) => (member.kind === 'function'
                    ? `(${generateType(ctx, member, [...path, 'members', i])})`
                    : generateType(ctx, member, [...path, 'members', i])))
                .join(' | ');
        case 'literal':
            return typeof type.value === 'string' ? JSON.stringify(type.value) : String(type.value);
        case 'unknown':
            return ctx.fail('unresolved type reached the renderer', path);
    }
}

export function generateReturnType(ctx: TsRenderContext, type: Type, isAsync: boolean, path: IRPath): string {
    const text = generateType(ctx, type, path);
    return isAsync ? `Promise<${text}>` : text;
}
