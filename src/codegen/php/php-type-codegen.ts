// PHP native type declarations and the docblock types that refine them

import { IRPath, Type } from '../../types';
import { PhpRenderContext } from './php-context';

export type HintPosition = 'parameter' | 'return' | 'property';

function unionMembers(hint: string): string[] {
    return hint.startsWith('?') ? [hint.slice(1), 'null'] : hint.split('|');
}

/**
 * The native declaration for `type`, or undefined where PHP has none that
 * fits, e.g. a callable property.
 */
export function generateTypeHint(
    ctx: PhpRenderContext,
    type: Type,
    path: IRPath,
    position: HintPosition
): string | undefined {
    switch (type.kind) {
        case 'primitive':
            switch (type.name) {
                case 'int':
                case 'float':
                case 'bool':
                case 'string':
                    return type.name;
                case 'void':
                    return position === 'return' ? 'void' : 'mixed';
                case 'null':
                case 'any':
                    return 'mixed';
            }
            break;
        case 'optional': {
            const inner = generateTypeHint(ctx, type.inner, path, position);
            if (inner === undefined || inner === 'mixed') {
                return inner;
            }
            return inner.includes('|') ? `${inner}|null` : `?${inner}`;
        }
        case 'sequence':
        case 'mapping':
            return 'array';
        case 'named':
            return ctx.typeName(type.name, path);
        case 'function':
            return position === 'property' ? undefined : 'callable';
        case 'union': {
            const hints = type.members.map(member => generateTypeHint(ctx, member, path, position));
            if (hints.some(hint => hint === undefined || hint === 'mixed')) {
                return 'mixed';
            }
            const members = new Set<string>();
            for (const hint of hints) {
                if (hint !== undefined) {
                    unionMembers(hint).forEach(member => members.add(member));
                }
            }
            return [...members].join('|');
        }
        case 'literal':
            return typeof type.value === 'number'
                ? (Number.isInteger(type.value) ? 'int' : 'float')
                : typeof type.value === 'boolean' ? 'bool' : 'string';
        case 'set':
        case 'unknown':
            break;
    }
    return ctx.fail(`type '${type.kind}' reached the PHP renderer`, path);
}

// The type as a docblock writes it, e.g. `list<string>` or `array<string, int>`
export function generateDocType(ctx: PhpRenderContext, type: Type, path: IRPath): string {
    switch (type.kind) {
        case 'primitive':
            switch (type.name) {
                case 'any':
                    return 'mixed';
                case 'int':
                case 'float':
                case 'bool':
                case 'string':
                case 'null':
                case 'void':
                    return type.name;
            }
            break;
        case 'optional': {
            const inner = generateDocType(ctx, type.inner, path);
            return `${type.inner.kind === 'function' ? `(${inner})` : inner}|null`;
        }
        case 'sequence':
            return `list<${generateDocType(ctx, type.element, path)}>`;
        case 'mapping':
            return `array<${generateDocType(ctx, type.key, path)}, ${generateDocType(ctx, type.value, path)}>`;
        case 'named': {
            const name = ctx.typeName(type.name, path);
            if (type.typeArguments.length === 0) {
                return name;
            }
            return `${name}<${type.typeArguments.map(arg => generateDocType(ctx, arg, path)).join(', ')}>`;
        }
        case 'function': {
            const params = type.parameters.map(param => generateDocType(ctx, param, path));
            return `callable(${params.join(', ')}): ${generateDocType(ctx, type.returnType, path)}`;
        }
        case 'union':
            return type.members
                .map(member => {
                    const text = generateDocType(ctx, member, path);
                    return member.kind === 'function' ? `(${text})` : text;
                })
                .join('|');
        case 'literal':
            return typeof type.value === 'string' ? `'${type.value.replace(/[\\']/g, c => `\\${c}`)}'` : String(type.value);
        case 'set':
        case 'unknown':
            break;
    }
    return ctx.fail(`type '${type.kind}' reached the PHP renderer`, path);
}

// Whether the native declaration says less than the IR type
export function losesDetail(type: Type): boolean {
    switch (type.kind) {
        case 'sequence':
        case 'mapping':
        case 'function':
        case 'literal':
            return true;
        case 'optional':
            return losesDetail(type.inner);
        case 'named':
            return type.typeArguments.length > 0;
        case 'union':
            return type.members.some(losesDetail);
        case 'primitive':
            return type.name === 'null';
        default:
            return false;
    }
}
