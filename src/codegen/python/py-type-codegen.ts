// Python type annotations

import { IRPath, Type } from '../../types';
import { PyRenderContext } from './py-context';

export function generateType(ctx: PyRenderContext, type: Type, path: IRPath = []): string {
    switch (type.kind) {
        case 'primitive':
            switch (type.name) {
                case 'int':
                case 'float':
                case 'bool':
                    return type.name;
                case 'string':
                    return 'str';
                case 'null':
                case 'void':
                    return 'None';
                case 'any':
                    return ctx.typing('Any');
            }
            break;
        case 'optional':
            return `${ctx.typing('Optional')}[${generateType(ctx, type.inner, path)}]`;
        case 'sequence':
            return `list[${generateType(ctx, type.element, path)}]`;
        case 'set':
            return `set[${generateType(ctx, type.element, path)}]`;
        case 'mapping':
            return `dict[${generateType(ctx, type.key, path)}, ${generateType(ctx, type.value, path)}]`;
        case 'named': {
            if (ctx.isForward(type.name)) {
                ctx.forwardReference = true;
            }
            const name = ctx.typeName(type.name, path);
            if (type.typeArguments.length === 0) {
                return name;
            }
            return `${name}[${type.typeArguments.map(arg => generateType(ctx, arg, path)).join(', ')}]`;
        }
        case 'function': {
            const params = type.parameters.map(param => generateType(ctx, param, path));
            return `${ctx.typing('Callable')}[[${params.join(', ')}], ${generateType(ctx, type.returnType, path)}]`;
        }
        case 'union':
            return `${ctx.typing('Union')}[${type.members.map(member => generateType(ctx, member, path)).join(', ')}]`;
        case 'literal': {
            const value = typeof type.value === 'boolean' ? (type.value ? 'True' : 'False') : JSON.stringify(type.value);
            return `${ctx.typing('Literal')}[${value}]`;
        }
        case 'unknown':
            break;
    }
    return ctx.fail('an unresolved type reached the Python renderer', path);
}

/**
 * A type in an evaluated position: signatures, class attributes and module
 * level. It is quoted when it names a local type defined further down.
 */
export function generateAnnotation(ctx: PyRenderContext, type: Type, path: IRPath = []): string {
    const outer = ctx.forwardReference;
    ctx.forwardReference = false;
    const text = generateType(ctx, type, path);
    const forward = ctx.forwardReference;
    ctx.forwardReference = outer;
    if (!forward || ctx.inBody) {
        return text;
    }
    return text.includes('"') ? `'${text}'` : `"${text}"`;
}
