// PHP statement code generation

import { CatchClause, Expression, IRPath, Statement, TryCatchStatement, VarDeclStatement } from '../../types';
import { PhpRenderContext } from './php-context';
import { generateDocType, losesDetail } from './php-type-codegen';
import { renderExpression } from './php-expression-codegen';

// Renders statements inside `{ ... }`; the caller writes the braces
export function generateBlock(ctx: PhpRenderContext, statements: readonly Statement[], path: IRPath): void {
    ctx.printer.indented(() => {
        ctx.withScope(() => {
            statements.forEach((statement, i) => generateStatement(ctx, statement, [...path, i]));
        });
    });
}

export function generateStatement(ctx: PhpRenderContext, statement: Statement, path: IRPath): void {
    const printer = ctx.printer;
    const expr = (e: Expression, segment: string): string => renderExpression(ctx, e, [...path, segment]);

    if (statement.kind === 'pass') {
        return;
    }
    ctx.mark(path);
    switch (statement.kind) {
        case 'assign':
            printer.writeLine(`${expr(statement.target, 'target')} = ${expr(statement.value, 'value')};`);
            break;
        case 'varDecl':
            generateVarDecl(ctx, statement, path);
            break;
        case 'if':
            statement.branches.forEach((branch, i) => {
                const branchPath = [...path, 'branches', i];
                const condition = renderExpression(ctx, branch.condition, [...branchPath, 'condition']);
                printer.writeLine(i === 0 ? `if (${condition}) {` : `} elseif (${condition}) {`);
                generateBlock(ctx, branch.body, [...branchPath, 'body']);
            });
            if (statement.elseBody) {
                printer.writeLine('} else {');
                generateBlock(ctx, statement.elseBody, [...path, 'elseBody']);
            }
            printer.writeLine('}');
            break;
        case 'while':
            printer.writeLine(`while (${expr(statement.condition, 'condition')}) {`);
            generateBlock(ctx, statement.body, [...path, 'body']);
            printer.writeLine('}');
            break;
        case 'forEach': {
            const iterablePath = [...path, 'iterable'];
            let iterable = renderExpression(ctx, statement.iterable, iterablePath);
            const type = ctx.underlyingType(ctx.typeOf(iterablePath));
            // strings are not traversable
            if (type.kind === 'primitive' && type.name === 'string') {
                iterable = `mb_str_split(${iterable})`;
            }
            ctx.withScope(() => {
                const variable = ctx.variable(statement.variable);
                printer.writeLine(`foreach (${iterable} as ${variable}) {`);
                generateBlock(ctx, statement.body, [...path, 'body']);
            });
            printer.writeLine('}');
            break;
        }
        case 'forEntries': {
            const mapping = expr(statement.mapping, 'mapping');
            ctx.withScope(() => {
                const key = ctx.variable(statement.keyVariable);
                const value = ctx.variable(statement.valueVariable);
                printer.writeLine(`foreach (${mapping} as ${key} => ${value}) {`);
                generateBlock(ctx, statement.body, [...path, 'body']);
            });
            printer.writeLine('}');
            break;
        }
        case 'return':
            printer.writeLine(statement.value ? `return ${expr(statement.value, 'value')};` : 'return;');
            break;
        case 'raise': {
            const errorClass = statement.errorClass === undefined
                ? '\\Exception'
                : ctx.typeName(statement.errorClass, [...path, 'errorClass']);
            printer.writeLine(`throw new ${errorClass}(${expr(statement.message, 'message')});`);
            break;
        }
        case 'expression':
            printer.writeLine(`${expr(statement.expression, 'expression')};`);
            break;
        case 'tryCatch':
            generateTryCatch(ctx, statement, path);
            break;
        case 'append':
            printer.writeLine(`${expr(statement.target, 'target')}[] = ${expr(statement.value, 'value')};`);
            break;
        case 'break':
        case 'continue':
            printer.writeLine(`${statement.kind};`);
            break;
        case 'comment':
            printer.writeLine(`// ${statement.text}`);
            break;
        case 'with':
            ctx.fail('scoped resource reached the PHP renderer', path);
    }
}

// Locals carry no declaration; a type the value cannot show goes in an `@var` docblock
function generateVarDecl(ctx: PhpRenderContext, statement: VarDeclStatement, path: IRPath): void {
    if (!statement.value) {
        return ctx.fail(`variable '${statement.name}' has no initial value`, path);
    }
    const value = renderExpression(ctx, statement.value, [...path, 'value']);
    const name = ctx.variable(statement.name);
    if (statement.type && losesDetail(statement.type)) {
        ctx.printer.writeLine(`/** @var ${generateDocType(ctx, statement.type, [...path, 'type'])} ${name} */`);
    }
    ctx.printer.writeLine(`${name} = ${value};`);
}

// Clauses after a catch-all could never run and are left out
function generateTryCatch(ctx: PhpRenderContext, statement: TryCatchStatement, path: IRPath): void {
    const printer = ctx.printer;
    printer.writeLine('try {');
    generateBlock(ctx, statement.body, [...path, 'body']);

    const catchAllIndex = statement.catches.findIndex(clause => clause.errorClass === undefined);
    const clauses = catchAllIndex >= 0 ? statement.catches.slice(0, catchAllIndex + 1) : statement.catches;
    clauses.forEach((clause, i) => generateCatchClause(ctx, clause, [...path, 'catches', i]));

    if (statement.finallyBody) {
        printer.writeLine('} finally {');
        generateBlock(ctx, statement.finallyBody, [...path, 'finallyBody']);
    }
    printer.writeLine('}');
}

function generateCatchClause(ctx: PhpRenderContext, clause: CatchClause, path: IRPath): void {
    const errorClass = clause.errorClass === undefined
        ? '\\Exception'
        : ctx.typeName(clause.errorClass, [...path, 'errorClass']);
    ctx.withScope(() => {
        const binding = clause.binding === undefined ? '' : ` ${ctx.variable(clause.binding)}`;
        ctx.printer.writeLine(`} catch (${errorClass}${binding}) {`);
        generateBlock(ctx, clause.body, [...path, 'body']);
    });
}
