// Python statement code generation

import { CatchClause, Expression, IRPath, Statement, TryCatchStatement } from '../../types';
import { commonTypes } from '../../type-utils';
import { PyRenderContext } from './py-context';
import { generateAnnotation } from './py-type-codegen';
import { renderExpression } from './py-expression-codegen';

/**
 * Renders an indented suite after an optional preamble such as a docstring.
 * A suite with nothing but comments still needs a statement, so it ends
 * with `pass`.
 */
export function generateBlock(
    ctx: PyRenderContext,
    statements: readonly Statement[],
    path: IRPath,
    preamble?: () => void
): void {
    ctx.printer.indented(() => {
        ctx.withScope(() => {
            const start = ctx.printer.getCurrentLine();
            preamble?.();
            const hasPreamble = ctx.printer.getCurrentLine() > start;
            statements.forEach((statement, i) => generateStatement(ctx, statement, [...path, i]));
            if (!hasPreamble && statements.every(statement => statement.kind === 'comment')) {
                ctx.printer.writeLine('pass');
            }
        });
    });
}

export function generateStatement(ctx: PyRenderContext, statement: Statement, path: IRPath): void {
    const printer = ctx.printer;
    const expr = (e: Expression, segment: string): string => renderExpression(ctx, e, [...path, segment]);

    ctx.mark(path);
    switch (statement.kind) {
        case 'assign':
            printer.writeLine(`${expr(statement.target, 'target')} = ${expr(statement.value, 'value')}`);
            break;
        case 'varDecl': {
            const value = statement.value ? expr(statement.value, 'value') : undefined;
            const annotation = statement.type
                ? `: ${generateAnnotation(ctx, statement.type, [...path, 'type'])}`
                : value === undefined ? `: ${generateAnnotation(ctx, commonTypes.any)}` : '';
            const name = ctx.declareLocal(statement.name);
            printer.writeLine(`${name}${annotation}${value === undefined ? '' : ` = ${value}`}`);
            break;
        }
        case 'if':
            statement.branches.forEach((branch, i) => {
                const branchPath = [...path, 'branches', i];
                const condition = renderExpression(ctx, branch.condition, [...branchPath, 'condition']);
                printer.writeLine(`${i === 0 ? 'if' : 'elif'} ${condition}:`);
                generateBlock(ctx, branch.body, [...branchPath, 'body']);
            });
            if (statement.elseBody) {
                printer.writeLine('else:');
                generateBlock(ctx, statement.elseBody, [...path, 'elseBody']);
            }
            break;
        case 'while':
            printer.writeLine(`while ${expr(statement.condition, 'condition')}:`);
            generateBlock(ctx, statement.body, [...path, 'body']);
            break;
        case 'forEach': {
            const iterable = expr(statement.iterable, 'iterable');
            ctx.withScope(() => {
                const variable = ctx.declareLocal(statement.variable);
                // a loop target cannot carry an annotation, so it is declared first
                if (statement.variableType) {
                    printer.writeLine(`${variable}: ${generateAnnotation(ctx, statement.variableType, [...path, 'variableType'])}`);
                }
                printer.writeLine(`for ${variable} in ${iterable}:`);
                generateBlock(ctx, statement.body, [...path, 'body']);
            });
            break;
        }
        case 'forEntries': {
            const mapping = expr(statement.mapping, 'mapping');
            ctx.withScope(() => {
                const key = ctx.declareLocal(statement.keyVariable);
                const value = ctx.declareLocal(statement.valueVariable);
                printer.writeLine(`for ${key}, ${value} in ${mapping}.items():`);
                generateBlock(ctx, statement.body, [...path, 'body']);
            });
            break;
        }
        case 'return':
            printer.writeLine(statement.value ? `return ${expr(statement.value, 'value')}` : 'return');
            break;
        case 'raise': {
            const errorClass = statement.errorClass === undefined
                ? 'Exception'
                : ctx.typeName(statement.errorClass, [...path, 'errorClass']);
            printer.writeLine(`raise ${errorClass}(${expr(statement.message, 'message')})`);
            break;
        }
        case 'expression':
            printer.writeLine(expr(statement.expression, 'expression'));
            break;
        case 'with': {
            const resource = expr(statement.resource, 'resource');
            ctx.withScope(() => {
                const binding = statement.binding === undefined ? '' : ` as ${ctx.declareLocal(statement.binding)}`;
                printer.writeLine(`with ${resource}${binding}:`);
                generateBlock(ctx, statement.body, [...path, 'body']);
            });
            break;
        }
        case 'tryCatch':
            generateTryCatch(ctx, statement, path);
            break;
        case 'append':
            printer.writeLine(`${expr(statement.target, 'target')}.append(${expr(statement.value, 'value')})`);
            break;
        case 'pass':
        case 'break':
        case 'continue':
            printer.writeLine(statement.kind);
            break;
        case 'comment':
            printer.writeLine(`# ${statement.text}`);
            break;
    }
}

// Clauses after a catch-all could never run and are left out
function generateTryCatch(ctx: PyRenderContext, statement: TryCatchStatement, path: IRPath): void {
    const printer = ctx.printer;
    printer.writeLine('try:');
    generateBlock(ctx, statement.body, [...path, 'body']);

    const catchAllIndex = statement.catches.findIndex(clause => clause.errorClass === undefined);
    const clauses = catchAllIndex >= 0 ? statement.catches.slice(0, catchAllIndex + 1) : statement.catches;
    clauses.forEach((clause, i) => generateCatchClause(ctx, clause, [...path, 'catches', i]));

    if (statement.finallyBody) {
        printer.writeLine('finally:');
        generateBlock(ctx, statement.finallyBody, [...path, 'finallyBody']);
    }
}

function generateCatchClause(ctx: PyRenderContext, clause: CatchClause, path: IRPath): void {
    const errorClass = clause.errorClass === undefined
        ? 'Exception'
        : ctx.typeName(clause.errorClass, [...path, 'errorClass']);
    ctx.withScope(() => {
        const binding = clause.binding === undefined ? '' : ` as ${ctx.declareLocal(clause.binding)}`;
        ctx.printer.writeLine(`except ${errorClass}${binding}:`);
        generateBlock(ctx, clause.body, [...path, 'body']);
    });
}
