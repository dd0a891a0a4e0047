import { Module, formatIRPath } from '../types';
import { FormatterOptions, DEFAULT_FORMATTER_OPTIONS } from './options';
import { Printer } from './printer';
import { TypeFormatter } from './type-formatter';
import { ExpressionFormatter } from './expression-formatter';
import { StatementFormatter } from './statement-formatter';

export type { FormatterOptions };
export { DEFAULT_FORMATTER_OPTIONS };

// A target-neutral listing of a module and the line each IR node starts on
export interface IRListing {
  text: string;
  // Keyed by formatted IR path; 1-based lines
  lines: ReadonlyMap<string, number>;
}

export class Formatter {
  private readonly options: FormatterOptions;
  private readonly printer: Printer;
  private readonly statementFormatter: StatementFormatter;

  constructor(options: Partial<FormatterOptions> = {}) {
    this.options = { ...DEFAULT_FORMATTER_OPTIONS, ...options };
    this.printer = new Printer(this.options.indentSize, Math.max(1, this.options.blankLinesBetweenDeclarations));
    const typeFormatter = new TypeFormatter();
    const expressionFormatter = new ExpressionFormatter(typeFormatter);
    this.statementFormatter = new StatementFormatter(this.printer, this.options, typeFormatter, expressionFormatter);
  }

  format(module: Module): IRListing {
    this.printer.reset();
    this.statementFormatter.formatModule(module);
    const text = this.printer.getResult({
      trimTrailingWhitespace: this.options.trimTrailingWhitespace,
      insertFinalNewline: this.options.insertFinalNewline,
    });
    const lines = new Map<string, number>();
    for (const mark of this.printer.getMarks()) {
      lines.set(formatIRPath(mark.path), mark.line);
    }
    return { text, lines };
  }
}

export function formatModule(module: Module, options?: Partial<FormatterOptions>): IRListing {
  return new Formatter(options).format(module);
}
