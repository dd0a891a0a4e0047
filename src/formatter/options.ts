export interface FormatterOptions {
  indentSize: number;
  insertFinalNewline: boolean;
  trimTrailingWhitespace: boolean;
  // Blank lines between top-level declarations
  blankLinesBetweenDeclarations: number;
}

export const DEFAULT_FORMATTER_OPTIONS: FormatterOptions = {
  indentSize: 4,
  insertFinalNewline: true,
  trimTrailingWhitespace: true,
  blankLinesBetweenDeclarations: 1,
};
