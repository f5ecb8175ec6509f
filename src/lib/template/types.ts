// Path: src/lib/template/types.ts
// Type definitions for .env template handling

/**
 * One `KEY=VALUE_EXPRESSION` line from the template
 */
export interface TemplateEntry {
  key: string;
  /** Everything after the first `=`, may itself contain `=` */
  expression: string;
  /** 1-based line number in the template file */
  lineNumber: number;
  /** True when the expression starts with a recognized command prefix */
  isCommand: boolean;
}

/**
 * Outcome of parsing a single template line
 */
export type ParsedLine =
  | { kind: 'skip'; lineNumber: number }
  | { kind: 'malformed'; lineNumber: number; line: string; reason: string }
  | { kind: 'entry'; entry: TemplateEntry };
