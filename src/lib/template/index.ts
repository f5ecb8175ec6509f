// Path: src/lib/template/index.ts
// Public API for template module

export type { TemplateEntry, ParsedLine } from './types.js';

export { parseTemplateLine, isCommandExpression } from './parser.js';

export { readTemplateLines, parseTemplateLines, readTemplateEntries } from './reader.js';
