/**
 * Utilities
 */

export { type Position, type SourceSpan, position, span, formatSpan } from "./span";
export { SourceFile } from "./source";
export { editDistance, suggestNames } from "./similarity";
