/**
 * Dotted Intervals
 *
 * Main entry point: symbolic expressions, contexts, interval extraction and
 * the constraint language front end.
 */

export * from "./expression";
export * from "./context";
export * from "./intervals";
export * from "./lexer";
export * from "./parser";
export * from "./diagnostics";
export * from "./utils";
export { runCli, parseCliArgs, VERSION, type Output } from "./commands";
