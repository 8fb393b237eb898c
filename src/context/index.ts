/**
 * Context Module
 *
 * Known facts and variable bindings used when deciding bound comparisons.
 */

export { SymbolicContext, type Fact } from "./context";
