/**
 * CLI Commands
 *
 * Argument handling and the extract / tree / enumerate / explain commands. Output goes
 * through an `Output` sink so the commands can run in-process.
 */

import { parseArgs } from "util";
import { SymbolicContext } from "./context";
import {
  createDiagnostic,
  ErrorCode,
  formatJson,
  formatPretty,
  formatSimple,
  getCodeSeverity,
  getErrorDescription,
  isError,
  isErrorCode,
  type Diagnostic,
} from "./diagnostics";
import {
  formatExpression,
  Variable,
  variable,
  type Expression,
  type ExpressionType,
} from "./expression";
import {
  buildCaseTree,
  DomainError,
  enumerateCaseTree,
  formatCaseTree,
  fromConstraints,
  NotEnumerableError,
  resolveCaseTree,
  type DottedIntervals,
  type ExtractionIssue,
  type UnsupportedConstraintError,
} from "./intervals";
import { parseConstraint, type SyntaxIssue } from "./parser";
import { SourceFile } from "./utils/source";
import { suggestNames } from "./utils/similarity";

// =============================================================================
// Version
// =============================================================================

export const VERSION = "0.1.0";

// =============================================================================
// CLI Types
// =============================================================================

const COMMANDS = ["extract", "tree", "enumerate", "explain", "help", "version"] as const;

const FORMATS = ["pretty", "simple"] as const;

type DiagnosticFormat = (typeof FORMATS)[number];

type Command = (typeof COMMANDS)[number];

export interface Output {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const consoleOutput: Output = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

interface CliArgs {
  command: Command;
  index: string;
  constraint: string;
  types: ReadonlyMap<string, ExpressionType>;
  bindings: ReadonlyMap<string, bigint>;
  /** Error code for `explain` */
  code: string;
  json: boolean;
  quiet: boolean;
  format: DiagnosticFormat;
}

type ParsedArgs = { ok: true; args: CliArgs } | { ok: false; diagnostic: Diagnostic };

const HELP = `intervals ${VERSION}

Usage: intervals <command> <index> <constraint> [options]

Commands:
  extract     Fold the constraint's bounds on <index> into a dotted interval
  tree        Split disjunctions and conditionals into a case tree
  enumerate   List every admissible integer value of <index>
  explain     Describe a diagnostic code (intervals explain W1002)
  help        Show this message
  version     Show the version

Options:
  --real <name>      Declare a real-valued variable (repeatable)
  --bool <name>      Declare a boolean variable (repeatable)
  --let <name>=<n>   Bind an integer variable (repeatable)
  --json             Print results and diagnostics as JSON
  --format <f>       Diagnostic format: pretty (default) or simple
  -q, --quiet        Only print errors
  -h, --help         Show this message
  -v, --version      Show the version

Examples:
  intervals extract x "x > 2 && x < 4"
  intervals enumerate i "0 <= i < n" --let n=4
  intervals tree x "x < 0 || x > 10"`;

// =============================================================================
// Argument Parsing
// =============================================================================

function usageError(message: string, hint?: string): ParsedArgs {
  return {
    ok: false,
    diagnostic: createDiagnostic(
      ErrorCode.InvalidArgument,
      message,
      undefined,
      { kind: "usage_error" },
      hint ? [{ description: hint }] : []
    ),
  };
}

function isCommand(name: string): name is Command {
  return COMMANDS.some((c) => c === name);
}

function isFormat(name: string): name is DiagnosticFormat {
  return FORMATS.some((f) => f === name);
}

const BINDING = /^([\p{L}_][\p{L}\p{N}_']*)=(-?\d+)$/u;

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      real: { type: "string", multiple: true },
      bool: { type: "string", multiple: true },
      let: { type: "string", multiple: true },
      json: { type: "boolean", default: false },
      format: { type: "string", default: "pretty" },
      quiet: { type: "boolean", short: "q", default: false },
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", short: "v", default: false },
    },
    allowPositionals: true,
  });
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (e) {
    if (e instanceof TypeError) {
      return usageError(e.message, "run `intervals help` for the list of options");
    }
    throw e;
  }

  const { values, positionals } = parsed;
  const format = values.format ?? "pretty";
  if (!isFormat(format)) {
    return usageError(`unknown format '${format}'`, "use --format pretty or --format simple");
  }
  const base: Omit<CliArgs, "command"> = {
    index: "",
    constraint: "",
    types: new Map(),
    bindings: new Map(),
    code: "",
    json: values.json ?? false,
    quiet: values.quiet ?? false,
    format,
  };

  if (values.help || positionals.length === 0) {
    return { ok: true, args: { ...base, command: "help" } };
  }
  if (values.version) {
    return { ok: true, args: { ...base, command: "version" } };
  }

  const [name, index, constraint, ...extra] = positionals;
  if (!isCommand(name)) {
    const suggestions = suggestNames(name, COMMANDS);
    return usageError(
      `unknown command '${name}'`,
      suggestions.length > 0 ? `did you mean '${suggestions[0]}'?` : undefined
    );
  }
  if (name === "help" || name === "version") {
    return { ok: true, args: { ...base, command: name } };
  }
  if (name === "explain") {
    if (index === undefined || constraint !== undefined) {
      return usageError("'explain' expects one diagnostic code", "intervals explain W1002");
    }
    return { ok: true, args: { ...base, command: name, code: index } };
  }
  if (index === undefined || constraint === undefined) {
    return usageError(`'${name}' expects an index variable and a constraint`, `intervals ${name} x "x >= 0 && x < 10"`);
  }
  if (extra.length > 0) {
    return usageError(`unexpected argument '${extra[0]}'`, "quote the constraint so the shell passes it as one argument");
  }

  const types = new Map<string, ExpressionType>();
  for (const real of values.real ?? []) types.set(real, "real");
  for (const bool of values.bool ?? []) types.set(bool, "bool");

  const bindings = new Map<string, bigint>();
  for (const binding of values.let ?? []) {
    const match = BINDING.exec(binding);
    if (!match) {
      return usageError(`invalid binding '${binding}'`, "bindings are written name=integer, e.g. --let n=10");
    }
    bindings.set(match[1], BigInt(match[2]));
  }

  return { ok: true, args: { ...base, command: name, index, constraint, types, bindings } };
}

// =============================================================================
// Diagnostics
// =============================================================================

function syntaxDiagnostic(issue: SyntaxIssue): Diagnostic {
  return createDiagnostic(issue.code, issue.message, issue.span, { kind: "syntax_error" });
}

function issueDiagnostic(issue: ExtractionIssue): Diagnostic {
  return createDiagnostic(issue.code, issue.message, undefined, {
    kind: issue.kind.replace(/-/g, "_"),
    constraint: formatExpression(issue.constraint),
  });
}

function unsupportedDiagnostic(error: UnsupportedConstraintError): Diagnostic {
  return createDiagnostic(error.code, error.message, undefined, {
    kind: "unsupported_constraint",
    constraint: formatExpression(error.constraint),
  });
}

// =============================================================================
// Shared Setup
// =============================================================================

interface Prepared {
  source: SourceFile;
  index: Expression;
  constraint: Expression;
  context: SymbolicContext;
}

type Preparation = { ok: true; value: Prepared } | { ok: false; source: SourceFile; diagnostics: Diagnostic[] };

function variableNames(expr: Expression, names: Set<string> = new Set()): Set<string> {
  if (expr instanceof Variable) {
    names.add(expr.name);
  }
  for (const child of expr.subexpressions) {
    variableNames(child, names);
  }
  return names;
}

function prepare(args: CliArgs): Preparation {
  const source = new SourceFile("<constraint>", args.constraint);
  const { expr, errors } = parseConstraint(source, { types: Object.fromEntries(args.types) });
  if (expr === undefined || errors.length > 0) {
    return { ok: false, source, diagnostics: errors.map(syntaxDiagnostic) };
  }

  const names = variableNames(expr);
  if (!names.has(args.index)) {
    const suggestions = suggestNames(args.index, names);
    return {
      ok: false,
      source,
      diagnostics: [
        createDiagnostic(
          ErrorCode.InvalidArgument,
          `index variable '${args.index}' does not occur in the constraint`,
          undefined,
          { kind: "unknown_index", constraint: formatExpression(expr) },
          suggestions.length > 0 ? [{ description: `did you mean '${suggestions[0]}'?` }] : []
        ),
      ],
    };
  }

  return {
    ok: true,
    value: {
      source,
      index: variable(args.index, args.types.get(args.index) ?? "int"),
      constraint: expr,
      context: SymbolicContext.withBindings(Object.fromEntries(args.bindings)),
    },
  };
}

function hasBindings(args: CliArgs): boolean {
  return args.bindings.size > 0;
}

// =============================================================================
// Results
// =============================================================================

interface CommandResult {
  status: "success" | "error";
  command: Command;
  index: string;
  constraint: string;
  diagnostics: Diagnostic[];
  [key: string]: unknown;
}

function describeIntervals(intervals: DottedIntervals): Record<string, unknown> {
  const { lowerBound, upperBound } = intervals.interval;
  const size = intervals.interval.size();
  return {
    text: intervals.toString(),
    lower: lowerBound ? formatExpression(lowerBound) : null,
    upper: upperBound ? formatExpression(upperBound) : null,
    size: size ? formatExpression(size) : null,
    dots: intervals.dots.map(formatExpression),
  };
}

/**
 * Print a result, returning the exit code.
 */
function report(args: CliArgs, result: CommandResult, source: SourceFile, lines: string[], out: Output): number {
  if (args.json) {
    out.stdout(formatJson(result));
  } else {
    if (!args.quiet) {
      for (const line of lines) out.stdout(line);
    }
    const shown = args.quiet ? result.diagnostics.filter(isError) : result.diagnostics;
    if (shown.length > 0) {
      out.stderr(args.format === "simple" ? formatSimple(shown) : formatPretty(shown, source));
    }
  }
  return result.status === "error" ? 1 : 0;
}

function failure(args: CliArgs, source: SourceFile, diagnostics: Diagnostic[], out: Output): number {
  const result: CommandResult = {
    status: "error",
    command: args.command,
    index: args.index,
    constraint: args.constraint,
    diagnostics,
  };
  return report(args, result, source, [], out);
}

// =============================================================================
// Commands
// =============================================================================

function runExtract(args: CliArgs, out: Output): number {
  const prepared = prepare(args);
  if (!prepared.ok) return failure(args, prepared.source, prepared.diagnostics, out);
  const { source, index, constraint, context } = prepared.value;

  const result = fromConstraints(index, constraint, { context });
  if (!result.ok) {
    return failure(args, source, [unsupportedDiagnostic(result.error)], out);
  }

  const diagnostics = result.issues.map(issueDiagnostic);
  const intervals = hasBindings(args) ? result.value.bind(context) : result.value;

  try {
    intervals.interval.toDomainConstraint(index);
  } catch (e) {
    if (!(e instanceof DomainError)) throw e;
    diagnostics.push(
      createDiagnostic(e.code, e.message, undefined, {
        kind: "empty_domain",
        constraint: intervals.interval.toString(),
      })
    );
  }

  const status = diagnostics.some(isError) ? "error" : "success";
  return report(
    args,
    {
      status,
      command: "extract",
      index: args.index,
      constraint: formatExpression(constraint),
      diagnostics,
      intervals: describeIntervals(intervals),
    },
    source,
    [`${args.index} in ${intervals.toString()}`],
    out
  );
}

function runTree(args: CliArgs, out: Output): number {
  const prepared = prepare(args);
  if (!prepared.ok) return failure(args, prepared.source, prepared.diagnostics, out);
  const { source, index, constraint, context } = prepared.value;

  const result = buildCaseTree(index, constraint, { context });
  if (!result.ok) {
    return failure(args, source, [unsupportedDiagnostic(result.error)], out);
  }

  const tree = hasBindings(args) ? resolveCaseTree(result.tree, context) : result.tree;
  return report(
    args,
    {
      status: "success",
      command: "tree",
      index: args.index,
      constraint: formatExpression(constraint),
      diagnostics: result.issues.map(issueDiagnostic),
      tree: formatCaseTree(tree),
    },
    source,
    [formatCaseTree(tree)],
    out
  );
}

function runEnumerate(args: CliArgs, out: Output): number {
  const prepared = prepare(args);
  if (!prepared.ok) return failure(args, prepared.source, prepared.diagnostics, out);
  const { source, index, constraint, context } = prepared.value;

  const result = buildCaseTree(index, constraint, { context });
  if (!result.ok) {
    return failure(args, source, [unsupportedDiagnostic(result.error)], out);
  }

  let values: bigint[];
  try {
    values = enumerateCaseTree(result.tree, index, context);
  } catch (e) {
    if (!(e instanceof NotEnumerableError)) throw e;
    return failure(
      args,
      source,
      [
        createDiagnostic(e.code, e.message, undefined, { kind: "not_enumerable" }, [
          { description: "bind the free variables with --let", template: "--let n=10" },
        ]),
      ],
      out
    );
  }

  return report(
    args,
    {
      status: "success",
      command: "enumerate",
      index: args.index,
      constraint: formatExpression(constraint),
      diagnostics: result.issues.map(issueDiagnostic),
      values,
    },
    source,
    [values.length > 0 ? values.join(" ") : "(empty)"],
    out
  );
}

function runExplain(args: CliArgs, out: Output): number {
  const code = args.code.toUpperCase();
  if (!isErrorCode(code)) {
    const suggestions = suggestNames(code, Object.values(ErrorCode), 1);
    const diagnostic = createDiagnostic(
      ErrorCode.InvalidArgument,
      `unknown diagnostic code '${args.code}'`,
      undefined,
      { kind: "usage_error" },
      suggestions.length > 0 ? [{ description: `did you mean '${suggestions[0]}'?` }] : []
    );
    out.stderr(args.format === "simple" ? formatSimple([diagnostic]) : formatPretty([diagnostic]));
    return 1;
  }

  const description = getErrorDescription(code);
  if (args.json) {
    out.stdout(formatJson({ code, severity: getCodeSeverity(code), description }));
  } else {
    out.stdout(`${code} (${getCodeSeverity(code)}): ${description}`);
  }
  return 0;
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Run the CLI on `argv` (without the node and script entries).
 */
export function runCli(argv: string[], out: Output = consoleOutput): number {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    out.stderr(formatPretty([parsed.diagnostic]));
    return 1;
  }

  const { args } = parsed;
  switch (args.command) {
    case "help":
      out.stdout(HELP);
      return 0;
    case "version":
      out.stdout(`intervals ${VERSION}`);
      return 0;
    case "extract":
      return runExtract(args, out);
    case "tree":
      return runTree(args, out);
    case "enumerate":
      return runEnumerate(args, out);
    case "explain":
      return runExplain(args, out);
  }
}
