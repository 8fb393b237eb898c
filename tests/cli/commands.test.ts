/**
 * CLI Command Tests
 */

import { describe, test, expect, beforeEach } from "vitest";
import { runCli, parseCliArgs } from "../../src/commands";
import { resetDiagnosticIdCounter } from "../../src/diagnostics";

interface Run {
  code: number;
  out: string[];
  err: string[];
}

function run(...argv: string[]): Run {
  const out: string[] = [];
  const err: string[] = [];
  const code = runCli(argv, {
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  });
  return { code, out, err };
}

beforeEach(() => {
  resetDiagnosticIdCounter();
});

describe("extract", () => {
  test("prints the dotted interval", () => {
    expect(run("extract", "x", "x > 2 && x < 4")).toEqual({ code: 0, out: ["x in [3, 3]"], err: [] });
  });

  test("index names that are also object members", () => {
    expect(run("extract", "constructor", "constructor > 2 && constructor < 4").out).toEqual(["constructor in [3, 3]"]);
  });

  test("binds --let values", () => {
    expect(run("extract", "i", "0 <= i < n", "--let", "n=4").out).toEqual(["i in [0, 3]"]);
  });

  test("reports collected issues as warnings", () => {
    const { code, out, err } = run("extract", "x", "x == 3");
    expect(code).toBe(0);
    expect(out).toEqual(["x in [?, ?] where x == 3"]);
    expect(err).toEqual([
      [
        "warning[W1001]: kept x == 3 as a dot: interval does not support == in x == 3",
        "    = constraint: x == 3",
        "",
        "1 warning",
      ].join("\n"),
    ]);
  });

  test("--quiet hides everything but errors", () => {
    expect(run("extract", "x", "x == 3", "--quiet")).toEqual({ code: 0, out: [], err: [] });
  });

  test("declared real variables", () => {
    const { out, err } = run("extract", "t", "t >= 0.5 && t < 2", "--real", "t");
    expect(out).toEqual(["t in [0.5, ?] where t < 2"]);
    expect(err[0].startsWith("warning[W1003]: kept t < 2 as a dot: t is real-valued")).toBe(true);
  });

  test("an empty domain is an error", () => {
    const { code, out, err } = run("extract", "x", "x >= 5 && x <= 3", "--json");
    expect(code).toBe(1);
    expect(err).toEqual([]);
    const result = JSON.parse(out[0]);
    expect(result.status).toBe("error");
    expect(result.diagnostics[0].code).toBe("E2001");
    expect(result.diagnostics[0].message).toBe("empty domain: 5 > 3");
    expect(result.intervals).toEqual({ text: "[5, 3]", lower: "5", upper: "3", size: "-1", dots: [] });
  });

  test("syntax errors point into the constraint", () => {
    const { code, err } = run("extract", "x", "x >=");
    expect(code).toBe(1);
    expect(err).toEqual([
      [
        "error[E0005]: Expected an expression, found end of input",
        "  --> <constraint>:1:5",
        "    |",
        "  1 | x >=",
        "    |     ^",
        "",
        "1 error",
      ].join("\n"),
    ]);
  });

  test("real literals out of range are syntax errors", () => {
    const literal = `${"9".repeat(400)}.5`;
    const { code, out, err } = run("extract", "x", `x >= ${literal}`);
    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err[0].split("\n")[0]).toBe(`error[E0003]: Real literal '${literal}' is out of range`);
  });

  test("suggests the index when it does not occur", () => {
    const { code, err } = run("extract", "y", "x > 1");
    expect(code).toBe(1);
    expect(err).toEqual([
      [
        "error[E3001]: index variable 'y' does not occur in the constraint",
        "    = constraint: x > 1",
        "    = help: did you mean 'x'?",
        "",
        "1 error",
      ].join("\n"),
    ]);
  });
});

describe("tree", () => {
  test("prints the case split", () => {
    const { code, out } = run("tree", "x", "x < 0 || x > 10");
    expect(code).toBe(0);
    expect(out).toEqual([["if x < 0", "  [?, -1]", "else", "  [11, ?]"].join("\n")]);
  });

  test("resolves conditions with --let", () => {
    const { out } = run("tree", "x", "x >= 0 && (if n > 0 then x <= n else x <= 0)", "--let", "n=0");
    expect(out).toEqual(["[0, 0]"]);
  });
});

describe("enumerate", () => {
  test("lists the values", () => {
    expect(run("enumerate", "i", "0 <= i < n", "--let", "n=4").out).toEqual(["0 1 2 3"]);
  });

  test("across disjunctions", () => {
    expect(run("enumerate", "x", "x >= -2 && x <= 12 && (x < 0 || x > 10)").out).toEqual(["-2 -1 11 12"]);
  });

  test("an empty range", () => {
    expect(run("enumerate", "x", "x > 3 && x < 3").out).toEqual(["(empty)"]);
  });

  test("as JSON", () => {
    const { out } = run("enumerate", "x", "1 <= x <= 3", "--json");
    expect(JSON.parse(out[0]).values).toEqual(["1", "2", "3"]);
  });

  test("symbolic bounds need bindings", () => {
    const { code, err } = run("enumerate", "x", "x >= n && x <= 3");
    expect(code).toBe(1);
    expect(err).toEqual([
      [
        "error[E2002]: cannot enumerate [n, 3]: bounds must both be integer constants",
        "    = help: bind the free variables with --let",
        "            --let n=10",
        "",
        "1 error",
      ].join("\n"),
    ]);
  });
});

describe("explain", () => {
  test("describes a code", () => {
    expect(run("explain", "w1002")).toEqual({
      code: 0,
      out: ["W1002 (warning): Bound cannot be ordered against the current bound"],
      err: [],
    });
  });

  test("as JSON", () => {
    const { out } = run("explain", "E2002", "--json");
    expect(JSON.parse(out[0])).toEqual({
      code: "E2002",
      severity: "error",
      description: "Interval bounds are not concrete integers",
    });
  });

  test("unknown codes get a suggestion", () => {
    const { code, err } = run("explain", "W1009");
    expect(code).toBe(1);
    expect(err).toEqual(["error[E3001]: unknown diagnostic code 'W1009'\n    = help: did you mean 'W1001'?\n\n1 error"]);
  });
});

describe("--format simple", () => {
  test("one line per diagnostic", () => {
    const { code, out, err } = run("extract", "x", "x == 3", "--format", "simple");
    expect(code).toBe(0);
    expect(out).toEqual(["x in [?, ?] where x == 3"]);
    expect(err).toEqual(["warning[W1001]: kept x == 3 as a dot: interval does not support == in x == 3"]);
  });

  test("syntax errors keep their location", () => {
    expect(run("extract", "x", "x >=", "--format", "simple").err).toEqual([
      "<constraint>:1:5: error[E0005]: Expected an expression, found end of input",
    ]);
  });

  test("unknown formats are usage errors", () => {
    const { code, err } = run("extract", "x", "x > 1", "--format", "fancy");
    expect(code).toBe(1);
    expect(err[0].split("\n")[0]).toBe("error[E3001]: unknown format 'fancy'");
  });
});

describe("usage", () => {
  test("help by default", () => {
    const { code, out } = run();
    expect(code).toBe(0);
    expect(out[0].split("\n")[0]).toBe("intervals 0.1.0");
  });

  test("version", () => {
    expect(run("version").out).toEqual(["intervals 0.1.0"]);
    expect(run("--version").out).toEqual(["intervals 0.1.0"]);
  });

  test("unknown commands get a suggestion", () => {
    const { code, err } = run("extrac", "x", "x > 1");
    expect(code).toBe(1);
    expect(err).toEqual(["error[E3001]: unknown command 'extrac'\n    = help: did you mean 'extract'?\n\n1 error"]);
  });

  test("malformed bindings", () => {
    const { code, err } = run("enumerate", "x", "x < n", "--let", "n=abc");
    expect(code).toBe(1);
    expect(err[0].split("\n")[0]).toBe("error[E3001]: invalid binding 'n=abc'");
  });

  test("unknown options", () => {
    const { code, err } = run("extract", "x", "x > 1", "--frobnicate");
    expect(code).toBe(1);
    expect(err[0].startsWith("error[E3001]: Unknown option '--frobnicate'")).toBe(true);
  });

  test("missing constraint", () => {
    const parsed = parseCliArgs(["extract", "x"]);
    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.diagnostic.message).toBe("'extract' expects an index variable and a constraint");
  });

  test("collects repeated declarations", () => {
    const parsed = parseCliArgs(["extract", "t", "t > s", "--real", "t", "--real", "s", "--let", "k=-2"]);
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.args.types).toEqual(new Map([["t", "real"], ["s", "real"]]));
    expect(parsed.args.bindings).toEqual(new Map([["k", -2n]]));
  });
});
