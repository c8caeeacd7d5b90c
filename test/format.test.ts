import { describe, it, expect } from "vitest";
import color from "cli-color";

import {
  add,
  and,
  boolSingle,
  boolValue,
  boolVar,
  booleanDomain,
  closedRange,
  complement,
  declareAnd,
  difference,
  domainToString,
  explicitSet,
  goalToString,
  greater,
  implies,
  inDomain,
  intEmpty,
  intParen,
  intUniverse,
  intValue,
  intVar,
  integer,
  integerConstraint,
  integerDomain,
  integerDomainToString,
  integerToString,
  booleanToString,
  maximise,
  minimise,
  nanExpr,
  negate,
  not,
  openLeftClosedRightRange,
  programToString,
  relationToString,
  solutionToString,
  solutionsToString,
  solveGoal,
  times,
  traceEventToString,
  union,
  variable,
} from "../src/index";

describe("expressions", () => {
  it("prints integer expressions", () => {
    expect(integerToString(add(intVar("x"), times(intValue(2), intParen(negate(intVar("y"))))))).toBe(
      "x + 2 * (-y)"
    );
    expect(integerToString(nanExpr)).toBe("NaN");
  });

  it("prints boolean expressions", () => {
    expect(booleanToString(implies(and(boolVar("p"), not(boolVar("q"))), boolValue(true)))).toBe(
      "p && !q -> true"
    );
  });
});

describe("domains", () => {
  it("prints ranges and sets", () => {
    expect(integerDomainToString(union(closedRange(0, 9), explicitSet(12, 15)))).toBe("([0..9] | {12, 15})");
    expect(integerDomainToString(difference(intUniverse, complement(openLeftClosedRightRange(1, 3))))).toBe(
      "(int \\ ~(1..3])"
    );
  });

  it("prints boolean domains", () => {
    expect(domainToString(booleanDomain(boolSingle(true)))).toBe("{true}");
  });

  it("prints membership", () => {
    expect(relationToString(inDomain(intVar("x"), intEmpty))).toBe("x in {}");
  });
});

describe("programs", () => {
  const constraint = integerConstraint(greater(intVar("x"), intValue(-1000)));

  it("prints one line per part", () => {
    const prog = declareAnd(variable("x", integerDomain(closedRange(-100, 100))), solveGoal(maximise(constraint)));
    expect(programToString(prog)).toBe("declare x in [-100..100]\nmaximise x > -1000");
  });

  it("prints explicit objectives", () => {
    expect(goalToString(minimise(constraint, intVar("cost")))).toBe("minimise cost subject to x > -1000");
  });
});

describe("solutions", () => {
  it("prints each kind of solution", () => {
    expect(
      solutionsToString([
        { tag: "variable", symbol: { name: "x" }, value: { tag: "integer", value: integer(5) } },
        { tag: "constant", symbol: { name: "k" }, value: { tag: "integer", value: integer(7) } },
      ])
    ).toBe("x = 5\nconst k = 7");
    expect(solutionToString({ tag: "unsatisfiable", symbol: { name: "x" }, reason: "empty domain" })).toBe(
      "unsatisfiable x: empty domain"
    );
    expect(solutionsToString([])).toBe("satisfied");
  });

  it("colours symbols and values on request", () => {
    const s = solutionToString(
      { tag: "variable", symbol: { name: "x" }, value: { tag: "boolean", value: true } },
      { color: true }
    );
    expect(s).toBe(`${color.magenta("x")} = ${color.yellow("true")}`);
  });
});

describe("trace events", () => {
  it("prints bound checks", () => {
    expect(
      traceEventToString({ kind: "bound", goal: "maximise", objective: intVar("x"), bound: 99n, improved: true })
    ).toBe("  maximise x > 99: improved");
  });

  it("prints attempts", () => {
    expect(
      traceEventToString({
        kind: "attempt",
        assignments: [{ name: { name: "x" }, value: { tag: "integer", value: integer(5) } }],
      })
    ).toBe("  try x = 5");
  });
});
