/**
 * Solve driver tests: scenarios, optimisation, iteration bound and tracing.
 */
import { describe, it, expect } from "vitest";

import {
  CONTRADICTION,
  EMPTY_DOMAIN,
  INTEGER_MAX,
  STUCK,
  SettledState,
  Solution,
  SolveTraceEvent,
  boolValue,
  booleanConstraint,
  booleanDomain,
  boolSingle,
  boolUniverse,
  boolVar,
  closedRange,
  constrainAnd,
  declareAnd,
  different,
  divide,
  explicitSet,
  falseExpr,
  greater,
  intEmpty,
  intEquals,
  intUniverse,
  intValue,
  intVar,
  integer,
  integerConstraint,
  integerDomain,
  maximise,
  minimise,
  not,
  objectiveOf,
  or,
  satisfy,
  search,
  solutionsOf,
  solutionEquals,
  solve,
  solveGoal,
  trueExpr,
  variable,
} from "../src/index";

const intSolution = (name: string, value: number): Solution => ({
  tag: "variable",
  symbol: { name },
  value: { tag: "integer", value: integer(value) },
});

const boolSolution = (name: string, value: boolean): Solution => ({
  tag: "variable",
  symbol: { name },
  value: { tag: "boolean", value },
});

const x = intVar("x");
const xEquals5 = solveGoal(satisfy(integerConstraint(intEquals(x, intValue(5)))));

describe("solve", () => {
  it("solves x == 5", () => {
    expect(solve(xEquals5)).toEqual([intSolution("x", 5)]);
  });

  it("solves x == 5 over a declared universe", () => {
    expect(solve(declareAnd(variable("x", integerDomain(intUniverse)), xEquals5))).toEqual([intSolution("x", 5)]);
  });

  it("reports a false constraint as a contradiction", () => {
    const prog = constrainAnd(booleanConstraint(falseExpr), solveGoal(satisfy(booleanConstraint(trueExpr))));
    expect(solve(prog)).toEqual([{ tag: "unsatisfiable", symbol: { name: "program" }, reason: CONTRADICTION }]);
  });

  it("reports a variable declared over the empty domain", () => {
    const prog = declareAnd(variable("x", integerDomain(intEmpty)), xEquals5);
    expect(solve(prog)).toEqual([{ tag: "unsatisfiable", symbol: { name: "x" }, reason: EMPTY_DOMAIN }]);
  });

  it("reports a declared range that excludes the required value", () => {
    const prog = declareAnd(
      variable("x", integerDomain(closedRange(0, 10))),
      solveGoal(satisfy(integerConstraint(intEquals(x, intValue(20)))))
    );
    expect(solve(prog)).toEqual([{ tag: "unsatisfiable", symbol: { name: "x" }, reason: EMPTY_DOMAIN }]);
  });

  it("reports NaN arithmetic as a contradiction", () => {
    const prog = solveGoal(satisfy(integerConstraint(intEquals(divide(x, intValue(0)), intValue(1)))));
    expect(solve(prog)).toEqual([{ tag: "unsatisfiable", symbol: { name: "program" }, reason: CONTRADICTION }]);
  });

  it("is satisfied with no solutions when nothing is free", () => {
    expect(solve(solveGoal(satisfy(booleanConstraint(trueExpr))))).toEqual([]);
  });

  it("assigns narrowed booleans together", () => {
    const prog = declareAnd(
      variable("on", booleanDomain(boolUniverse)),
      declareAnd(
        variable("off", booleanDomain(boolUniverse)),
        constrainAnd(booleanConstraint(not(boolVar("off"))), solveGoal(satisfy(booleanConstraint(boolVar("on")))))
      )
    );
    expect(solve(prog)).toEqual([boolSolution("on", true), boolSolution("off", false)]);
  });

  it("assigns one variable at a time when nothing is narrowed", () => {
    const prog = solveGoal(satisfy(booleanConstraint(or(boolVar("p"), boolVar("q")))));
    expect(solve(prog)).toEqual([boolSolution("p", false), boolSolution("q", true)]);
  });

  it("resolves domains that depend on other variables", () => {
    const prog = declareAnd(
      variable("x", integerDomain(closedRange(1, 10))),
      declareAnd(
        variable("y", integerDomain(closedRange(intVar("x"), 20))),
        solveGoal(satisfy(integerConstraint(greater(intVar("y"), intVar("x")))))
      )
    );
    expect(solve(prog)).toEqual([intSolution("x", 1), intSolution("y", 2)]);
  });

  it("reports single-valued declarations as constants", () => {
    const prog = declareAnd(
      variable("k", integerDomain(explicitSet(7))),
      solveGoal(satisfy(integerConstraint(greater(intVar("k"), intValue(0)))))
    );
    expect(solve(prog)).toEqual([
      { tag: "constant", symbol: { name: "k" }, value: { tag: "integer", value: integer(7) } },
    ]);
  });

  it("assigns a variable that reduction removes", () => {
    const prog = solveGoal(satisfy(booleanConstraint(or(boolValue(true), boolVar("p")))));
    expect(solve(prog)).toEqual([boolSolution("p", false)]);
  });

  it("assigns a variable hidden behind NaN arithmetic", () => {
    const prog = solveGoal(satisfy(integerConstraint(different(divide(x, intValue(0)), intValue(1)))));
    expect(solve(prog)).toEqual([intSolution("x", 0)]);
  });

  it("samples a removed variable from its declared domain", () => {
    const prog = declareAnd(
      variable("p", booleanDomain(boolSingle(true))),
      solveGoal(satisfy(booleanConstraint(or(boolValue(true), boolVar("p")))))
    );
    expect(solve(prog)).toEqual([
      { tag: "constant", symbol: { name: "p" }, value: { tag: "boolean", value: true } },
    ]);
  });

  it("stops at the iteration bound", () => {
    expect(solve(xEquals5, { maxIterations: 0 })).toEqual([
      { tag: "unsatisfiable", symbol: { name: "x" }, reason: STUCK },
    ]);
  });
});

describe("optimisation", () => {
  const bounded = (goal: typeof maximise) =>
    declareAnd(
      variable("x", integerDomain(closedRange(-100, 100))),
      solveGoal(goal(integerConstraint(greater(x, intValue(-1000)))))
    );

  it("maximises to the top of the declared range", () => {
    expect(solve(bounded(maximise))).toEqual([intSolution("x", 100)]);
  });

  it("minimises to the bottom of the declared range", () => {
    expect(solve(bounded(minimise))).toEqual([intSolution("x", -100)]);
  });

  it("uses the left operand when there is no explicit objective", () => {
    const goal = maximise(integerConstraint(greater(x, intValue(0))));
    expect(objectiveOf(goal)).toEqual(x);
    expect(objectiveOf(maximise(integerConstraint(greater(x, intValue(0))), intVar("cost")))).toEqual(intVar("cost"));
    expect(objectiveOf(satisfy(booleanConstraint(trueExpr)))).toBeUndefined();
  });

  it("maximises to the largest representable integer", () => {
    expect(solve(solveGoal(maximise(integerConstraint(greater(x, intValue(0))))))).toEqual([
      { tag: "variable", symbol: { name: "x" }, value: { tag: "integer", value: integer(INTEGER_MAX) } },
    ]);
  });

  it("bisects toward the bound", () => {
    const bounds: bigint[] = [];
    solve(bounded(maximise), { trace: e => { if (e.kind === "bound") bounds.push(e.bound); } });
    expect(bounds.length).toBeLessThanOrEqual(128);
    expect(bounds[bounds.length - 1]).toBe(100n);
  });

  it("respects the round limit", () => {
    // the first bound lies far above the declared range, so -100 stands
    expect(solve(bounded(maximise), { maxOptimisationRounds: 1 })).toEqual([intSolution("x", -100)]);
  });
});

describe("tracing", () => {
  it("reports iterations, attempts and the final state", () => {
    const events: SolveTraceEvent[] = [];
    const state = search(xEquals5, { trace: e => events.push(e) });
    expect(state.tag).toBe("satisfied");
    expect(events.map(e => e.kind)).toEqual(["iteration", "attempt", "iteration", "finished"]);
  });

  it("hands settled states to solutionsOf", () => {
    const state: SettledState = search(xEquals5);
    expect(solutionsOf(xEquals5, state)).toEqual([intSolution("x", 5)]);
  });
});

describe("solutionEquals", () => {
  it("compares tag, symbol and value", () => {
    expect(solutionEquals(intSolution("x", 1), intSolution("x", 1))).toBe(true);
    expect(solutionEquals(intSolution("x", 1), intSolution("x", 2))).toBe(false);
    expect(solutionEquals(intSolution("x", 1), boolSolution("x", true))).toBe(false);
  });
});
