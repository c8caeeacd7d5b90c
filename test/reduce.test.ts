/**
 * Reduction tests: folding, short-circuiting, domain evaluation and
 * three-valued membership.
 */
import { describe, it, expect } from "vitest";

import {
  add,
  and,
  boolEquals,
  boolVar,
  booleanConstraint,
  closedRange,
  constrainAnd,
  different,
  divide,
  domainContains,
  evaluateDomain,
  evaluateInteger,
  explicitSet,
  falseExpr,
  greater,
  implies,
  inDomain,
  intEmpty,
  intEquals,
  intParen,
  intValue,
  intVar,
  integer,
  integerConstraint,
  modulo,
  nanExpr,
  nanNumber,
  negate,
  not,
  openRange,
  or,
  reduce,
  reduceBoolean,
  reduceConstraint,
  reduceInteger,
  reduceRelation,
  satisfy,
  solveGoal,
  times,
  trueExpr,
  union,
} from "../src/index";

const p = boolVar("p");
const x = intVar("x");

describe("reduceBoolean", () => {
  it("short-circuits and/or", () => {
    expect(reduceBoolean(and(trueExpr, p))).toEqual(p);
    expect(reduceBoolean(and(p, falseExpr))).toEqual(falseExpr);
    expect(reduceBoolean(or(p, trueExpr))).toEqual(trueExpr);
    expect(reduceBoolean(or(falseExpr, p))).toEqual(p);
  });

  it("simplifies implication", () => {
    expect(reduceBoolean(implies(falseExpr, p))).toEqual(trueExpr);
    expect(reduceBoolean(implies(trueExpr, p))).toEqual(p);
    expect(reduceBoolean(implies(p, falseExpr))).toEqual(not(p));
  });

  it("removes double negation", () => {
    expect(reduceBoolean(not(not(p)))).toEqual(p);
    expect(reduceBoolean(not(trueExpr))).toEqual(falseExpr);
  });

  it("simplifies equality with a constant", () => {
    expect(reduceBoolean(boolEquals(p, trueExpr))).toEqual(p);
    expect(reduceBoolean(boolEquals(falseExpr, p))).toEqual(not(p));
    expect(reduceBoolean(boolEquals(falseExpr, falseExpr))).toEqual(trueExpr);
  });
});

describe("reduceInteger", () => {
  it("folds closed arithmetic", () => {
    expect(reduceInteger(add(intValue(2), times(intValue(3), intValue(4))))).toEqual(intValue(14));
    expect(reduceInteger(intParen(negate(intValue(5))))).toEqual(intValue(-5));
  });

  it("folds identities", () => {
    expect(reduceInteger(add(x, intValue(0)))).toEqual(x);
    expect(reduceInteger(times(intValue(1), x))).toEqual(x);
    expect(reduceInteger(divide(x, intValue(1)))).toEqual(x);
  });

  it("gives NaN for division by a literal zero", () => {
    expect(reduceInteger(divide(x, intValue(0)))).toEqual(nanExpr);
    expect(reduceInteger(modulo(x, intValue(0)))).toEqual(nanExpr);
  });

  it("propagates NaN through open expressions", () => {
    expect(reduceInteger(add(nanExpr, x))).toEqual(nanExpr);
  });

  it("keeps open expressions", () => {
    expect(reduceInteger(add(x, intValue(1)))).toEqual(add(x, intValue(1)));
  });

  it("evaluates closed expressions", () => {
    expect(evaluateInteger(modulo(intValue(-7), intValue(3)))).toEqual(integer(-1));
    expect(evaluateInteger(x)).toBeUndefined();
  });
});

describe("evaluateDomain", () => {
  it("evaluates ranges exactly", () => {
    expect(evaluateDomain(openRange(0, 5))).toEqual([{ low: 1n, high: 4n }]);
  });

  it("skips NaN elements", () => {
    expect(evaluateDomain(explicitSet(3, nanExpr, 1))).toEqual([
      { low: 1n, high: 1n },
      { low: 3n, high: 3n },
    ]);
  });

  it("empties ranges with a NaN bound", () => {
    expect(evaluateDomain(closedRange(nanExpr, 5))).toEqual([]);
  });

  it("is undefined while a bound is open", () => {
    expect(evaluateDomain(closedRange(0, intVar("y")))).toBeUndefined();
  });
});

describe("domainContains", () => {
  it("is undecided while the domain is open", () => {
    expect(domainContains(closedRange(0, intVar("y")), integer(20))).toBeUndefined();
  });

  it("decides a union from its closed side", () => {
    expect(domainContains(union(closedRange(0, intVar("y")), explicitSet(7)), integer(7))).toBe(true);
  });

  it("never contains NaN", () => {
    expect(domainContains({ tag: "universe" }, nanNumber)).toBe(false);
  });
});

describe("reduceRelation", () => {
  it("decides closed relations", () => {
    expect(reduceRelation(intEquals(intValue(2), intValue(2)))).toBe(true);
    expect(reduceRelation(greater(intValue(2), intValue(3)))).toBe(false);
  });

  it("treats NaN as unequal to everything", () => {
    expect(reduceRelation(different(nanExpr, intValue(1)))).toBe(true);
    expect(reduceRelation(greater(nanExpr, intValue(1)))).toBe(false);
    expect(reduceRelation(intEquals(divide(x, intValue(0)), intValue(1)))).toBe(false);
  });

  it("decides membership", () => {
    expect(reduceRelation(inDomain(intValue(5), closedRange(0, 10)))).toBe(true);
    expect(reduceRelation(inDomain(x, intEmpty))).toBe(false);
  });

  it("keeps undecided membership", () => {
    const open = inDomain(x, closedRange(0, intVar("y")));
    expect(reduceRelation(open)).toEqual(open);
  });

  it("turns decided relations into boolean constraints", () => {
    expect(reduceConstraint(integerConstraint(intEquals(intValue(1), intValue(1))))).toEqual(
      booleanConstraint(trueExpr)
    );
  });
});

describe("reduce", () => {
  it("drops satisfied constraints", () => {
    const prog = constrainAnd(
      integerConstraint(intEquals(intValue(1), intValue(1))),
      solveGoal(satisfy(booleanConstraint(p)))
    );
    expect(reduce(prog)).toEqual(solveGoal(satisfy(booleanConstraint(p))));
  });

  it("keeps false constraints", () => {
    const prog = constrainAnd(booleanConstraint(and(p, falseExpr)), solveGoal(satisfy(booleanConstraint(p))));
    expect(reduce(prog)).toEqual(
      constrainAnd(booleanConstraint(falseExpr), solveGoal(satisfy(booleanConstraint(p))))
    );
  });
});
