/**
 * Reduction: constant folding and short-circuiting over program trees.
 *
 * Reducing never changes what a tree denotes, only how much of it is still
 * symbolic. Domains embed integer expressions and `in` embeds domains, so
 * domain evaluation lives here too: evaluating a domain reduces its bounds
 * with the same functions that reduce expressions.
 *
 * reduce(reduce(p)) is structurally equal to reduce(p).
 */

import {
  BooleanExpression,
  BooleanIntegerNumberExpression,
  ConstraintLogicExpression,
  ConstraintProgramExpression,
  Domain,
  IntegerNumberDomain,
  IntegerNumberExpression,
  RangeTag,
  SatisfactionExpression,
  boolValue,
  booleanConstraint,
  intValue,
  nanExpr,
} from "./expr";
import {
  IntervalSet,
  complementSet,
  emptySet,
  fullSet,
  intersectSets,
  intervalSet,
  pointSet,
  setContains,
  setIsEmpty,
  subtractSets,
  unionSets,
} from "./domain";
import {
  IntegerNumber,
  addNumbers,
  divideNumbers,
  minusNumbers,
  moduloNumbers,
  negateNumber,
  numberGreater,
  numberLess,
  numbersEqual,
  timesNumbers,
} from "./value";

// ============================================================================
// Helpers
// ============================================================================

const isValue = (e: IntegerNumberExpression): e is { tag: "value"; value: IntegerNumber } =>
  e.tag === "value";

const isNaNExpr = (e: IntegerNumberExpression): boolean =>
  e.tag === "value" && e.value.tag === "nan";

const isLiteral = (e: IntegerNumberExpression, n: bigint): boolean =>
  e.tag === "value" && e.value.tag === "value" && e.value.value === n;

const boolOf = (e: BooleanExpression): boolean | undefined =>
  e.tag === "value" ? e.value : undefined;

/**
 * Negation with double-negation elimination; the operand is already reduced.
 */
function negateReduced(e: BooleanExpression): BooleanExpression {
  if (e.tag === "value") return boolValue(!e.value);
  if (e.tag === "not") return e.expr;
  return { tag: "not", expr: e };
}

// ============================================================================
// Boolean Expressions
// ============================================================================

export function reduceBoolean(e: BooleanExpression): BooleanExpression {
  switch (e.tag) {
    case "value":
    case "variable":
      return e;

    case "not":
      return negateReduced(reduceBoolean(e.expr));

    case "parenthesis": {
      const inner = reduceBoolean(e.expr);
      return inner.tag === "value" ? inner : { tag: "parenthesis", expr: inner };
    }

    case "and": {
      const left = reduceBoolean(e.left);
      if (boolOf(left) === false) return left;
      const right = reduceBoolean(e.right);
      if (boolOf(right) === false) return right;
      if (boolOf(left) === true) return right;
      if (boolOf(right) === true) return left;
      return { tag: "and", left, right };
    }

    case "or": {
      const left = reduceBoolean(e.left);
      if (boolOf(left) === true) return left;
      const right = reduceBoolean(e.right);
      if (boolOf(right) === true) return right;
      if (boolOf(left) === false) return right;
      if (boolOf(right) === false) return left;
      return { tag: "or", left, right };
    }

    case "implies": {
      const left = reduceBoolean(e.left);
      if (boolOf(left) === false) return boolValue(true);
      const right = reduceBoolean(e.right);
      if (boolOf(left) === true) return right;
      if (boolOf(right) === true) return right;
      if (boolOf(right) === false) return negateReduced(left);
      return { tag: "implies", left, right };
    }

    case "equals": {
      const left = reduceBoolean(e.left);
      const right = reduceBoolean(e.right);
      const l = boolOf(left);
      const r = boolOf(right);
      if (l !== undefined && r !== undefined) return boolValue(l === r);
      if (l !== undefined) return l ? right : negateReduced(right);
      if (r !== undefined) return r ? left : negateReduced(left);
      return { tag: "equals", left, right };
    }
  }
}

// ============================================================================
// Integer Expressions
// ============================================================================

const ARITHMETIC: Record<"add" | "minus" | "times" | "divide" | "modulo", (a: IntegerNumber, b: IntegerNumber) => IntegerNumber> = {
  add: addNumbers,
  minus: minusNumbers,
  times: timesNumbers,
  divide: divideNumbers,
  modulo: moduloNumbers,
};

export function reduceInteger(e: IntegerNumberExpression): IntegerNumberExpression {
  switch (e.tag) {
    case "value":
    case "variable":
      return e;

    case "parenthesis": {
      const inner = reduceInteger(e.expr);
      return isValue(inner) ? inner : { tag: "parenthesis", expr: inner };
    }

    case "negate": {
      const inner = reduceInteger(e.expr);
      return isValue(inner) ? intValue(negateNumber(inner.value)) : { tag: "negate", expr: inner };
    }

    case "add":
    case "minus":
    case "times":
    case "divide":
    case "modulo": {
      const left = reduceInteger(e.left);
      const right = reduceInteger(e.right);
      if (isNaNExpr(left) || isNaNExpr(right)) return nanExpr;
      if (isValue(left) && isValue(right)) return intValue(ARITHMETIC[e.tag](left.value, right.value));
      if ((e.tag === "divide" || e.tag === "modulo") && isLiteral(right, 0n)) return nanExpr;
      switch (e.tag) {
        case "add":
          if (isLiteral(left, 0n)) return right;
          if (isLiteral(right, 0n)) return left;
          break;
        case "minus":
          if (isLiteral(right, 0n)) return left;
          break;
        case "times":
          if (isLiteral(left, 1n)) return right;
          if (isLiteral(right, 1n)) return left;
          break;
        case "divide":
          if (isLiteral(right, 1n)) return left;
          break;
      }
      return { tag: e.tag, left, right };
    }
  }
}

// ============================================================================
// Domain Evaluation
// ============================================================================

/**
 * Reduce the bound and element expressions of a domain. The shape is kept.
 */
export function reduceIntegerDomain(d: IntegerNumberDomain): IntegerNumberDomain {
  switch (d.tag) {
    case "universe":
    case "empty":
      return d;
    case "explicitSet":
      return { tag: "explicitSet", elements: d.elements.map(reduceInteger) };
    case "union":
    case "intersection":
    case "difference":
      return { tag: d.tag, left: reduceIntegerDomain(d.left), right: reduceIntegerDomain(d.right) };
    case "complement":
      return { tag: "complement", domain: reduceIntegerDomain(d.domain) };
    default:
      return { tag: d.tag, low: reduceInteger(d.low), high: reduceInteger(d.high) };
  }
}

export function reduceDomain(d: Domain): Domain {
  return d.tag === "boolean" ? d : { tag: "integer", domain: reduceIntegerDomain(d.domain) };
}

function rangeSet(tag: RangeTag, low: bigint, high: bigint): IntervalSet {
  switch (tag) {
    case "closedRange":
      return intervalSet(low, high);
    case "openRange":
      return intervalSet(low + 1n, high - 1n);
    case "openLeftClosedRightRange":
      return intervalSet(low + 1n, high);
    case "closedLeftOpenRightRange":
      return intervalSet(low, high - 1n);
  }
}

/**
 * Evaluate a domain to its exact member set, or undefined when some bound or
 * element still holds a variable. A NaN bound empties a range; NaN elements
 * of an explicit set are not members.
 */
export function evaluateDomain(d: IntegerNumberDomain): IntervalSet | undefined {
  switch (d.tag) {
    case "universe":
      return fullSet;
    case "empty":
      return emptySet;
    case "explicitSet": {
      const values: bigint[] = [];
      for (const element of d.elements) {
        const r = reduceInteger(element);
        if (!isValue(r)) return undefined;
        if (r.value.tag === "value") values.push(r.value.value);
      }
      return pointSet(values);
    }
    case "union":
    case "intersection":
    case "difference": {
      const left = evaluateDomain(d.left);
      const right = evaluateDomain(d.right);
      if (!left || !right) return undefined;
      if (d.tag === "union") return unionSets(left, right);
      if (d.tag === "intersection") return intersectSets(left, right);
      return subtractSets(left, right);
    }
    case "complement": {
      const inner = evaluateDomain(d.domain);
      return inner && complementSet(inner);
    }
    default: {
      const low = reduceInteger(d.low);
      const high = reduceInteger(d.high);
      if (!isValue(low) || !isValue(high)) return undefined;
      if (low.value.tag === "nan" || high.value.tag === "nan") return emptySet;
      return rangeSet(d.tag, low.value.value, high.value.value);
    }
  }
}

/**
 * Three-valued membership: undefined when the answer depends on a variable
 * still inside the domain. NaN is never a member.
 */
export function domainContains(d: IntegerNumberDomain, v: IntegerNumber): boolean | undefined {
  if (v.tag === "nan") return false;
  const value = v.value;
  switch (d.tag) {
    case "universe":
      return true;
    case "empty":
      return false;
    case "explicitSet": {
      let unknown = false;
      for (const element of d.elements) {
        const r = reduceInteger(element);
        if (!isValue(r)) unknown = true;
        else if (r.value.tag === "value" && r.value.value === value) return true;
      }
      return unknown ? undefined : false;
    }
    case "union": {
      const l = domainContains(d.left, v);
      if (l === true) return true;
      const r = domainContains(d.right, v);
      if (r === true) return true;
      return l === false && r === false ? false : undefined;
    }
    case "intersection": {
      const l = domainContains(d.left, v);
      if (l === false) return false;
      const r = domainContains(d.right, v);
      if (r === false) return false;
      return l === true && r === true ? true : undefined;
    }
    case "difference": {
      const l = domainContains(d.left, v);
      if (l === false) return false;
      const r = domainContains(d.right, v);
      if (r === true) return false;
      return l === true && r === false ? true : undefined;
    }
    case "complement": {
      const inner = domainContains(d.domain, v);
      return inner === undefined ? undefined : !inner;
    }
    default: {
      const set = evaluateDomain(d);
      return set && setContains(set, value);
    }
  }
}

// ============================================================================
// Relations and Constraints
// ============================================================================

/**
 * Reduce an integer relation; a fully decided relation becomes a boolean.
 */
export function reduceRelation(e: BooleanIntegerNumberExpression): BooleanIntegerNumberExpression | boolean {
  if (e.tag === "in") {
    const expr = reduceInteger(e.expr);
    const domain = reduceIntegerDomain(e.domain);
    if (isNaNExpr(expr)) return false;
    if (isValue(expr)) {
      const member = domainContains(domain, expr.value);
      if (member !== undefined) return member;
    } else {
      const set = evaluateDomain(domain);
      if (set && setIsEmpty(set)) return false;
    }
    return { tag: "in", expr, domain };
  }

  const left = reduceInteger(e.left);
  const right = reduceInteger(e.right);
  if (isNaNExpr(left) || isNaNExpr(right)) return e.tag === "different";
  if (isValue(left) && isValue(right)) {
    switch (e.tag) {
      case "equals":
        return numbersEqual(left.value, right.value);
      case "different":
        return !numbersEqual(left.value, right.value);
      case "greater":
        return numberGreater(left.value, right.value);
      case "less":
        return numberLess(left.value, right.value);
    }
  }
  return { tag: e.tag, left, right };
}

export function reduceConstraint(c: ConstraintLogicExpression): ConstraintLogicExpression {
  if (c.tag === "boolean") return booleanConstraint(reduceBoolean(c.expr));
  const reduced = reduceRelation(c.expr);
  return typeof reduced === "boolean"
    ? booleanConstraint(boolValue(reduced))
    : { tag: "ofIntegerNumber", expr: reduced };
}

/**
 * The truth value of a reduced constraint, if decided.
 */
export function constraintValue(c: ConstraintLogicExpression): boolean | undefined {
  return c.tag === "boolean" && c.expr.tag === "value" ? c.expr.value : undefined;
}

export function reduceGoal(g: SatisfactionExpression): SatisfactionExpression {
  const constraint = reduceConstraint(g.constraint);
  if (g.tag === "satisfy") return { tag: "satisfy", constraint };
  return g.objective
    ? { tag: g.tag, constraint, objective: reduceInteger(g.objective) }
    : { tag: g.tag, constraint };
}

// ============================================================================
// Programs
// ============================================================================

export function reduce(p: ConstraintProgramExpression): ConstraintProgramExpression {
  switch (p.tag) {
    case "solve":
      return { tag: "solve", goal: reduceGoal(p.goal) };
    case "solveAnd":
      return { tag: "solveAnd", goal: reduceGoal(p.goal), rest: reduce(p.rest) };
    case "constrainAnd": {
      const constraint = reduceConstraint(p.constraint);
      const rest = reduce(p.rest);
      return constraintValue(constraint) === true ? rest : { tag: "constrainAnd", constraint, rest };
    }
    case "declareAnd":
      return {
        tag: "declareAnd",
        variable: { name: p.variable.name, domain: reduceDomain(p.variable.domain) },
        rest: reduce(p.rest),
      };
  }
}

/**
 * Fully evaluate a closed integer expression.
 */
export function evaluateInteger(e: IntegerNumberExpression): IntegerNumber | undefined {
  const r = reduceInteger(e);
  return isValue(r) ? r.value : undefined;
}
