/**
 * Domain narrowing from required constraints.
 *
 * A conjunct that must hold and relates a bare variable to something closed
 * tells us a set the variable's value has to come from: `x == 5` gives {5},
 * `x > y` with y already known gives (y, max], `not b` gives {false}.
 * Sampling from the intersection of these sets is what lets a single attempt
 * land on a satisfying value instead of the domain's default.
 */

import {
  BooleanExpression,
  BooleanIntegerNumberExpression,
  ConstraintLogicExpression,
  ConstraintProgramExpression,
  IntegerNumberDomain,
  IntegerNumberExpression,
  Sym,
  closedLeftOpenRightRange,
  difference,
  explicitSet,
  intUniverse,
  openLeftClosedRightRange,
  requiredConstraints,
} from "./expr";
import { isClosedInteger, isClosedIntegerDomain } from "./free";
import { INTEGER_MAX, INTEGER_MIN } from "./value";

export interface Narrowings {
  boolean: Map<string, boolean[]>;
  integer: Map<string, IntegerNumberDomain[]>;
}

function push<T>(map: Map<string, T[]>, name: Sym, item: T): void {
  const list = map.get(name.name);
  if (list) list.push(item);
  else map.set(name.name, [item]);
}

/**
 * The variable under any number of parentheses, if the expression is one.
 */
function bareIntegerVariable(e: IntegerNumberExpression): Sym | undefined {
  if (e.tag === "parenthesis") return bareIntegerVariable(e.expr);
  return e.tag === "variable" ? e.name : undefined;
}

function bareBooleanVariable(e: BooleanExpression): Sym | undefined {
  if (e.tag === "parenthesis") return bareBooleanVariable(e.expr);
  return e.tag === "variable" ? e.name : undefined;
}

// ============================================================================
// Integer relations
// ============================================================================

/**
 * The domain a relation forces on `x` when it reads `x <tag> bound`.
 */
function relationDomain(tag: BooleanIntegerNumberExpression["tag"], bound: IntegerNumberExpression): IntegerNumberDomain | undefined {
  switch (tag) {
    case "equals":
      return explicitSet(bound);
    case "different":
      return difference(intUniverse, explicitSet(bound));
    case "greater":
      return openLeftClosedRightRange(bound, INTEGER_MAX);
    case "less":
      return closedLeftOpenRightRange(INTEGER_MIN, bound);
    case "in":
      return undefined;
  }
}

const MIRROR = { equals: "equals", different: "different", greater: "less", less: "greater" } as const;

function narrowRelation(e: BooleanIntegerNumberExpression, into: Narrowings): void {
  if (e.tag === "in") {
    const name = bareIntegerVariable(e.expr);
    if (name && isClosedIntegerDomain(e.domain)) push(into.integer, name, e.domain);
    return;
  }
  const left = bareIntegerVariable(e.left);
  const right = bareIntegerVariable(e.right);
  if (left && isClosedInteger(e.right)) {
    const domain = relationDomain(e.tag, e.right);
    if (domain) push(into.integer, left, domain);
  } else if (right && isClosedInteger(e.left)) {
    const domain = relationDomain(MIRROR[e.tag], e.left);
    if (domain) push(into.integer, right, domain);
  }
}

// ============================================================================
// Boolean expressions
// ============================================================================

function narrowBoolean(e: BooleanExpression, into: Narrowings): void {
  switch (e.tag) {
    case "variable":
      push(into.boolean, e.name, true);
      return;
    case "parenthesis":
      narrowBoolean(e.expr, into);
      return;
    case "and":
      narrowBoolean(e.left, into);
      narrowBoolean(e.right, into);
      return;
    case "not": {
      const name = bareBooleanVariable(e.expr);
      if (name) push(into.boolean, name, false);
      return;
    }
    case "equals": {
      const left = bareBooleanVariable(e.left);
      const right = bareBooleanVariable(e.right);
      if (left && e.right.tag === "value") push(into.boolean, left, e.right.value);
      else if (right && e.left.tag === "value") push(into.boolean, right, e.left.value);
      return;
    }
    default:
      return;
  }
}

export function narrowConstraint(c: ConstraintLogicExpression, into: Narrowings): void {
  if (c.tag === "boolean") narrowBoolean(c.expr, into);
  else narrowRelation(c.expr, into);
}

/**
 * Everything the required conjuncts of a program say about single
 * variables, keyed by symbol name.
 */
export function narrowings(p: ConstraintProgramExpression): Narrowings {
  const result: Narrowings = { boolean: new Map(), integer: new Map() };
  for (const c of requiredConstraints(p)) narrowConstraint(c, result);
  return result;
}
