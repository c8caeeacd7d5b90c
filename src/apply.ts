/**
 * Substitution of assigned values into program trees.
 *
 * Every variable leaf whose symbol is assigned a value of its kind becomes a
 * value leaf; all other leaves are left alone. Nothing is evaluated and the
 * input tree is never mutated.
 */

import {
  Assignment,
  BooleanExpression,
  BooleanIntegerNumberExpression,
  ConstraintLogicExpression,
  ConstraintProgramExpression,
  Domain,
  IntegerNumberDomain,
  IntegerNumberExpression,
  SatisfactionExpression,
  boolEquals,
  boolValue,
  booleanConstraint,
  inDomain,
  intValue,
  integerConstraint,
} from "./expr";
import { AssignedValue, IntegerNumber, booleanAssigned, integerAssigned } from "./value";

/**
 * Assigned values by symbol name, one table per value kind, so a symbol is
 * only replaced where it is used with the kind of its value. Later
 * assignments of the same symbol win.
 */
export interface Substitution {
  boolean: Map<string, boolean>;
  integer: Map<string, IntegerNumber>;
}

export function substitutionOf(assignments: Assignment[]): Substitution {
  const sub: Substitution = { boolean: new Map(), integer: new Map() };
  for (const a of assignments) {
    if (a.value.tag === "boolean") sub.boolean.set(a.name.name, a.value.value);
    else sub.integer.set(a.name.name, a.value.value);
  }
  return sub;
}

function lookup(sub: Substitution, name: string, kind: Domain["tag"]): AssignedValue | undefined {
  if (kind === "boolean") {
    const value = sub.boolean.get(name);
    return value === undefined ? undefined : booleanAssigned(value);
  }
  const value = sub.integer.get(name);
  return value && integerAssigned(value);
}

// ============================================================================
// Expressions
// ============================================================================

export function applyBoolean(e: BooleanExpression, sub: Substitution): BooleanExpression {
  switch (e.tag) {
    case "variable": {
      const value = sub.boolean.get(e.name.name);
      return value === undefined ? e : boolValue(value);
    }
    case "value":
      return e;
    case "not":
    case "parenthesis":
      return { tag: e.tag, expr: applyBoolean(e.expr, sub) };
    default:
      return { tag: e.tag, left: applyBoolean(e.left, sub), right: applyBoolean(e.right, sub) };
  }
}

export function applyInteger(e: IntegerNumberExpression, sub: Substitution): IntegerNumberExpression {
  switch (e.tag) {
    case "variable": {
      const value = sub.integer.get(e.name.name);
      return value ? intValue(value) : e;
    }
    case "value":
      return e;
    case "negate":
    case "parenthesis":
      return { tag: e.tag, expr: applyInteger(e.expr, sub) };
    default:
      return { tag: e.tag, left: applyInteger(e.left, sub), right: applyInteger(e.right, sub) };
  }
}

export function applyIntegerDomain(d: IntegerNumberDomain, sub: Substitution): IntegerNumberDomain {
  switch (d.tag) {
    case "universe":
    case "empty":
      return d;
    case "explicitSet":
      return { tag: "explicitSet", elements: d.elements.map(e => applyInteger(e, sub)) };
    case "union":
    case "intersection":
    case "difference":
      return { tag: d.tag, left: applyIntegerDomain(d.left, sub), right: applyIntegerDomain(d.right, sub) };
    case "complement":
      return { tag: "complement", domain: applyIntegerDomain(d.domain, sub) };
    default:
      return { tag: d.tag, low: applyInteger(d.low, sub), high: applyInteger(d.high, sub) };
  }
}

export function applyDomain(d: Domain, sub: Substitution): Domain {
  return d.tag === "boolean" ? d : { tag: "integer", domain: applyIntegerDomain(d.domain, sub) };
}

export function applyRelation(e: BooleanIntegerNumberExpression, sub: Substitution): BooleanIntegerNumberExpression {
  if (e.tag === "in") return { tag: "in", expr: applyInteger(e.expr, sub), domain: applyIntegerDomain(e.domain, sub) };
  return { tag: e.tag, left: applyInteger(e.left, sub), right: applyInteger(e.right, sub) };
}

export function applyConstraint(c: ConstraintLogicExpression, sub: Substitution): ConstraintLogicExpression {
  return c.tag === "boolean"
    ? { tag: "boolean", expr: applyBoolean(c.expr, sub) }
    : { tag: "ofIntegerNumber", expr: applyRelation(c.expr, sub) };
}

export function applyGoal(g: SatisfactionExpression, sub: Substitution): SatisfactionExpression {
  const constraint = applyConstraint(g.constraint, sub);
  if (g.tag === "satisfy") return { tag: "satisfy", constraint };
  return g.objective
    ? { tag: g.tag, constraint, objective: applyInteger(g.objective, sub) }
    : { tag: g.tag, constraint };
}

// ============================================================================
// Programs
// ============================================================================

/**
 * The check a declaration turns into once its symbol has a value.
 */
export function membershipConstraint(value: AssignedValue, domain: Domain): ConstraintLogicExpression {
  if (domain.tag === "integer") {
    return value.tag === "integer"
      ? integerConstraint(inDomain(intValue(value.value), domain.domain))
      : booleanConstraint(boolValue(false));
  }
  if (value.tag !== "boolean") return booleanConstraint(boolValue(false));
  switch (domain.domain.tag) {
    case "universe":
      return booleanConstraint(boolValue(true));
    case "empty":
      return booleanConstraint(boolValue(false));
    case "single":
      return booleanConstraint(boolEquals(boolValue(value.value), boolValue(domain.domain.value)));
  }
}

export function applySubstitution(p: ConstraintProgramExpression, sub: Substitution): ConstraintProgramExpression {
  switch (p.tag) {
    case "solve":
      return { tag: "solve", goal: applyGoal(p.goal, sub) };
    case "solveAnd":
      return { tag: "solveAnd", goal: applyGoal(p.goal, sub), rest: applySubstitution(p.rest, sub) };
    case "constrainAnd":
      return {
        tag: "constrainAnd",
        constraint: applyConstraint(p.constraint, sub),
        rest: applySubstitution(p.rest, sub),
      };
    case "declareAnd": {
      const domain = applyDomain(p.variable.domain, sub);
      const rest = applySubstitution(p.rest, sub);
      const value = lookup(sub, p.variable.name.name, p.variable.domain.tag);
      return value
        ? { tag: "constrainAnd", constraint: membershipConstraint(value, domain), rest }
        : { tag: "declareAnd", variable: { name: p.variable.name, domain }, rest };
    }
  }
}

/**
 * Replace every assigned symbol in a program by its value.
 */
export function apply(p: ConstraintProgramExpression, assignments: Assignment[]): ConstraintProgramExpression {
  return applySubstitution(p, substitutionOf(assignments));
}
