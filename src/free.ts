/**
 * Free-variable analysis.
 *
 * Purely syntactic: every variable leaf is reported, left to right and depth
 * first, once per occurrence, with the universe domain of its kind. No
 * declaration is consulted; the solve driver does that.
 */

import {
  BooleanExpression,
  BooleanIntegerNumberExpression,
  ConstraintLogicExpression,
  ConstraintProgramExpression,
  Domain,
  IntegerNumberDomain,
  IntegerNumberExpression,
  SatisfactionExpression,
  Sym,
  Variable,
  booleanDomain,
  boolUniverse,
  intUniverse,
  integerDomain,
} from "./expr";

const booleanFree = (name: Sym): Variable => ({ name, domain: booleanDomain(boolUniverse) });
const integerFree = (name: Sym): Variable => ({ name, domain: integerDomain(intUniverse) });

export function freeOfBoolean(e: BooleanExpression): Variable[] {
  switch (e.tag) {
    case "variable":
      return [booleanFree(e.name)];
    case "value":
      return [];
    case "not":
    case "parenthesis":
      return freeOfBoolean(e.expr);
    default:
      return [...freeOfBoolean(e.left), ...freeOfBoolean(e.right)];
  }
}

export function freeOfInteger(e: IntegerNumberExpression): Variable[] {
  switch (e.tag) {
    case "variable":
      return [integerFree(e.name)];
    case "value":
      return [];
    case "negate":
    case "parenthesis":
      return freeOfInteger(e.expr);
    default:
      return [...freeOfInteger(e.left), ...freeOfInteger(e.right)];
  }
}

export function freeOfIntegerDomain(d: IntegerNumberDomain): Variable[] {
  switch (d.tag) {
    case "universe":
    case "empty":
      return [];
    case "explicitSet":
      return d.elements.flatMap(freeOfInteger);
    case "union":
    case "intersection":
    case "difference":
      return [...freeOfIntegerDomain(d.left), ...freeOfIntegerDomain(d.right)];
    case "complement":
      return freeOfIntegerDomain(d.domain);
    default:
      return [...freeOfInteger(d.low), ...freeOfInteger(d.high)];
  }
}

// Boolean domains hold no expressions.
export function freeOfDomain(d: Domain): Variable[] {
  return d.tag === "integer" ? freeOfIntegerDomain(d.domain) : [];
}

export function freeOfRelation(e: BooleanIntegerNumberExpression): Variable[] {
  if (e.tag === "in") return [...freeOfInteger(e.expr), ...freeOfIntegerDomain(e.domain)];
  return [...freeOfInteger(e.left), ...freeOfInteger(e.right)];
}

export function freeOfConstraint(c: ConstraintLogicExpression): Variable[] {
  return c.tag === "boolean" ? freeOfBoolean(c.expr) : freeOfRelation(c.expr);
}

export function freeOfGoal(g: SatisfactionExpression): Variable[] {
  const free = freeOfConstraint(g.constraint);
  if (g.tag !== "satisfy" && g.objective) free.push(...freeOfInteger(g.objective));
  return free;
}

/**
 * Free variables of a whole program. A declaration contributes its own
 * symbol first, then whatever its domain mentions.
 */
export function freeVariables(p: ConstraintProgramExpression): Variable[] {
  switch (p.tag) {
    case "solve":
      return freeOfGoal(p.goal);
    case "solveAnd":
      return [...freeOfGoal(p.goal), ...freeVariables(p.rest)];
    case "constrainAnd":
      return [...freeOfConstraint(p.constraint), ...freeVariables(p.rest)];
    case "declareAnd": {
      const declared = p.variable.domain.tag === "boolean" ? booleanFree(p.variable.name) : integerFree(p.variable.name);
      return [declared, ...freeOfDomain(p.variable.domain), ...freeVariables(p.rest)];
    }
  }
}

/**
 * First occurrence of each symbol, in order.
 */
export function distinctVariables(vars: Variable[]): Variable[] {
  const seen = new Set<string>();
  return vars.filter(v => {
    if (seen.has(v.name.name)) return false;
    seen.add(v.name.name);
    return true;
  });
}

export function isClosedInteger(e: IntegerNumberExpression): boolean {
  return freeOfInteger(e).length === 0;
}

export function isClosedIntegerDomain(d: IntegerNumberDomain): boolean {
  return freeOfIntegerDomain(d).length === 0;
}
