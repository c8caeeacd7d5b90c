/**
 * Program trees for the constraint engine.
 *
 * Every node is an immutable tagged object owning its children. Programs are
 * built directly with the constructors below; nothing here evaluates.
 */

import {
  AssignedValue,
  BooleanValue,
  IntegerNumber,
  booleanAssigned,
  integer,
  integerAssigned,
  nanNumber,
} from "./value";

// ============================================================================
// Symbols
// ============================================================================

/**
 * The name of a variable. Compared by name, never renamed.
 */
export interface Sym {
  name: string;
}

export const sym = (name: string): Sym => ({ name });

export function symEquals(a: Sym, b: Sym): boolean {
  return a.name === b.name;
}

// ============================================================================
// Boolean Expressions
// ============================================================================

export type BooleanExpression =
  | { tag: "and"; left: BooleanExpression; right: BooleanExpression }
  | { tag: "or"; left: BooleanExpression; right: BooleanExpression }
  | { tag: "implies"; left: BooleanExpression; right: BooleanExpression }
  | { tag: "equals"; left: BooleanExpression; right: BooleanExpression }
  | { tag: "not"; expr: BooleanExpression }
  | { tag: "parenthesis"; expr: BooleanExpression }
  | { tag: "variable"; name: Sym }
  | { tag: "value"; value: BooleanValue };

export type BooleanBinaryTag = "and" | "or" | "implies" | "equals";

export const and = (left: BooleanExpression, right: BooleanExpression): BooleanExpression =>
  ({ tag: "and", left, right });
export const or = (left: BooleanExpression, right: BooleanExpression): BooleanExpression =>
  ({ tag: "or", left, right });
export const implies = (left: BooleanExpression, right: BooleanExpression): BooleanExpression =>
  ({ tag: "implies", left, right });
export const boolEquals = (left: BooleanExpression, right: BooleanExpression): BooleanExpression =>
  ({ tag: "equals", left, right });
export const not = (expr: BooleanExpression): BooleanExpression => ({ tag: "not", expr });
export const boolParen = (expr: BooleanExpression): BooleanExpression => ({ tag: "parenthesis", expr });
export const boolVar = (name: string | Sym): BooleanExpression =>
  ({ tag: "variable", name: typeof name === "string" ? sym(name) : name });
export const boolValue = (value: BooleanValue): BooleanExpression => ({ tag: "value", value });

export const trueExpr = boolValue(true);
export const falseExpr = boolValue(false);

// ============================================================================
// Integer Expressions
// ============================================================================

export type IntegerNumberExpression =
  | { tag: "add"; left: IntegerNumberExpression; right: IntegerNumberExpression }
  | { tag: "minus"; left: IntegerNumberExpression; right: IntegerNumberExpression }
  | { tag: "times"; left: IntegerNumberExpression; right: IntegerNumberExpression }
  | { tag: "divide"; left: IntegerNumberExpression; right: IntegerNumberExpression }
  | { tag: "modulo"; left: IntegerNumberExpression; right: IntegerNumberExpression }
  | { tag: "negate"; expr: IntegerNumberExpression }
  | { tag: "parenthesis"; expr: IntegerNumberExpression }
  | { tag: "variable"; name: Sym }
  | { tag: "value"; value: IntegerNumber };

export type IntegerBinaryTag = "add" | "minus" | "times" | "divide" | "modulo";

export const add = (left: IntegerNumberExpression, right: IntegerNumberExpression): IntegerNumberExpression =>
  ({ tag: "add", left, right });
export const minus = (left: IntegerNumberExpression, right: IntegerNumberExpression): IntegerNumberExpression =>
  ({ tag: "minus", left, right });
export const times = (left: IntegerNumberExpression, right: IntegerNumberExpression): IntegerNumberExpression =>
  ({ tag: "times", left, right });
export const divide = (left: IntegerNumberExpression, right: IntegerNumberExpression): IntegerNumberExpression =>
  ({ tag: "divide", left, right });
export const modulo = (left: IntegerNumberExpression, right: IntegerNumberExpression): IntegerNumberExpression =>
  ({ tag: "modulo", left, right });
export const negate = (expr: IntegerNumberExpression): IntegerNumberExpression => ({ tag: "negate", expr });
export const intParen = (expr: IntegerNumberExpression): IntegerNumberExpression => ({ tag: "parenthesis", expr });
export const intVar = (name: string | Sym): IntegerNumberExpression =>
  ({ tag: "variable", name: typeof name === "string" ? sym(name) : name });

/**
 * Integer literal. Plain numbers and bigints are wrapped; out-of-range
 * literals become NaN.
 */
export const intValue = (value: IntegerNumber | bigint | number): IntegerNumberExpression =>
  ({ tag: "value", value: typeof value === "object" ? value : integer(value) });

export const nanExpr: IntegerNumberExpression = { tag: "value", value: nanNumber };

// ============================================================================
// Domains
// ============================================================================

export type BooleanValueDomain =
  | { tag: "universe" }
  | { tag: "empty" }
  | { tag: "single"; value: BooleanValue };

export type RangeTag =
  | "closedRange"
  | "openRange"
  | "openLeftClosedRightRange"
  | "closedLeftOpenRightRange";

export type IntegerNumberDomain =
  | { tag: "universe" }
  | { tag: "empty" }
  | { tag: RangeTag; low: IntegerNumberExpression; high: IntegerNumberExpression }
  | { tag: "explicitSet"; elements: IntegerNumberExpression[] }
  | { tag: "union"; left: IntegerNumberDomain; right: IntegerNumberDomain }
  | { tag: "intersection"; left: IntegerNumberDomain; right: IntegerNumberDomain }
  | { tag: "difference"; left: IntegerNumberDomain; right: IntegerNumberDomain }
  | { tag: "complement"; domain: IntegerNumberDomain };

export type Domain =
  | { tag: "boolean"; domain: BooleanValueDomain }
  | { tag: "integer"; domain: IntegerNumberDomain };

export type ValueKind = Domain["tag"];

export const boolUniverse: BooleanValueDomain = { tag: "universe" };
export const boolEmpty: BooleanValueDomain = { tag: "empty" };
export const boolSingle = (value: BooleanValue): BooleanValueDomain => ({ tag: "single", value });

export const intUniverse: IntegerNumberDomain = { tag: "universe" };
export const intEmpty: IntegerNumberDomain = { tag: "empty" };

const toExpr = (e: IntegerNumberExpression | bigint | number): IntegerNumberExpression =>
  typeof e === "object" ? e : intValue(e);

type Bound = IntegerNumberExpression | bigint | number;

export const range = (tag: RangeTag, low: Bound, high: Bound): IntegerNumberDomain =>
  ({ tag, low: toExpr(low), high: toExpr(high) });
export const closedRange = (low: Bound, high: Bound): IntegerNumberDomain => range("closedRange", low, high);
export const openRange = (low: Bound, high: Bound): IntegerNumberDomain => range("openRange", low, high);
export const openLeftClosedRightRange = (low: Bound, high: Bound): IntegerNumberDomain =>
  range("openLeftClosedRightRange", low, high);
export const closedLeftOpenRightRange = (low: Bound, high: Bound): IntegerNumberDomain =>
  range("closedLeftOpenRightRange", low, high);
export const explicitSet = (...elements: Bound[]): IntegerNumberDomain =>
  ({ tag: "explicitSet", elements: elements.map(toExpr) });
export const union = (left: IntegerNumberDomain, right: IntegerNumberDomain): IntegerNumberDomain =>
  ({ tag: "union", left, right });
export const intersection = (left: IntegerNumberDomain, right: IntegerNumberDomain): IntegerNumberDomain =>
  ({ tag: "intersection", left, right });
export const difference = (left: IntegerNumberDomain, right: IntegerNumberDomain): IntegerNumberDomain =>
  ({ tag: "difference", left, right });
export const complement = (domain: IntegerNumberDomain): IntegerNumberDomain => ({ tag: "complement", domain });

export const booleanDomain = (domain: BooleanValueDomain): Domain => ({ tag: "boolean", domain });
export const integerDomain = (domain: IntegerNumberDomain): Domain => ({ tag: "integer", domain });

/**
 * The universe domain of a value kind.
 */
export function universeOf(kind: ValueKind): Domain {
  return kind === "boolean" ? booleanDomain(boolUniverse) : integerDomain(intUniverse);
}

// ============================================================================
// Variables and Assignments
// ============================================================================

export interface Variable {
  name: Sym;
  domain: Domain;
}

export interface Assignment {
  name: Sym;
  value: AssignedValue;
}

export const variable = (name: string | Sym, domain: Domain): Variable =>
  ({ name: typeof name === "string" ? sym(name) : name, domain });

export const assignment = (name: string | Sym, value: AssignedValue): Assignment =>
  ({ name: typeof name === "string" ? sym(name) : name, value });

export const boolAssignment = (name: string | Sym, value: BooleanValue): Assignment =>
  assignment(name, booleanAssigned(value));

export const intAssignment = (name: string | Sym, value: IntegerNumber | bigint | number): Assignment =>
  assignment(name, integerAssigned(typeof value === "object" ? value : integer(value)));

// ============================================================================
// Integer Relations
// ============================================================================

export type RelationTag = "equals" | "different" | "greater" | "less";

export type BooleanIntegerNumberExpression =
  | { tag: RelationTag; left: IntegerNumberExpression; right: IntegerNumberExpression }
  | { tag: "in"; expr: IntegerNumberExpression; domain: IntegerNumberDomain };

export const relation = (
  tag: RelationTag,
  left: IntegerNumberExpression,
  right: IntegerNumberExpression
): BooleanIntegerNumberExpression => ({ tag, left, right });
export const intEquals = (left: IntegerNumberExpression, right: IntegerNumberExpression) =>
  relation("equals", left, right);
export const different = (left: IntegerNumberExpression, right: IntegerNumberExpression) =>
  relation("different", left, right);
export const greater = (left: IntegerNumberExpression, right: IntegerNumberExpression) =>
  relation("greater", left, right);
export const less = (left: IntegerNumberExpression, right: IntegerNumberExpression) =>
  relation("less", left, right);
export const inDomain = (expr: IntegerNumberExpression, domain: IntegerNumberDomain): BooleanIntegerNumberExpression =>
  ({ tag: "in", expr, domain });

// ============================================================================
// Constraints, Goals and Programs
// ============================================================================

export type ConstraintLogicExpression =
  | { tag: "boolean"; expr: BooleanExpression }
  | { tag: "ofIntegerNumber"; expr: BooleanIntegerNumberExpression };

export const booleanConstraint = (expr: BooleanExpression): ConstraintLogicExpression =>
  ({ tag: "boolean", expr });
export const integerConstraint = (expr: BooleanIntegerNumberExpression): ConstraintLogicExpression =>
  ({ tag: "ofIntegerNumber", expr });

/**
 * A goal over one constraint. Optimisation goals carry an optional integer
 * objective; without one the left operand of an integer relation is used.
 */
export type SatisfactionExpression =
  | { tag: "satisfy"; constraint: ConstraintLogicExpression }
  | { tag: "minimise"; constraint: ConstraintLogicExpression; objective?: IntegerNumberExpression }
  | { tag: "maximise"; constraint: ConstraintLogicExpression; objective?: IntegerNumberExpression };

export type GoalTag = SatisfactionExpression["tag"];

export const satisfy = (constraint: ConstraintLogicExpression): SatisfactionExpression =>
  ({ tag: "satisfy", constraint });
export const minimise = (
  constraint: ConstraintLogicExpression,
  objective?: IntegerNumberExpression
): SatisfactionExpression =>
  objective ? { tag: "minimise", constraint, objective } : { tag: "minimise", constraint };
export const maximise = (
  constraint: ConstraintLogicExpression,
  objective?: IntegerNumberExpression
): SatisfactionExpression =>
  objective ? { tag: "maximise", constraint, objective } : { tag: "maximise", constraint };

/**
 * A whole program: a right-leaning list of declarations, constraints and
 * goals, all conjoined, ending in a goal.
 */
export type ConstraintProgramExpression =
  | { tag: "solve"; goal: SatisfactionExpression }
  | { tag: "solveAnd"; goal: SatisfactionExpression; rest: ConstraintProgramExpression }
  | { tag: "constrainAnd"; constraint: ConstraintLogicExpression; rest: ConstraintProgramExpression }
  | { tag: "declareAnd"; variable: Variable; rest: ConstraintProgramExpression };

export const solveGoal = (goal: SatisfactionExpression): ConstraintProgramExpression =>
  ({ tag: "solve", goal });
export const solveAnd = (goal: SatisfactionExpression, rest: ConstraintProgramExpression): ConstraintProgramExpression =>
  ({ tag: "solveAnd", goal, rest });
export const constrainAnd = (
  constraint: ConstraintLogicExpression,
  rest: ConstraintProgramExpression
): ConstraintProgramExpression => ({ tag: "constrainAnd", constraint, rest });
export const declareAnd = (variable: Variable, rest: ConstraintProgramExpression): ConstraintProgramExpression =>
  ({ tag: "declareAnd", variable, rest });

/**
 * Build a program from a flat list of parts; the last part must be a goal.
 */
export type ProgramPart =
  | { tag: "goal"; goal: SatisfactionExpression }
  | { tag: "constraint"; constraint: ConstraintLogicExpression }
  | { tag: "declare"; variable: Variable };

export function program(parts: ProgramPart[], goal: SatisfactionExpression): ConstraintProgramExpression {
  let result: ConstraintProgramExpression = solveGoal(goal);
  for (let i = parts.length - 1; i >= 0; i--) {
    const part = parts[i];
    switch (part.tag) {
      case "goal":
        result = solveAnd(part.goal, result);
        break;
      case "constraint":
        result = constrainAnd(part.constraint, result);
        break;
      case "declare":
        result = declareAnd(part.variable, result);
        break;
    }
  }
  return result;
}

// ============================================================================
// Traversal helpers
// ============================================================================

/**
 * Goals of a program in order.
 */
export function programGoals(p: ConstraintProgramExpression): SatisfactionExpression[] {
  const goals: SatisfactionExpression[] = [];
  let node: ConstraintProgramExpression | undefined = p;
  while (node) {
    switch (node.tag) {
      case "solve":
        goals.push(node.goal);
        node = undefined;
        break;
      case "solveAnd":
        goals.push(node.goal);
        node = node.rest;
        break;
      case "constrainAnd":
      case "declareAnd":
        node = node.rest;
        break;
    }
  }
  return goals;
}

/**
 * Every constraint that must hold: explicit constraints and goal constraints.
 */
export function requiredConstraints(p: ConstraintProgramExpression): ConstraintLogicExpression[] {
  const result: ConstraintLogicExpression[] = [];
  let node: ConstraintProgramExpression | undefined = p;
  while (node) {
    switch (node.tag) {
      case "solve":
        result.push(node.goal.constraint);
        node = undefined;
        break;
      case "solveAnd":
        result.push(node.goal.constraint);
        node = node.rest;
        break;
      case "constrainAnd":
        result.push(node.constraint);
        node = node.rest;
        break;
      case "declareAnd":
        node = node.rest;
        break;
    }
  }
  return result;
}

/**
 * Declarations of a program in order.
 */
export function programDeclarations(p: ConstraintProgramExpression): Variable[] {
  const result: Variable[] = [];
  let node: ConstraintProgramExpression | undefined = p;
  while (node) {
    if (node.tag === "declareAnd") result.push(node.variable);
    node = node.tag === "solve" ? undefined : node.rest;
  }
  return result;
}

/**
 * Number of nodes in a program tree, used to bound the search.
 */
export function programSize(p: ConstraintProgramExpression): number {
  switch (p.tag) {
    case "solve":
      return 1 + goalSize(p.goal);
    case "solveAnd":
      return 1 + goalSize(p.goal) + programSize(p.rest);
    case "constrainAnd":
      return 1 + constraintSize(p.constraint) + programSize(p.rest);
    case "declareAnd":
      return 1 + domainSize(p.variable.domain) + programSize(p.rest);
  }
}

function goalSize(g: SatisfactionExpression): number {
  const objective = g.tag === "satisfy" || !g.objective ? 0 : integerSize(g.objective);
  return 1 + constraintSize(g.constraint) + objective;
}

function constraintSize(c: ConstraintLogicExpression): number {
  return 1 + (c.tag === "boolean" ? booleanSize(c.expr) : relationSize(c.expr));
}

function booleanSize(e: BooleanExpression): number {
  switch (e.tag) {
    case "variable":
    case "value":
      return 1;
    case "not":
    case "parenthesis":
      return 1 + booleanSize(e.expr);
    default:
      return 1 + booleanSize(e.left) + booleanSize(e.right);
  }
}

function integerSize(e: IntegerNumberExpression): number {
  switch (e.tag) {
    case "variable":
    case "value":
      return 1;
    case "negate":
    case "parenthesis":
      return 1 + integerSize(e.expr);
    default:
      return 1 + integerSize(e.left) + integerSize(e.right);
  }
}

function relationSize(e: BooleanIntegerNumberExpression): number {
  if (e.tag === "in") return 1 + integerSize(e.expr) + integerDomainSize(e.domain);
  return 1 + integerSize(e.left) + integerSize(e.right);
}

function integerDomainSize(d: IntegerNumberDomain): number {
  switch (d.tag) {
    case "universe":
    case "empty":
      return 1;
    case "explicitSet":
      return 1 + d.elements.reduce((n, e) => n + integerSize(e), 0);
    case "union":
    case "intersection":
    case "difference":
      return 1 + integerDomainSize(d.left) + integerDomainSize(d.right);
    case "complement":
      return 1 + integerDomainSize(d.domain);
    default:
      return 1 + integerSize(d.low) + integerSize(d.high);
  }
}

function domainSize(d: Domain): number {
  return d.tag === "boolean" ? 1 : integerDomainSize(d.domain);
}
