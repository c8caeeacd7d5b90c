/**
 * Text rendering of programs and solutions.
 *
 * Plain by default; `{ color: true }` highlights symbols, values and keywords
 * for terminal output.
 */

import color from "cli-color";
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
} from "./expr";
import type { SettledState, Solution, SolveTraceEvent } from "./solve";
import { assignedValueToString, integerNumberToString } from "./value";

export interface FormatOptions {
  /** Colour output with ANSI escapes (default: false) */
  color?: boolean;
}

type Paint = (s: string) => string;

interface Palette {
  symbol: Paint;
  value: Paint;
  keyword: Paint;
  error: Paint;
}

const plain: Palette = {
  symbol: s => s,
  value: s => s,
  keyword: s => s,
  error: s => s,
};

const colored: Palette = {
  symbol: s => color.magenta(s),
  value: s => color.yellow(s),
  keyword: s => color.blue(s),
  error: s => color.red(s),
};

const paletteOf = (options: FormatOptions): Palette => (options.color ? colored : plain);

// ============================================================================
// Expressions
// ============================================================================

const BOOLEAN_OPERATORS = { and: "&&", or: "||", implies: "->", equals: "<->" } as const;
const INTEGER_OPERATORS = { add: "+", minus: "-", times: "*", divide: "/", modulo: "%" } as const;
const RELATION_OPERATORS = { equals: "==", different: "!=", greater: ">", less: "<" } as const;

export function symToString(s: Sym, options: FormatOptions = {}): string {
  return paletteOf(options).symbol(s.name);
}

export function booleanToString(e: BooleanExpression, options: FormatOptions = {}): string {
  const p = paletteOf(options);
  switch (e.tag) {
    case "variable":
      return p.symbol(e.name.name);
    case "value":
      return p.value(String(e.value));
    case "not":
      return `!${booleanToString(e.expr, options)}`;
    case "parenthesis":
      return `(${booleanToString(e.expr, options)})`;
    default:
      return `${booleanToString(e.left, options)} ${BOOLEAN_OPERATORS[e.tag]} ${booleanToString(e.right, options)}`;
  }
}

export function integerToString(e: IntegerNumberExpression, options: FormatOptions = {}): string {
  const p = paletteOf(options);
  switch (e.tag) {
    case "variable":
      return p.symbol(e.name.name);
    case "value":
      return p.value(integerNumberToString(e.value));
    case "negate":
      return `-${integerToString(e.expr, options)}`;
    case "parenthesis":
      return `(${integerToString(e.expr, options)})`;
    default:
      return `${integerToString(e.left, options)} ${INTEGER_OPERATORS[e.tag]} ${integerToString(e.right, options)}`;
  }
}

const RANGE_BRACKETS = {
  closedRange: ["[", "]"],
  openRange: ["(", ")"],
  openLeftClosedRightRange: ["(", "]"],
  closedLeftOpenRightRange: ["[", ")"],
} as const;

export function integerDomainToString(d: IntegerNumberDomain, options: FormatOptions = {}): string {
  const p = paletteOf(options);
  switch (d.tag) {
    case "universe":
      return p.keyword("int");
    case "empty":
      return "{}";
    case "explicitSet":
      return `{${d.elements.map(e => integerToString(e, options)).join(", ")}}`;
    case "union":
      return `(${integerDomainToString(d.left, options)} | ${integerDomainToString(d.right, options)})`;
    case "intersection":
      return `(${integerDomainToString(d.left, options)} & ${integerDomainToString(d.right, options)})`;
    case "difference":
      return `(${integerDomainToString(d.left, options)} \\ ${integerDomainToString(d.right, options)})`;
    case "complement":
      return `~${integerDomainToString(d.domain, options)}`;
    default: {
      const [open, close] = RANGE_BRACKETS[d.tag];
      return `${open}${integerToString(d.low, options)}..${integerToString(d.high, options)}${close}`;
    }
  }
}

export function domainToString(d: Domain, options: FormatOptions = {}): string {
  if (d.tag === "integer") return integerDomainToString(d.domain, options);
  const p = paletteOf(options);
  switch (d.domain.tag) {
    case "universe":
      return p.keyword("bool");
    case "empty":
      return "{}";
    case "single":
      return `{${p.value(String(d.domain.value))}}`;
  }
}

export function variableToString(v: Variable, options: FormatOptions = {}): string {
  return `${symToString(v.name, options)} in ${domainToString(v.domain, options)}`;
}

export function relationToString(e: BooleanIntegerNumberExpression, options: FormatOptions = {}): string {
  if (e.tag === "in") {
    return `${integerToString(e.expr, options)} in ${integerDomainToString(e.domain, options)}`;
  }
  return `${integerToString(e.left, options)} ${RELATION_OPERATORS[e.tag]} ${integerToString(e.right, options)}`;
}

export function constraintToString(c: ConstraintLogicExpression, options: FormatOptions = {}): string {
  return c.tag === "boolean" ? booleanToString(c.expr, options) : relationToString(c.expr, options);
}

export function goalToString(g: SatisfactionExpression, options: FormatOptions = {}): string {
  const p = paletteOf(options);
  const constraint = constraintToString(g.constraint, options);
  if (g.tag === "satisfy" || !g.objective) return `${p.keyword(g.tag)} ${constraint}`;
  return `${p.keyword(g.tag)} ${integerToString(g.objective, options)} ${p.keyword("subject to")} ${constraint}`;
}

/**
 * One line per declaration, constraint and goal.
 */
export function programToString(prog: ConstraintProgramExpression, options: FormatOptions = {}): string {
  const p = paletteOf(options);
  const lines: string[] = [];
  let node: ConstraintProgramExpression | undefined = prog;
  while (node) {
    switch (node.tag) {
      case "solve":
        lines.push(goalToString(node.goal, options));
        node = undefined;
        break;
      case "solveAnd":
        lines.push(goalToString(node.goal, options));
        node = node.rest;
        break;
      case "constrainAnd":
        lines.push(`${p.keyword("constrain")} ${constraintToString(node.constraint, options)}`);
        node = node.rest;
        break;
      case "declareAnd":
        lines.push(`${p.keyword("declare")} ${variableToString(node.variable, options)}`);
        node = node.rest;
        break;
    }
  }
  return lines.join("\n");
}

// ============================================================================
// Solutions
// ============================================================================

export function solutionToString(s: Solution, options: FormatOptions = {}): string {
  const p = paletteOf(options);
  switch (s.tag) {
    case "unsatisfiable":
      return `${p.error("unsatisfiable")} ${p.symbol(s.symbol.name)}: ${s.reason}`;
    case "variable":
      return `${p.symbol(s.symbol.name)} = ${p.value(assignedValueToString(s.value))}`;
    case "constant":
      return `${p.keyword("const")} ${p.symbol(s.symbol.name)} = ${p.value(assignedValueToString(s.value))}`;
  }
}

export function solutionsToString(solutions: Solution[], options: FormatOptions = {}): string {
  return solutions.length === 0
    ? "satisfied"
    : solutions.map(s => solutionToString(s, options)).join("\n");
}

// ============================================================================
// Tracing
// ============================================================================

function stateToString(state: SettledState, options: FormatOptions): string {
  const p = paletteOf(options);
  switch (state.tag) {
    case "satisfied":
      return `satisfied with ${state.assignments.length} assignment(s)`;
    case "unsatisfiable":
      return `${p.error("unsatisfiable")} ${p.symbol(state.symbol.name)}: ${state.reason}`;
    case "stuck":
      return `${p.error("stuck")} on ${p.symbol(state.symbol.name)} after ${state.iteration} iteration(s)`;
  }
}

export function traceEventToString(event: SolveTraceEvent, options: FormatOptions = {}): string {
  const p = paletteOf(options);
  switch (event.kind) {
    case "iteration":
      return `${p.keyword(`#${event.iteration}`)}\n${programToString(event.program, options)}`;
    case "attempt":
      return `  try ${event.assignments
        .map(a => `${p.symbol(a.name.name)} = ${p.value(assignedValueToString(a.value))}`)
        .join(", ")}`;
    case "finished":
      return `  ${stateToString(event.state, options)}`;
    case "bound": {
      const op = event.goal === "minimise" ? "<" : ">";
      const outcome = event.improved ? "improved" : "no better value";
      return `  ${p.keyword(event.goal)} ${integerToString(event.objective, options)} ${op} ${p.value(event.bound.toString())}: ${outcome}`;
    }
  }
}

/**
 * A `trace` callback for SolveOptions that prints each event to stdout.
 */
export function consoleTracer(options: FormatOptions = {}): (event: SolveTraceEvent) => void {
  return event => console.log(traceEventToString(event, options));
}
