/**
 * The solve driver.
 *
 * Search is an explicit state machine: `step` takes a searching state to the
 * next state, and `search` runs it under an iteration bound. Each step
 * reduces the program, stops on a false conjunct, and otherwise samples the
 * variables whose domains are known, substitutes them and goes round again.
 *
 * Optimisation goals re-run the search with tightened bounds on the
 * objective until no strictly better value is found.
 */

import { Substitution, apply, applyDomain, applyInteger, substitutionOf } from "./apply";
import {
  Assignment,
  BooleanValueDomain,
  ConstraintProgramExpression,
  Domain,
  IntegerNumberDomain,
  IntegerNumberExpression,
  SatisfactionExpression,
  Sym,
  Variable,
  constrainAnd,
  greater,
  intEquals,
  intUniverse,
  intValue,
  integerConstraint,
  intersection,
  less,
  programDeclarations,
  programGoals,
  programSize,
  requiredConstraints,
  sym,
  universeOf,
} from "./expr";
import { setSize } from "./domain";
import { distinctVariables, freeVariables, isClosedIntegerDomain } from "./free";
import { Narrowings, narrowings } from "./narrow";
import { constraintValue, evaluateDomain, evaluateInteger, reduce } from "./reduce";
import { firstUnsamplable, generateAttempt, sample } from "./sample";
import { validateProgram } from "./validate";
import { AssignedValue, INTEGER_MAX, INTEGER_MIN, assignedValueEquals } from "./value";

// ============================================================================
// Solutions
// ============================================================================

export type Solution =
  | { tag: "unsatisfiable"; symbol: Sym; reason: string }
  | { tag: "variable"; symbol: Sym; value: AssignedValue }
  | { tag: "constant"; symbol: Sym; value: AssignedValue };

export const EMPTY_DOMAIN = "empty domain";
export const CONTRADICTION = "contradiction";
export const STUCK = "stuck";

/**
 * Reported when a failure concerns the program as a whole rather than one
 * variable.
 */
export const PROGRAM_SYMBOL: Sym = sym("program");

export const unsatisfiable = (symbol: Sym, reason: string): Solution =>
  ({ tag: "unsatisfiable", symbol, reason });

// ============================================================================
// Options
// ============================================================================

export interface SolveOptions {
  /** Driver iterations per search before reporting "stuck" (default: program size + 1) */
  maxIterations?: number;
  /** Bound-tightening rounds per optimisation objective (default: 256) */
  maxOptimisationRounds?: number;
  /** Receives every driver event */
  trace?: (event: SolveTraceEvent) => void;
}

export const DEFAULT_OPTIMISATION_ROUNDS = 256;

export type SolveTraceEvent =
  | { kind: "iteration"; iteration: number; program: ConstraintProgramExpression }
  | { kind: "attempt"; assignments: Assignment[] }
  | { kind: "finished"; state: SettledState }
  | { kind: "bound"; goal: "minimise" | "maximise"; objective: IntegerNumberExpression; bound: bigint; improved: boolean };

// ============================================================================
// Driver States
// ============================================================================

export type DriverState =
  | { tag: "searching"; program: ConstraintProgramExpression; assignments: Assignment[]; iteration: number }
  | { tag: "satisfied"; assignments: Assignment[] }
  | { tag: "unsatisfiable"; symbol: Sym; reason: string }
  | { tag: "stuck"; symbol: Sym; iteration: number };

/** A state the driver has stopped in. */
export type SettledState = Exclude<DriverState, { tag: "searching" }>;

export const initialState = (program: ConstraintProgramExpression): DriverState =>
  ({ tag: "searching", program, assignments: [], iteration: 0 });

/**
 * A free variable with the domain the driver will sample it from.
 */
export interface Candidate {
  variable: Variable;
  /** The domain mentions no unresolved symbol */
  closed: boolean;
  /** Some required conjunct narrowed the domain */
  narrowed: boolean;
}

function narrowBooleanDomain(d: BooleanValueDomain, value: boolean): BooleanValueDomain {
  switch (d.tag) {
    case "empty":
      return d;
    case "universe":
      return { tag: "single", value };
    case "single":
      return d.value === value ? d : { tag: "empty" };
  }
}

/**
 * Combine each free variable's declared domain with what the required
 * conjuncts say about it.
 */
export function resolveCandidates(free: Variable[], program: ConstraintProgramExpression): Candidate[] {
  const declared = new Map<string, Domain>();
  for (const d of programDeclarations(program)) declared.set(d.name.name, d.domain);
  const narrowed: Narrowings = narrowings(program);

  return free.map((v): Candidate => {
    const declaredDomain = declared.get(v.name.name);
    if (v.domain.tag === "boolean") {
      const values = narrowed.boolean.get(v.name.name) ?? [];
      const base = declaredDomain?.tag === "boolean" ? declaredDomain.domain : v.domain.domain;
      const domain = values.reduce(narrowBooleanDomain, base);
      return {
        variable: { name: v.name, domain: { tag: "boolean", domain } },
        closed: true,
        narrowed: values.length > 0,
      };
    }
    const parts = narrowed.integer.get(v.name.name) ?? [];
    const base: IntegerNumberDomain = declaredDomain?.tag === "integer" ? declaredDomain.domain : intUniverse;
    const domain = parts.reduce((d: IntegerNumberDomain, n) => intersection(d, n), base);
    return {
      variable: { name: v.name, domain: { tag: "integer", domain } },
      closed: isClosedIntegerDomain(domain),
      narrowed: parts.length > 0,
    };
  });
}

/**
 * Variables to assign in this iteration: every closed, narrowed one; failing
 * that, the first closed one, whose value may close the others.
 */
export function chooseAttempt(candidates: Candidate[]): Variable[] {
  const narrowed = candidates.filter(c => c.closed && c.narrowed);
  if (narrowed.length > 0) return narrowed.map(c => c.variable);
  const first = candidates.find(c => c.closed);
  return first ? [first.variable] : [];
}

/**
 * One transition out of a searching state.
 */
export function step(
  state: Extract<DriverState, { tag: "searching" }>,
  maxIterations: number,
  options: SolveOptions = {}
): DriverState {
  const program = reduce(state.program);
  const constraints = requiredConstraints(program);
  if (constraints.some(c => constraintValue(c) === false)) {
    return { tag: "unsatisfiable", symbol: PROGRAM_SYMBOL, reason: CONTRADICTION };
  }

  const free = distinctVariables(freeVariables(program));
  if (free.length === 0) {
    return constraints.every(c => constraintValue(c) === true)
      ? { tag: "satisfied", assignments: state.assignments }
      : { tag: "stuck", symbol: PROGRAM_SYMBOL, iteration: state.iteration };
  }
  if (state.iteration >= maxIterations) {
    return { tag: "stuck", symbol: free[0].name, iteration: state.iteration };
  }

  const chosen = chooseAttempt(resolveCandidates(free, program));
  if (chosen.length === 0) {
    return { tag: "stuck", symbol: free[0].name, iteration: state.iteration };
  }

  const attempt = generateAttempt(chosen);
  if (!attempt) {
    const failed = firstUnsamplable(chosen) ?? chosen[0];
    return { tag: "unsatisfiable", symbol: failed.name, reason: EMPTY_DOMAIN };
  }
  options.trace?.({ kind: "attempt", assignments: attempt });

  return {
    tag: "searching",
    program: apply(program, attempt),
    assignments: [...state.assignments, ...attempt],
    iteration: state.iteration + 1,
  };
}

/**
 * Run the state machine from the initial state until it leaves `searching`.
 */
export function search(program: ConstraintProgramExpression, options: SolveOptions = {}): SettledState {
  const maxIterations = options.maxIterations ?? programSize(program) + 1;
  let state = initialState(program);
  while (state.tag === "searching") {
    options.trace?.({ kind: "iteration", iteration: state.iteration, program: state.program });
    state = step(state, maxIterations, options);
  }
  options.trace?.({ kind: "finished", state });
  return state;
}

// ============================================================================
// Optimisation
// ============================================================================

/**
 * What an optimisation goal optimises: its explicit objective, or the
 * integer operand on the left of its relation.
 */
export function objectiveOf(goal: SatisfactionExpression): IntegerNumberExpression | undefined {
  if (goal.tag === "satisfy") return undefined;
  if (goal.objective) return goal.objective;
  if (goal.constraint.tag === "boolean") return undefined;
  const relation = goal.constraint.expr;
  return relation.tag === "in" ? relation.expr : relation.left;
}

function objectiveValue(objective: IntegerNumberExpression, sub: Substitution): bigint | undefined {
  const value = evaluateInteger(applyInteger(objective, sub));
  return value && value.tag === "value" ? value.value : undefined;
}

/**
 * Improve one objective from a satisfied state by bisecting between the best
 * value found and the representable limit. A failed bound becomes the new
 * limit; the search ends when the two meet.
 */
function improve(
  program: ConstraintProgramExpression,
  goal: "minimise" | "maximise",
  objective: IntegerNumberExpression,
  found: Extract<DriverState, { tag: "satisfied" }>,
  options: SolveOptions
): { best: bigint | undefined; state: Extract<DriverState, { tag: "satisfied" }> } {
  let state = found;
  let best = objectiveValue(objective, substitutionOf(state.assignments));
  if (best === undefined) return { best, state };

  const maxRounds = options.maxOptimisationRounds ?? DEFAULT_OPTIMISATION_ROUNDS;
  let limit = goal === "minimise" ? INTEGER_MIN : INTEGER_MAX;
  const beforeLimit = (b: bigint) => (goal === "minimise" ? b > limit : b < limit);
  for (let round = 0; round < maxRounds && beforeLimit(best); round++) {
    const bound = goal === "minimise"
      ? best - (best - limit + 1n) / 2n + 1n
      : best + (limit - best + 1n) / 2n - 1n;
    const relation = goal === "minimise"
      ? less(objective, intValue(bound))
      : greater(objective, intValue(bound));
    const next = search(constrainAnd(integerConstraint(relation), program), options);
    const value = next.tag === "satisfied" ? objectiveValue(objective, substitutionOf(next.assignments)) : undefined;
    options.trace?.({ kind: "bound", goal, objective, bound, improved: value !== undefined });

    if (next.tag === "satisfied" && value !== undefined) {
      state = next;
      best = value;
    } else {
      limit = bound;
    }
  }
  return { best, state };
}

/**
 * Search, then optimise each minimise/maximise goal in program order. Each
 * optimised objective is pinned to its best value before the next one.
 */
export function optimise(program: ConstraintProgramExpression, options: SolveOptions = {}): SettledState {
  const first = search(program, options);
  if (first.tag !== "satisfied") return first;

  let state = first;
  let current = program;
  for (const goal of programGoals(program)) {
    if (goal.tag === "satisfy") continue;
    const objective = objectiveOf(goal);
    if (!objective) continue;
    const result = improve(current, goal.tag, objective, state, options);
    state = result.state;
    if (result.best === undefined) continue;
    current = constrainAnd(integerConstraint(intEquals(objective, intValue(result.best))), current);
  }
  return state;
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Declared symbols whose declared domain admits exactly one value.
 */
function constantSymbols(program: ConstraintProgramExpression): Set<string> {
  const constants = new Set<string>();
  for (const d of programDeclarations(program)) {
    if (d.domain.tag === "boolean") {
      if (d.domain.domain.tag === "single") constants.add(d.name.name);
      continue;
    }
    const set = evaluateDomain(d.domain.domain);
    if (set && setSize(set) === 1n) constants.add(d.name.name);
  }
  return constants;
}

/**
 * Turn a final driver state into solutions, in first-occurrence order.
 * Variables that reduction removed before the driver reached them are
 * sampled from their declared domain, or the universe.
 */
export function solutionsOf(program: ConstraintProgramExpression, state: SettledState): Solution[] {
  switch (state.tag) {
    case "unsatisfiable":
      return [unsatisfiable(state.symbol, state.reason)];
    case "stuck":
      return [unsatisfiable(state.symbol, STUCK)];
    case "satisfied": {
      const constants = constantSymbols(program);
      const declared = new Map<string, Domain>();
      for (const d of programDeclarations(program)) declared.set(d.name.name, d.domain);
      const assignments = [...state.assignments];
      const values = new Map<string, AssignedValue>();
      for (const a of assignments) values.set(a.name.name, a.value);

      const solutions: Solution[] = [];
      for (const v of distinctVariables(freeVariables(program))) {
        let value = values.get(v.name.name);
        if (!value) {
          const domain = declared.get(v.name.name) ?? universeOf(v.domain.tag);
          value = sample(applyDomain(domain, substitutionOf(assignments)));
          if (!value) return [unsatisfiable(v.name, EMPTY_DOMAIN)];
          assignments.push({ name: v.name, value });
          values.set(v.name.name, value);
        }
        solutions.push(constants.has(v.name.name)
          ? { tag: "constant", symbol: v.name, value }
          : { tag: "variable", symbol: v.name, value });
      }
      return solutions;
    }
  }
}

/**
 * Solve a program: a value for every free variable, or a single
 * unsatisfiable entry saying why not.
 */
export function solve(program: ConstraintProgramExpression, options: SolveOptions = {}): Solution[] {
  const issues = validateProgram(program);
  if (issues.length > 0) return [unsatisfiable(issues[0].symbol, issues[0].reason)];
  return solutionsOf(program, optimise(program, options));
}

export function solutionEquals(a: Solution, b: Solution): boolean {
  if (a.tag !== b.tag || a.symbol.name !== b.symbol.name) return false;
  if (a.tag === "unsatisfiable") return b.tag === "unsatisfiable" && a.reason === b.reason;
  return b.tag !== "unsatisfiable" && assignedValueEquals(a.value, b.value);
}
