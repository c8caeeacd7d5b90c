/**
 * JSON form of programs.
 *
 * Nodes are objects with the same `tag` field as the in-memory tree. Symbols
 * are plain strings; integer values are JSON numbers, decimal strings (for
 * values beyond 2^53) or "NaN".
 *
 *   { "tag": "declareAnd",
 *     "variable": { "name": "x", "domain": { "tag": "integer", "domain": { "tag": "universe" } } },
 *     "rest": { "tag": "solve", "goal": { "tag": "satisfy", "constraint": ... } } }
 */

import * as fs from "fs";
import { z } from "zod";

import {
  BooleanExpression,
  BooleanIntegerNumberExpression,
  BooleanValueDomain,
  ConstraintLogicExpression,
  ConstraintProgramExpression,
  Domain,
  IntegerNumberDomain,
  IntegerNumberExpression,
  SatisfactionExpression,
  Variable,
  sym,
} from "./expr";
import { INTEGER_MAX, INTEGER_MIN, IntegerNumber, integer, nanNumber } from "./value";

export class ProgramDecodeError extends Error {
  constructor(
    message: string,
    public path: string
  ) {
    super(`${path}: ${message}`);
    this.name = "ProgramDecodeError";
  }
}

export type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

/** Schema whose input is arbitrary JSON. */
type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Error messages for a tagged node: a non-object, or a tag outside the
 * node kind.
 */
const tagged = (kind: string): z.RawCreateParams => ({
  errorMap: (issue, ctx) => {
    switch (issue.code) {
      case z.ZodIssueCode.invalid_type:
        return { message: "expected an object" };
      case z.ZodIssueCode.invalid_union_discriminator:
        return { message: `unknown ${kind} tag` };
      default:
        return { message: ctx.defaultError };
    }
  },
});

// ============================================================================
// Leaves
// ============================================================================

const symbol = z
  .string({ invalid_type_error: "expected a symbol name", required_error: "expected a symbol name" })
  .min(1, "expected a symbol name")
  .transform(name => sym(name));

const booleanField = z.boolean({ invalid_type_error: "expected a boolean", required_error: "expected a boolean" });

function readIntegerNumber(value: unknown): IntegerNumber | string {
  if (value === "NaN") return nanNumber;
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? integer(value) : `${value} is not a safe integer`;
  }
  if (typeof value === "string" && /^-?\d+$/.test(value)) {
    const n = BigInt(value);
    return n < INTEGER_MIN || n > INTEGER_MAX ? `${value} is out of range` : integer(n);
  }
  return "expected an integer, a decimal string or \"NaN\"";
}

/**
 * Integer values: JSON numbers within 2^53, decimal strings or "NaN".
 */
export const integerNumberSchema: Decoder<IntegerNumber> = z.unknown().transform((value, ctx) => {
  const result = readIntegerNumber(value);
  if (typeof result === "string") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result });
    return z.NEVER;
  }
  return result;
});

// ============================================================================
// Expressions
// ============================================================================

export const booleanExpressionSchema: Decoder<BooleanExpression> = z.lazy(() =>
  z.discriminatedUnion(
    "tag",
    [
      z.object({
        tag: z.enum(["and", "or", "implies", "equals"]),
        left: booleanExpressionSchema,
        right: booleanExpressionSchema,
      }),
      z.object({ tag: z.enum(["not", "parenthesis"]), expr: booleanExpressionSchema }),
      z.object({ tag: z.literal("variable"), name: symbol }),
      z.object({ tag: z.literal("value"), value: booleanField }),
    ],
    tagged("boolean expression")
  )
);

export const integerExpressionSchema: Decoder<IntegerNumberExpression> = z.lazy(() =>
  z.discriminatedUnion(
    "tag",
    [
      z.object({
        tag: z.enum(["add", "minus", "times", "divide", "modulo"]),
        left: integerExpressionSchema,
        right: integerExpressionSchema,
      }),
      z.object({ tag: z.enum(["negate", "parenthesis"]), expr: integerExpressionSchema }),
      z.object({ tag: z.literal("variable"), name: symbol }),
      z.object({ tag: z.literal("value"), value: integerNumberSchema }),
    ],
    tagged("integer expression")
  )
);

// ============================================================================
// Domains
// ============================================================================

const booleanDomainSchema: Decoder<BooleanValueDomain> = z.discriminatedUnion(
  "tag",
  [
    z.object({ tag: z.enum(["universe", "empty"]) }),
    z.object({ tag: z.literal("single"), value: booleanField }),
  ],
  tagged("boolean domain")
);

export const integerDomainSchema: Decoder<IntegerNumberDomain> = z.lazy(() =>
  z.discriminatedUnion(
    "tag",
    [
      z.object({ tag: z.enum(["universe", "empty"]) }),
      z.object({
        tag: z.enum(["closedRange", "openRange", "openLeftClosedRightRange", "closedLeftOpenRightRange"]),
        low: integerExpressionSchema,
        high: integerExpressionSchema,
      }),
      z.object({
        tag: z.literal("explicitSet"),
        elements: z.array(integerExpressionSchema, {
          invalid_type_error: "expected an array",
          required_error: "expected an array",
        }),
      }),
      z.object({
        tag: z.enum(["union", "intersection", "difference"]),
        left: integerDomainSchema,
        right: integerDomainSchema,
      }),
      z.object({ tag: z.literal("complement"), domain: integerDomainSchema }),
    ],
    tagged("integer domain")
  )
);

export const domainSchema: Decoder<Domain> = z.discriminatedUnion(
  "tag",
  [
    z.object({ tag: z.literal("boolean"), domain: booleanDomainSchema }),
    z.object({ tag: z.literal("integer"), domain: integerDomainSchema }),
  ],
  tagged("domain")
);

const variableSchema: Decoder<Variable> = z.object(
  { name: symbol, domain: domainSchema },
  { invalid_type_error: "expected an object", required_error: "expected an object" }
);

// ============================================================================
// Constraints, Goals and Programs
// ============================================================================

const relationSchema: Decoder<BooleanIntegerNumberExpression> = z.discriminatedUnion(
  "tag",
  [
    z.object({
      tag: z.enum(["equals", "different", "greater", "less"]),
      left: integerExpressionSchema,
      right: integerExpressionSchema,
    }),
    z.object({ tag: z.literal("in"), expr: integerExpressionSchema, domain: integerDomainSchema }),
  ],
  tagged("relation")
);

export const constraintSchema: Decoder<ConstraintLogicExpression> = z.discriminatedUnion(
  "tag",
  [
    z.object({ tag: z.literal("boolean"), expr: booleanExpressionSchema }),
    z.object({ tag: z.literal("ofIntegerNumber"), expr: relationSchema }),
  ],
  tagged("constraint")
);

const goalSchema: Decoder<SatisfactionExpression> = z.discriminatedUnion(
  "tag",
  [
    z.object({ tag: z.literal("satisfy"), constraint: constraintSchema }),
    z.object({
      tag: z.enum(["minimise", "maximise"]),
      constraint: constraintSchema,
      objective: integerExpressionSchema.optional(),
    }),
  ],
  tagged("goal")
);

export const programSchema: Decoder<ConstraintProgramExpression> = z.lazy(() =>
  z.discriminatedUnion(
    "tag",
    [
      z.object({ tag: z.literal("solve"), goal: goalSchema }),
      z.object({ tag: z.literal("solveAnd"), goal: goalSchema, rest: programSchema }),
      z.object({ tag: z.literal("constrainAnd"), constraint: constraintSchema, rest: programSchema }),
      z.object({ tag: z.literal("declareAnd"), variable: variableSchema, rest: programSchema }),
    ],
    tagged("program")
  )
);

// ============================================================================
// Decoding
// ============================================================================

const pathOf = (root: string, path: (string | number)[]): string =>
  root + path.map(p => (typeof p === "number" ? `[${p}]` : `.${p}`)).join("");

/**
 * Parse `json` with `schema`. The first issue becomes a ProgramDecodeError
 * whose path is relative to `root`.
 */
export function decodeWith<T>(schema: Decoder<T>, json: unknown, root = "$"): T {
  const result = schema.safeParse(json);
  if (result.success) return result.data;
  const [issue] = result.error.issues;
  throw new ProgramDecodeError(issue.message, pathOf(root, issue.path));
}

export const decodeIntegerNumber = (value: unknown, path = "$"): IntegerNumber =>
  decodeWith(integerNumberSchema, value, path);

export const decodeProgram = (json: unknown, path = "$"): ConstraintProgramExpression =>
  decodeWith(programSchema, json, path);

/**
 * Read and decode a program file. Syntax errors surface as ProgramDecodeError
 * at path "$".
 */
export function loadProgram(file: string): ConstraintProgramExpression {
  const text = fs.readFileSync(file, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ProgramDecodeError(err instanceof Error ? err.message : String(err), "$");
  }
  return decodeProgram(json);
}

// ============================================================================
// Encoding
// ============================================================================

export function encodeIntegerNumber(n: IntegerNumber): Json {
  if (n.tag === "nan") return "NaN";
  return n.value >= BigInt(Number.MIN_SAFE_INTEGER) && n.value <= BigInt(Number.MAX_SAFE_INTEGER)
    ? Number(n.value)
    : n.value.toString();
}

function encodeBoolean(e: BooleanExpression): Json {
  switch (e.tag) {
    case "variable":
      return { tag: e.tag, name: e.name.name };
    case "value":
      return { tag: e.tag, value: e.value };
    case "not":
    case "parenthesis":
      return { tag: e.tag, expr: encodeBoolean(e.expr) };
    default:
      return { tag: e.tag, left: encodeBoolean(e.left), right: encodeBoolean(e.right) };
  }
}

function encodeInteger(e: IntegerNumberExpression): Json {
  switch (e.tag) {
    case "variable":
      return { tag: e.tag, name: e.name.name };
    case "value":
      return { tag: e.tag, value: encodeIntegerNumber(e.value) };
    case "negate":
    case "parenthesis":
      return { tag: e.tag, expr: encodeInteger(e.expr) };
    default:
      return { tag: e.tag, left: encodeInteger(e.left), right: encodeInteger(e.right) };
  }
}

function encodeIntegerDomain(d: IntegerNumberDomain): Json {
  switch (d.tag) {
    case "universe":
    case "empty":
      return { tag: d.tag };
    case "explicitSet":
      return { tag: d.tag, elements: d.elements.map(encodeInteger) };
    case "union":
    case "intersection":
    case "difference":
      return { tag: d.tag, left: encodeIntegerDomain(d.left), right: encodeIntegerDomain(d.right) };
    case "complement":
      return { tag: d.tag, domain: encodeIntegerDomain(d.domain) };
    default:
      return { tag: d.tag, low: encodeInteger(d.low), high: encodeInteger(d.high) };
  }
}

function encodeDomain(d: Domain): Json {
  if (d.tag === "integer") return { tag: d.tag, domain: encodeIntegerDomain(d.domain) };
  const domain: Json = d.domain.tag === "single" ? { tag: "single", value: d.domain.value } : { tag: d.domain.tag };
  return { tag: d.tag, domain };
}

function encodeConstraint(c: ConstraintLogicExpression): Json {
  if (c.tag === "boolean") return { tag: c.tag, expr: encodeBoolean(c.expr) };
  const e = c.expr;
  const expr: Json =
    e.tag === "in"
      ? { tag: e.tag, expr: encodeInteger(e.expr), domain: encodeIntegerDomain(e.domain) }
      : { tag: e.tag, left: encodeInteger(e.left), right: encodeInteger(e.right) };
  return { tag: c.tag, expr };
}

function encodeGoal(g: SatisfactionExpression): Json {
  const constraint = encodeConstraint(g.constraint);
  if (g.tag === "satisfy" || !g.objective) return { tag: g.tag, constraint };
  return { tag: g.tag, constraint, objective: encodeInteger(g.objective) };
}

export function encodeProgram(p: ConstraintProgramExpression): Json {
  switch (p.tag) {
    case "solve":
      return { tag: p.tag, goal: encodeGoal(p.goal) };
    case "solveAnd":
      return { tag: p.tag, goal: encodeGoal(p.goal), rest: encodeProgram(p.rest) };
    case "constrainAnd":
      return { tag: p.tag, constraint: encodeConstraint(p.constraint), rest: encodeProgram(p.rest) };
    case "declareAnd":
      return {
        tag: p.tag,
        variable: { name: p.variable.name.name, domain: encodeDomain(p.variable.domain) },
        rest: encodeProgram(p.rest),
      };
  }
}
