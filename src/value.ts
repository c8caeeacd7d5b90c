/**
 * Concrete values a variable can take.
 *
 * Integers are signed 128-bit; anything outside that range, and division or
 * modulo by zero, becomes NaN. NaN is never equal to, greater than or less
 * than anything, including itself.
 */

// ============================================================================
// Value Types
// ============================================================================

export type BooleanValue = boolean;

export type IntegerNumber =
  | { tag: "nan" }
  | { tag: "value"; value: bigint };

export type AssignedValue =
  | { tag: "boolean"; value: BooleanValue }
  | { tag: "integer"; value: IntegerNumber };

export const INTEGER_MIN = -(2n ** 127n);
export const INTEGER_MAX = 2n ** 127n - 1n;

// ============================================================================
// Constructors
// ============================================================================

export const nanNumber: IntegerNumber = { tag: "nan" };

/**
 * Wrap a bigint, collapsing out-of-range results to NaN.
 */
export const integer = (value: bigint | number): IntegerNumber => {
  const v = typeof value === "number" ? BigInt(value) : value;
  return v < INTEGER_MIN || v > INTEGER_MAX ? nanNumber : { tag: "value", value: v };
};

export const booleanAssigned = (value: BooleanValue): AssignedValue => ({ tag: "boolean", value });
export const integerAssigned = (value: IntegerNumber): AssignedValue => ({ tag: "integer", value });

export function isNotANumber(n: IntegerNumber): n is { tag: "nan" } {
  return n.tag === "nan";
}

// ============================================================================
// Arithmetic
// ============================================================================

function lift(a: IntegerNumber, b: IntegerNumber, f: (x: bigint, y: bigint) => bigint | undefined): IntegerNumber {
  if (a.tag === "nan" || b.tag === "nan") return nanNumber;
  const result = f(a.value, b.value);
  return result === undefined ? nanNumber : integer(result);
}

export const addNumbers = (a: IntegerNumber, b: IntegerNumber): IntegerNumber =>
  lift(a, b, (x, y) => x + y);

export const minusNumbers = (a: IntegerNumber, b: IntegerNumber): IntegerNumber =>
  lift(a, b, (x, y) => x - y);

export const timesNumbers = (a: IntegerNumber, b: IntegerNumber): IntegerNumber =>
  lift(a, b, (x, y) => x * y);

// bigint division truncates toward zero; remainder keeps the dividend's sign
export const divideNumbers = (a: IntegerNumber, b: IntegerNumber): IntegerNumber =>
  lift(a, b, (x, y) => (y === 0n ? undefined : x / y));

export const moduloNumbers = (a: IntegerNumber, b: IntegerNumber): IntegerNumber =>
  lift(a, b, (x, y) => (y === 0n ? undefined : x % y));

export const negateNumber = (a: IntegerNumber): IntegerNumber =>
  a.tag === "nan" ? nanNumber : integer(-a.value);

// ============================================================================
// Comparison
// ============================================================================

export function numbersEqual(a: IntegerNumber, b: IntegerNumber): boolean {
  return a.tag === "value" && b.tag === "value" && a.value === b.value;
}

export function numberGreater(a: IntegerNumber, b: IntegerNumber): boolean {
  return a.tag === "value" && b.tag === "value" && a.value > b.value;
}

export function numberLess(a: IntegerNumber, b: IntegerNumber): boolean {
  return a.tag === "value" && b.tag === "value" && a.value < b.value;
}

/**
 * Structural equality: unlike numbersEqual, NaN matches NaN here.
 * Used for comparing trees, never for evaluating programs.
 */
export function integerNumberEquals(a: IntegerNumber, b: IntegerNumber): boolean {
  if (a.tag === "nan" || b.tag === "nan") return a.tag === b.tag;
  return a.value === b.value;
}

export function assignedValueEquals(a: AssignedValue, b: AssignedValue): boolean {
  if (a.tag === "boolean") return b.tag === "boolean" && a.value === b.value;
  return b.tag === "integer" && integerNumberEquals(a.value, b.value);
}

export function integerNumberToString(n: IntegerNumber): string {
  return n.tag === "nan" ? "NaN" : n.value.toString();
}

export function assignedValueToString(v: AssignedValue): string {
  return v.tag === "boolean" ? String(v.value) : integerNumberToString(v.value);
}
