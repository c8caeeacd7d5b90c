/**
 * Integer value tests: range, NaN and arithmetic.
 */
import { describe, it, expect } from "vitest";

import {
  INTEGER_MAX,
  INTEGER_MIN,
  addNumbers,
  assignedValueEquals,
  assignedValueToString,
  booleanAssigned,
  divideNumbers,
  integer,
  integerAssigned,
  integerNumberEquals,
  integerNumberToString,
  isNotANumber,
  minusNumbers,
  moduloNumbers,
  nanNumber,
  negateNumber,
  numberGreater,
  numberLess,
  numbersEqual,
  timesNumbers,
} from "../src/index";

describe("integer", () => {
  it("wraps in-range values", () => {
    expect(integer(5)).toEqual({ tag: "value", value: 5n });
    expect(integer(INTEGER_MAX)).toEqual({ tag: "value", value: INTEGER_MAX });
  });

  it("turns out-of-range values into NaN", () => {
    expect(isNotANumber(integer(INTEGER_MAX + 1n))).toBe(true);
    expect(isNotANumber(integer(INTEGER_MIN - 1n))).toBe(true);
  });
});

describe("arithmetic", () => {
  it("computes exactly", () => {
    expect(addNumbers(integer(2), integer(3))).toEqual(integer(5));
    expect(minusNumbers(integer(2), integer(3))).toEqual(integer(-1));
    expect(timesNumbers(integer(-4), integer(3))).toEqual(integer(-12));
  });

  it("truncates division toward zero", () => {
    expect(divideNumbers(integer(-7), integer(2))).toEqual(integer(-3));
    expect(moduloNumbers(integer(-7), integer(2))).toEqual(integer(-1));
    expect(moduloNumbers(integer(7), integer(-2))).toEqual(integer(1));
  });

  it("gives NaN on division by zero", () => {
    expect(divideNumbers(integer(1), integer(0))).toEqual(nanNumber);
    expect(moduloNumbers(integer(1), integer(0))).toEqual(nanNumber);
  });

  it("gives NaN on overflow", () => {
    expect(addNumbers(integer(INTEGER_MAX), integer(1))).toEqual(nanNumber);
    expect(timesNumbers(integer(INTEGER_MAX), integer(2))).toEqual(nanNumber);
    expect(negateNumber(integer(INTEGER_MIN))).toEqual(nanNumber);
  });

  it("propagates NaN", () => {
    expect(addNumbers(nanNumber, integer(1))).toEqual(nanNumber);
    expect(negateNumber(nanNumber)).toEqual(nanNumber);
  });
});

describe("comparison", () => {
  it("is false whenever NaN is involved", () => {
    expect(numbersEqual(nanNumber, nanNumber)).toBe(false);
    expect(numberGreater(nanNumber, integer(1))).toBe(false);
    expect(numberLess(integer(1), nanNumber)).toBe(false);
  });

  it("orders values", () => {
    expect(numberGreater(integer(3), integer(2))).toBe(true);
    expect(numberLess(integer(3), integer(2))).toBe(false);
    expect(numbersEqual(integer(3), integer(3))).toBe(true);
  });

  it("treats NaN as structurally equal to itself", () => {
    expect(integerNumberEquals(nanNumber, nanNumber)).toBe(true);
    expect(integerNumberEquals(nanNumber, integer(0))).toBe(false);
    expect(assignedValueEquals(booleanAssigned(true), integerAssigned(integer(1)))).toBe(false);
  });
});

describe("printing", () => {
  it("prints values", () => {
    expect(integerNumberToString(integer(-42))).toBe("-42");
    expect(integerNumberToString(nanNumber)).toBe("NaN");
    expect(assignedValueToString(booleanAssigned(false))).toBe("false");
  });
});
