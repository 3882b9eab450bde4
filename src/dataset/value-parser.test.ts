/**
 * Value Parser Unit Tests
 */

import { describe, it, expect } from "vitest";
import { InvalidValueError, parseValue } from "./value-parser.js";

describe("parseValue", () => {
  it("should parse signed exponential reals", () => {
    expect(parseValue("+1.00000000000000e+03")).toEqual({ re: 1000, im: 0 });
    expect(parseValue("-2.5e-01")).toEqual({ re: -0.25, im: 0 });
  });

  it("should parse plain decimals", () => {
    expect(parseValue("3")).toEqual({ re: 3, im: 0 });
    expect(parseValue(".5")).toEqual({ re: 0.5, im: 0 });
    expect(parseValue("  7.  ")).toEqual({ re: 7, im: 0 });
  });

  it("should parse complex values with either imaginary sign", () => {
    expect(parseValue("+1.0e+00-j5.0e-01")).toEqual({ re: 1, im: -0.5 });
    expect(parseValue("-3.0e+00+j2.0e+00")).toEqual({ re: -3, im: 2 });
  });

  it("should not mistake exponent signs for the imaginary marker", () => {
    expect(parseValue("+1.5e+02+j1.0e-03")).toEqual({ re: 150, im: 0.001 });
  });

  it("should accept non-finite spellings", () => {
    expect(parseValue("inf").re).toBe(Number.POSITIVE_INFINITY);
    expect(parseValue("-inf").re).toBe(Number.NEGATIVE_INFINITY);
    expect(parseValue("NaN").re).toBeNaN();
    expect(parseValue("+1.0e+00+jinf").im).toBe(Number.POSITIVE_INFINITY);
  });

  it("should reject malformed text", () => {
    expect(() => parseValue("garbage")).toThrow(InvalidValueError);
    expect(() => parseValue("")).toThrow(InvalidValueError);
    expect(() => parseValue("1.0.0")).toThrow(InvalidValueError);
  });

  it("should reject complex values missing a part", () => {
    expect(() => parseValue("+j1.0e+00")).toThrow(InvalidValueError);
    expect(() => parseValue("+1.0e+00+j")).toThrow(InvalidValueError);
    expect(() => parseValue("+1.0e+00+j-2.0e+00")).toThrow(InvalidValueError);
  });

  it("should quote the original text in the error", () => {
    expect(() => parseValue("1..2")).toThrow("Invalid dataset value '1..2'");
  });
});
