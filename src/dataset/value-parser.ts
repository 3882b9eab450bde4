/**
 * Parser for single dataset values.
 *
 * Real:    +1.234e+00
 * Complex: +1.234e+00+j5.678e-01, +1.234e+00-j5.678e-01
 */

import type { Complex } from "../complex.js";
import { NetbindError } from "../errors.js";

const REAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const NON_FINITE = /^[+-]?(?:inf|infinity|nan)$/i;
const IMAGINARY_MARKER = /[+-]j/;

export class InvalidValueError extends NetbindError {
  constructor(readonly text: string) {
    super(`Invalid dataset value '${text}'`);
  }
}

const parseReal = (text: string, original: string): number => {
  if (REAL.test(text)) {
    return Number(text);
  }
  if (NON_FINITE.test(text)) {
    const negative = text.startsWith("-");
    if (/nan/i.test(text)) return Number.NaN;
    return negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  throw new InvalidValueError(original);
};

/**
 * Parse one value line. Throws InvalidValueError when the text is neither a
 * real nor a `re±jim` complex number.
 */
export const parseValue = (text: string): Complex => {
  const trimmed = text.trim();
  if (trimmed === "") {
    throw new InvalidValueError(text);
  }

  const marker = IMAGINARY_MARKER.exec(trimmed);
  if (!marker) {
    return { re: parseReal(trimmed, text), im: 0 };
  }

  const realText = trimmed.slice(0, marker.index);
  const sign = trimmed[marker.index];
  const imagText = trimmed.slice(marker.index + 2);
  if (realText === "" || /^[+-]/.test(imagText)) {
    throw new InvalidValueError(text);
  }
  return {
    re: parseReal(realText, text),
    im: parseReal(`${sign}${imagText}`, text),
  };
};
