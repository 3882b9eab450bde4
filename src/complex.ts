/**
 * Complex number values used by dataset vectors and typed results.
 */

export interface Complex {
  re: number;
  im: number;
}

export const complex = (re: number, im = 0): Complex => ({ re, im });

export const ZERO: Complex = Object.freeze({ re: 0, im: 0 });

export const sub = (a: Complex, b: Complex): Complex => ({
  re: a.re - b.re,
  im: a.im - b.im,
});

export const neg = (a: Complex): Complex => ({ re: -a.re, im: -a.im });

export const zeros = (length: number): Complex[] =>
  Array.from({ length }, () => ({ re: 0, im: 0 }));
