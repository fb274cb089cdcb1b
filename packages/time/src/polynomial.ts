/**
 * Evaluate `c0 + c1 x + c2 x^2 + ...` with Horner's scheme.
 *
 * Coefficients are given lowest order first.
 */
export function horner(x: number, coefficients: readonly number[]): number {
  let acc = 0;
  for (let i = coefficients.length - 1; i >= 0; i--) {
    acc = acc * x + (coefficients[i] ?? 0);
  }
  return acc;
}
