export const EPSILON = 1e-9;

export const isZero = (v: number): boolean => Math.abs(v) <= EPSILON;

export const isOne = (v: number): boolean => Math.abs(v - 1) <= EPSILON;

// Display-side cleanup only; stored values are never rounded.
export const cleanZero = (v: number): number => (Math.abs(v) < EPSILON ? 0 : v);

export const fmt = (v: number, decimals = 2): string => {
  const s = cleanZero(v).toFixed(decimals);
  // toFixed keeps the sign of tiny negatives, e.g. -0.001 -> "-0.00"
  return /^-0(\.0*)?$/.test(s) ? s.slice(1) : s;
};
