export const arrayEqual = <T>(
  a: readonly T[],
  b: readonly T[],
  eq: (x: T, y: T) => boolean = Object.is,
): boolean => a.length === b.length && a.every((x, i) => eq(x, b[i]));
