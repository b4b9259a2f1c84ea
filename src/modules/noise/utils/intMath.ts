function assertSafeInteger(name: string, v: number): void {
  if (!Number.isSafeInteger(v)) {
    throw new RangeError(`${name} must be a safe integer, got ${v}`);
  }
}

// Integer division rounded toward +Infinity when the exact quotient is positive.
export function ceilDiv(a: number, b: number): number {
  assertSafeInteger("dividend", a);
  assertSafeInteger("divisor", b);
  if (b === 0) {
    throw new RangeError("ceilDiv by zero");
  }

  const r = a % b;
  const q = (a - r) / b;
  if (r !== 0 && (a < 0) === (b < 0)) return q + 1;
  return q;
}
