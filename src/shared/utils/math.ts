// Rounds half to even on the exact binary value, so 7.25 becomes 7.2 and 1.05 (stored just above) becomes 1.1.
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  if (!Number.isFinite(value) || value === 0 || Math.abs(value) * factor >= Number.MAX_SAFE_INTEGER) {
    return value;
  }

  const digits = Math.abs(value).toFixed(100);
  const point = digits.indexOf(".");
  const cut = point + 1 + decimals;
  const next = digits.charAt(cut);
  const rest = digits.slice(cut + 1);

  let scaled = Number(digits.slice(0, point) + digits.slice(point + 1, cut));
  if (next > "5" || (next === "5" && (/[1-9]/.test(rest) || scaled % 2 === 1))) {
    scaled += 1;
  }
  return (Math.sign(value) * scaled) / factor;
}

export function round1(value: number): number {
  return roundTo(value, 1);
}

export function round2(value: number): number {
  return roundTo(value, 2);
}

export function clampToRange(value: number, min: number, max: number): number {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}

export function ratio(part: number, whole: number): number {
  if (whole <= 0) {
    return 0;
  }
  return round2(part / whole);
}

export function mean(values: ReadonlyArray<number>): number {
  if (values.length === 0) {
    return 0;
  }
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total / values.length;
}
