export function maskDigits(value: string, visible: number = 4): string {
  const digits = value.replace(/\D/g, "");
  if (digits.length <= visible) return value;
  let toMask = digits.length - visible;
  return value.replace(/\d/g, (digit) => {
    if (toMask <= 0) return digit;
    toMask -= 1;
    return "*";
  });
}

export function maskDigitRuns(input: string): string {
  return input.replace(/\d{3,}/g, (match) => {
    const keep = match.slice(-2);
    return "*".repeat(Math.max(0, match.length - 2)) + keep;
  });
}

export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
