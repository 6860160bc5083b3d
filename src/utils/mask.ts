export function maskDigits(value: string, visible: number = 2): string {
  return value.replace(/\d{3,}/g, (match) => {
    const keep = match.slice(-visible);
    return "*".repeat(Math.max(0, match.length - visible)) + keep;
  });
}

export function maskApiKey(value?: string): string {
  if (!value) return "missing";
  const key = String(value);
  if (key.length <= 4) return "*".repeat(key.length);
  return "*".repeat(key.length - 4) + key.slice(-4);
}

export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}
