export interface NumericBounds {
  min: number;
  max: number;
  step?: number;
}

/**
 * Coerces free-form input into the widget's declared range. Integer steps
 * round to the nearest step; a value that does not parse falls back.
 */
export function clampToBounds(
  raw: string | number,
  bounds: NumericBounds,
  fallback: number,
): number {
  const parsed = typeof raw === "number" ? raw : Number(raw.trim());
  if (raw === "" || !Number.isFinite(parsed)) return fallback;

  const step = bounds.step ?? 0;
  const stepped =
    step > 0 ? bounds.min + Math.round((parsed - bounds.min) / step) * step : parsed;

  return Math.min(bounds.max, Math.max(bounds.min, stepped));
}
