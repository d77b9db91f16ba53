/**
 * Nice numbers - round domain bounds and tick steps to 1, 2 or 5 × 10ⁿ.
 */

export const DEFAULT_TICK_COUNT = 5;

/**
 * Smallest 1/2/5 × 10ⁿ step that covers `span` in at most `count` steps.
 */
export function niceStep(span: number, count: number = DEFAULT_TICK_COUNT): number {
  if (!(span > 0) || !Number.isFinite(span) || count <= 0) {
    return 1;
  }
  const raw = span / count;
  const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
  const fraction = raw / magnitude;

  let nice: number;
  if (fraction <= 1) nice = 1;
  else if (fraction <= 2) nice = 2;
  else if (fraction <= 5) nice = 5;
  else nice = 10;

  return nice * magnitude;
}

/**
 * Round [min, max] outward to multiples of the nice step.
 * A zero-width extent is returned as is.
 */
export function niceExtent(min: number, max: number, count: number = DEFAULT_TICK_COUNT): [number, number] {
  if (!(max > min)) {
    return [min, max];
  }
  const step = niceStep(max - min, count);
  return [roundTo(Math.floor(min / step) * step), roundTo(Math.ceil(max / step) * step)];
}

// strip binary noise such as 0.30000000000000004
export function roundTo(value: number): number {
  return Number.parseFloat(value.toPrecision(12));
}
