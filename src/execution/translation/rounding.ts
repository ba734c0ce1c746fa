/**
 * Step rounding done in whole steps so results carry no binary drift beyond
 * the step's own precision.
 */

export type RoundingMode = 'floor' | 'ceil' | 'nearest';

// Values this close to a step boundary are treated as on it
const STEP_EPSILON = 1e-9;

export function decimalsOf(step: number): number {
  const text = String(step);
  const exponent = text.match(/e-(\d+)$/);
  if (exponent) {
    const mantissa = text.slice(0, text.indexOf('e'));
    const mantissaDecimals = mantissa.includes('.') ? mantissa.split('.')[1]?.length ?? 0 : 0;
    return Number(exponent[1]) + mantissaDecimals;
  }
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

export function toSteps(value: number, step: number, mode: RoundingMode): number {
  const raw = value / step;
  const nearest = Math.round(raw);
  if (Math.abs(raw - nearest) < STEP_EPSILON || mode === 'nearest') {
    return nearest;
  }
  return mode === 'floor' ? Math.floor(raw) : Math.ceil(raw);
}

export function roundToStep(value: number, step: number, mode: RoundingMode): number {
  return Number((toSteps(value, step, mode) * step).toFixed(decimalsOf(step)));
}

/** Decimal string at the step's precision, as venues expect it on the wire */
export function formatToStep(value: number, step: number): string {
  return value.toFixed(decimalsOf(step));
}
