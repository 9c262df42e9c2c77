import type { LowPassGateParams } from "@/lib/dsp/types";

/** Minimum curve factor; keeps pow() away from 0^negative */
export const KINDA_SMALL_NUMBER = 1e-4;
/** Default tolerance for isNearlyEqual */
export const SMALL_NUMBER = 1e-8;
/** Largest envelope phase length, in samples */
export const MAX_SAMPLE_COUNT = 2147483647;
/** Upper end of the cutoff range read as a gain control in both mode */
export const CUTOFF_CONTROL_MAX = 20000;

/** Clamp into [min, max]. NaN lands on min. */
export function clamp(value: number, min: number, max: number): number {
  if (!(value >= min)) return min;
  if (value > max) return max;
  return value;
}

export function isNearlyEqual(a: number, b: number, tolerance = SMALL_NUMBER): boolean {
  return Math.abs(a - b) <= tolerance;
}

/** Linear map of value from [inMin, inMax] into [outMin, outMax], clamped to the output range. */
export function mapRangeClamped(
  value: number,
  inMin: number,
  inMax: number,
  outMin: number,
  outMax: number
): number {
  const t = clamp((value - inMin) / (inMax - inMin), 0, 1);
  return outMin + (outMax - outMin) * t;
}

/** Phase length in samples: round(sampleRate * seconds), at least 1. */
export function toSampleCount(seconds: number, sampleRate: number): number {
  const count = Math.round(sampleRate * seconds);
  if (count > MAX_SAMPLE_COUNT) return MAX_SAMPLE_COUNT;
  return count > 1 ? count : 1;
}

export function clampCurveFactor(raw: number): number {
  return raw > KINDA_SMALL_NUMBER ? raw : KINDA_SMALL_NUMBER;
}

/**
 * List the clamps the gate will silently apply to these params.
 * The processor never reports them itself; renders surface this list.
 */
export function describeParamClamps(params: LowPassGateParams, sampleRate: number): string[] {
  const clamps: string[] = [];
  const nyquist = sampleRate / 2;

  // Envelope phase lengths
  if (!(Math.round(sampleRate * params.attackTime) >= 1)) {
    clamps.push(`Attack time clamped from ${params.attackTime}s to 1 sample`);
  }
  if (!(Math.round(sampleRate * params.decayTime) >= 1)) {
    clamps.push(`Decay time clamped from ${params.decayTime}s to 1 sample`);
  }

  // Curve factors
  if (!(params.attackCurve > KINDA_SMALL_NUMBER)) {
    clamps.push(`Attack curve clamped from ${params.attackCurve} to ${KINDA_SMALL_NUMBER}`);
  }
  if (!(params.decayCurve > KINDA_SMALL_NUMBER)) {
    clamps.push(`Decay curve clamped from ${params.decayCurve} to ${KINDA_SMALL_NUMBER}`);
  }

  // Cutoff (unused in vca mode)
  if (params.mode !== "vca") {
    const cutoffHz = clamp(params.cutoff, 0, nyquist);
    if (cutoffHz !== params.cutoff) {
      clamps.push(`Cutoff clamped from ${params.cutoff}Hz to ${cutoffHz}Hz`);
    }
  }
  if (params.mode === "both" && params.cutoff > CUTOFF_CONTROL_MAX) {
    clamps.push(`Cutoff gain control clamped from ${params.cutoff} to ${CUTOFF_CONTROL_MAX}`);
  }

  return clamps;
}
