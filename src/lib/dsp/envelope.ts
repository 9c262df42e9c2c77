/**
 * Block-rate attack/decay envelope.
 *
 * One call to advanceEnvelope() produces one envelope value and moves the
 * run forward by one step; the processor calls it once per contiguous
 * sub-range of a block, never once per audio frame.
 */

import { ExponentialEase } from "./ExponentialEase";
import { clampCurveFactor, toSampleCount } from "../safetyClamps";

/** Sample index of an idle envelope */
export const INDEX_NONE = -1;

const EASE_FACTOR = 0.01;

export type EnvelopePhase = "idle" | "attack" | "decay";

export interface EnvelopeState {
  /** INDEX_NONE when idle, else position within the attack + decay run */
  currentSampleIndex: number;
  attackSampleCount: number;
  decaySampleCount: number;
  attackCurveFactor: number;
  decayCurveFactor: number;
  /** Level the current attack rises from */
  startingEnvelopeValue: number;
  /** Last computed output; the baseline for the next retrigger */
  currentEnvelopeValue: number;
  /** Restart every attack from 0 instead of the current level */
  hardReset: boolean;
  ease: ExponentialEase;
}

export interface EnvelopeTiming {
  attackTime: number;
  decayTime: number;
  attackCurve: number;
  decayCurve: number;
}

export function createEnvelopeState(hardReset = false): EnvelopeState {
  return {
    currentSampleIndex: INDEX_NONE,
    attackSampleCount: 1,
    decaySampleCount: 1,
    attackCurveFactor: 1,
    decayCurveFactor: 1,
    startingEnvelopeValue: 0,
    currentEnvelopeValue: 0,
    hardReset,
    ease: new ExponentialEase(0, EASE_FACTOR),
  };
}

/** Back to idle. hardReset is configuration and survives the reset. */
export function resetEnvelopeState(state: EnvelopeState): void {
  state.currentSampleIndex = INDEX_NONE;
  state.attackSampleCount = 1;
  state.decaySampleCount = 1;
  state.attackCurveFactor = 1;
  state.decayCurveFactor = 1;
  state.startingEnvelopeValue = 0;
  state.currentEnvelopeValue = 0;
  state.ease.init(0, EASE_FACTOR);
}

/** Derive sample counts and curve factors from the current controls. */
export function updateEnvelopeParams(
  state: EnvelopeState,
  timing: EnvelopeTiming,
  sampleRate: number
): void {
  state.attackSampleCount = toSampleCount(timing.attackTime, sampleRate);
  state.decaySampleCount = toSampleCount(timing.decayTime, sampleRate);
  state.attackCurveFactor = clampCurveFactor(timing.attackCurve);
  state.decayCurveFactor = clampCurveFactor(timing.decayCurve);
}

/** Restart the run from sample 0, rising from the current level unless hardReset is set. */
export function retriggerEnvelope(state: EnvelopeState): void {
  state.currentSampleIndex = 0;
  state.startingEnvelopeValue = state.hardReset ? 0 : state.currentEnvelopeValue;
  state.ease.setValue(state.startingEnvelopeValue, true);
}

/**
 * Compute the envelope value for the sub-range [startFrame, endFrame).
 *
 * Only a sub-range starting at frame 0 advances the run; any other start,
 * or an idle envelope, yields 0 and leaves the sample index alone. When the
 * run completes, frame 0 (relative to startFrame) is pushed to finishedFrames.
 */
export function advanceEnvelope(
  state: EnvelopeState,
  startFrame: number,
  _endFrame: number,
  finishedFrames: number[]
): number {
  let value = 0;

  if (startFrame > 0 || state.currentSampleIndex === INDEX_NONE) {
    state.currentEnvelopeValue = value;
    return value;
  }

  const attackCount = state.attackSampleCount;
  const totalCount = attackCount + state.decaySampleCount;

  if (state.currentSampleIndex < attackCount) {
    if (attackCount > 1) {
      const fraction = state.currentSampleIndex / attackCount;
      const start = state.startingEnvelopeValue;
      value = start + (1 - start) * Math.pow(fraction, state.attackCurveFactor);
    } else {
      value = 1;
    }
    state.currentSampleIndex++;
  } else if (state.currentSampleIndex < totalCount) {
    const fraction = (state.currentSampleIndex - attackCount) / state.decaySampleCount;
    value = 1 - Math.pow(fraction, state.decayCurveFactor);
    state.currentSampleIndex++;
  } else {
    state.currentSampleIndex = INDEX_NONE;
    finishedFrames.push(0);
  }

  state.currentEnvelopeValue = value;
  return value;
}

export function isEnvelopeActive(state: EnvelopeState): boolean {
  return state.currentSampleIndex !== INDEX_NONE;
}

/** A run whose index has reached attack + decay is still decaying until the next advance completes it. */
export function getEnvelopePhase(state: EnvelopeState): EnvelopePhase {
  if (state.currentSampleIndex === INDEX_NONE) return "idle";
  return state.currentSampleIndex < state.attackSampleCount ? "attack" : "decay";
}
