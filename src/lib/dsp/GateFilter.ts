/**
 * Low-pass stage of the gate.
 * Caches the last committed parameters so a static cutoff never pays for a
 * coefficient recompute.
 */

import { StateVariableFilter, type MultiModeFilter } from "./StateVariableFilter";
import type { ProcessContext } from "./types";
import { clamp, isNearlyEqual } from "../safetyClamps";

/** The gate exposes no resonance or band-stop control; both stay at 0. */
const GATE_RESONANCE = 0;
const GATE_BAND_STOP_CONTROL = 0;

export class GateFilter {
  private previousFrequency = -1;
  private previousResonance = -1;
  private previousBandStopControl = -1;
  private readonly nyquist: number;

  constructor(
    ctx: ProcessContext,
    private readonly filter: MultiModeFilter = new StateVariableFilter()
  ) {
    this.nyquist = 0.5 * ctx.sampleRate;
    this.filter.init(ctx.sampleRate, 1);
  }

  /**
   * Push new parameters to the filter if any moved past tolerance.
   * Returns true when a commit happened.
   */
  updateParameters(cutoffHz: number): boolean {
    const frequency = clamp(cutoffHz, 0, this.nyquist);
    const resonance = clamp(GATE_RESONANCE, 0, 10);
    const bandStopControl = clamp(GATE_BAND_STOP_CONTROL, 0, 1);

    const needsUpdate =
      !isNearlyEqual(this.previousFrequency, frequency) ||
      !isNearlyEqual(this.previousResonance, resonance) ||
      !isNearlyEqual(this.previousBandStopControl, bandStopControl);

    if (!needsUpdate) return false;

    this.filter.setQ(resonance);
    this.filter.setFrequency(frequency);
    this.filter.setBandStopControl(bandStopControl);
    this.filter.commit();

    this.previousFrequency = frequency;
    this.previousResonance = resonance;
    this.previousBandStopControl = bandStopControl;
    return true;
  }

  /** Filter numSamples of input into output at cutoffHz (clamped to [0, nyquist]). */
  apply(input: Float32Array, cutoffHz: number, output: Float32Array, numSamples = input.length): void {
    this.updateParameters(cutoffHz);
    this.filter.process(input, numSamples, output);
  }

  /** Last frequency pushed to the filter, or -1 before the first block. */
  get committedFrequency(): number {
    return this.previousFrequency;
  }

  reset(): void {
    this.previousFrequency = -1;
    this.previousResonance = -1;
    this.previousBandStopControl = -1;
    this.filter.reset();
  }
}
