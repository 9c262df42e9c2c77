/**
 * Topology-preserving-transform (TPT) state variable filter.
 * Multi-mode: low-pass, high-pass, band-pass and band-stop from the same
 * integrator pair. Parameter setters stage values; commit() applies them.
 */

export type FilterType = "lowPass" | "highPass" | "bandPass" | "bandStop";

/** The capability surface GateFilter drives. Any filter satisfying it can stand in. */
export interface MultiModeFilter {
  init(sampleRate: number, numChannels: number): void;
  setFrequency(frequencyHz: number): void;
  setQ(q: number): void;
  setBandStopControl(control: number): void;
  /** Apply staged parameter changes (recomputes coefficients) */
  commit(): void;
  /** Filter numSamples interleaved samples from input into output */
  process(input: Float32Array, numSamples: number, output: Float32Array): void;
  /** Clear internal signal state, keeping parameters */
  reset(): void;
}

const MIN_Q = 0.5;
const MAX_Q = 10;
/** Highest usable cutoff as a fraction of the sample rate */
const MAX_FREQ_RATIO = 0.49;

export class StateVariableFilter implements MultiModeFilter {
  private sampleRate = 48000;
  private numChannels = 1;

  // Staged parameters
  private frequencyHz = 1000;
  private q = MIN_Q;
  private bandStopControl = 0;

  // Committed coefficients
  private g = 0;
  private k = 2;
  private a1 = 1;
  private a2 = 0;
  private a3 = 0;
  private lowWeight = 1;
  private highWeight = 0;

  // Integrator state per channel
  private ic1eq = new Float64Array(1);
  private ic2eq = new Float64Array(1);

  constructor(private filterType: FilterType = "lowPass") {}

  init(sampleRate: number, numChannels: number): void {
    this.sampleRate = sampleRate;
    this.numChannels = Math.max(1, Math.floor(numChannels));
    this.ic1eq = new Float64Array(this.numChannels);
    this.ic2eq = new Float64Array(this.numChannels);
    this.commit();
  }

  setFilterType(filterType: FilterType): void {
    this.filterType = filterType;
  }

  setFrequency(frequencyHz: number): void {
    this.frequencyHz = frequencyHz;
  }

  setQ(q: number): void {
    this.q = q;
  }

  setBandStopControl(control: number): void {
    this.bandStopControl = control;
  }

  commit(): void {
    const maxFreq = this.sampleRate * MAX_FREQ_RATIO;
    const freq = this.frequencyHz > 0 ? Math.min(this.frequencyHz, maxFreq) : 0;
    const q = this.q > MIN_Q ? Math.min(this.q, MAX_Q) : MIN_Q;
    const control = this.bandStopControl > 0 ? Math.min(this.bandStopControl, 1) : 0;

    this.g = Math.tan((Math.PI * freq) / this.sampleRate);
    this.k = 1 / q;
    this.a1 = 1 / (1 + this.g * (this.g + this.k));
    this.a2 = this.g * this.a1;
    this.a3 = this.g * this.a2;

    // 0 = low side only, 0.5 = low + high (notch), 1 = high side only
    this.lowWeight = Math.min(1, 2 * (1 - control));
    this.highWeight = Math.min(1, 2 * control);

    // With g = 0 the integrators never move again; drop what they hold so 0 Hz is silent
    if (this.g === 0) this.reset();
  }

  reset(): void {
    this.ic1eq.fill(0);
    this.ic2eq.fill(0);
  }

  process(input: Float32Array, numSamples: number, output: Float32Array): void {
    const channels = this.numChannels;
    for (let i = 0; i < numSamples; i++) {
      const ch = i % channels;
      const v0 = input[i];
      const ic1 = this.ic1eq[ch];
      const ic2 = this.ic2eq[ch];

      const v3 = v0 - ic2;
      const v1 = this.a1 * ic1 + this.a2 * v3;
      const v2 = ic2 + this.a2 * ic1 + this.a3 * v3;
      this.ic1eq[ch] = 2 * v1 - ic1;
      this.ic2eq[ch] = 2 * v2 - ic2;

      const low = v2;
      const band = v1;
      const high = v0 - this.k * v1 - v2;

      switch (this.filterType) {
        case "lowPass": output[i] = low; break;
        case "highPass": output[i] = high; break;
        case "bandPass": output[i] = band; break;
        case "bandStop": output[i] = this.lowWeight * low + this.highWeight * high; break;
      }
    }
  }
}
