/**
 * Core DSP type definitions for the low-pass gate.
 * The processor, the filter wrapper and the offline renderer share these types.
 */

// ── Operating modes (index order matches host integer enums) ──────
export const LOW_PASS_GATE_MODES = ["lowPass", "vca", "both"] as const;

export type LowPassGateMode = (typeof LOW_PASS_GATE_MODES)[number];

/** Map a host enum index (0 = lowPass, 1 = vca, 2 = both) onto the mode union. */
export function modeFromIndex(index: number): LowPassGateMode {
  return LOW_PASS_GATE_MODES[index] ?? "lowPass";
}

// ── Processing context, fixed for a processor's lifetime ──────────
export interface ProcessContext {
  sampleRate: number;
  blockSize: number;
}

/**
 * Factory for ProcessContext with validation.
 * - Throws on a non-finite or non-positive sample rate
 * - Throws on a non-integer or non-positive block size
 */
export function createProcessContext(sampleRate: number, blockSize: number): ProcessContext {
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new Error(`createProcessContext: invalid sample rate ${sampleRate}`);
  }
  if (!Number.isInteger(blockSize) || blockSize <= 0) {
    throw new Error(`createProcessContext: invalid block size ${blockSize}`);
  }
  return { sampleRate, blockSize };
}

// ── Control parameters ────────────────────────────────────────────

export interface LowPassGateParams {
  attackTime: number; // seconds
  decayTime: number; // seconds
  /** 1.0 = linear growth, <1.0 = logarithmic growth, >1.0 = exponential growth */
  attackCurve: number;
  /**
   * 1.0 = linear decay, <1.0 = exponential decay, >1.0 = logarithmic decay.
   * Note the naming runs opposite to attackCurve: a factor above 1 holds the
   * level up longer before falling away.
   */
  decayCurve: number;
  /** Hz in lowPass mode; in both mode also read as a 0-20000 gain control */
  cutoff: number;
  mode: LowPassGateMode;
}

export const LOW_PASS_GATE_DEFAULTS: Readonly<LowPassGateParams> = {
  attackTime: 0.01,
  decayTime: 1.0,
  attackCurve: 1.0,
  decayCurve: 1.0,
  cutoff: 1000.0,
  mode: "lowPass",
};

// ── Per-block I/O ─────────────────────────────────────────────────

export interface GateBlockInput {
  /** Attack trigger frames within [0, blockSize), strictly increasing */
  trigger: readonly number[];
  audio: Float32Array;
}

/**
 * Block result. The processor reuses this object and its arrays, so read
 * it before the next process() call.
 */
export interface GateBlockOutput {
  onAttack: readonly number[];
  onDone: readonly number[];
  envelope: number;
  audio: Float32Array;
}
