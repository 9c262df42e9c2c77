import { describe, it, expect } from "vitest";
import {
  INDEX_NONE,
  advanceEnvelope,
  createEnvelopeState,
  getEnvelopePhase,
  isEnvelopeActive,
  resetEnvelopeState,
  retriggerEnvelope,
  updateEnvelopeParams,
  type EnvelopeState,
} from "../envelope";
import { KINDA_SMALL_NUMBER, MAX_SAMPLE_COUNT } from "@/lib/safetyClamps";

function makeState(attack: number, decay: number, attackCurve = 1, decayCurve = 1, hardReset = false): EnvelopeState {
  const state = createEnvelopeState(hardReset);
  state.attackSampleCount = attack;
  state.decaySampleCount = decay;
  state.attackCurveFactor = attackCurve;
  state.decayCurveFactor = decayCurve;
  return state;
}

/** Advance n times from frame 0, collecting values and finished frames. */
function run(state: EnvelopeState, n: number): { values: number[]; finished: number[] } {
  const values: number[] = [];
  const finished: number[] = [];
  for (let i = 0; i < n; i++) values.push(advanceEnvelope(state, 0, 64, finished));
  return { values, finished };
}

describe("advanceEnvelope", () => {
  it("jumps straight to 1.0 when the attack is a single sample", () => {
    const state = makeState(1, 4);
    retriggerEnvelope(state);
    const finished: number[] = [];
    expect(advanceEnvelope(state, 0, 64, finished)).toBe(1);
    expect(state.currentSampleIndex).toBe(1);
    expect(getEnvelopePhase(state)).toBe("decay");
    expect(finished).toHaveLength(0);
  });

  it("ramps linearly up then down with unit curves", () => {
    const state = makeState(4, 4);
    retriggerEnvelope(state);
    const { values, finished } = run(state, 9);
    const expected = [0, 0.25, 0.5, 0.75, 1, 0.75, 0.5, 0.25, 0];
    values.forEach((v, i) => expect(v).toBeCloseTo(expected[i], 10));
    expect(finished).toEqual([0]);
    expect(state.currentSampleIndex).toBe(INDEX_NONE);
  });

  it("decays as 1 - f with a linear decay curve", () => {
    const state = makeState(1, 10);
    retriggerEnvelope(state);
    const { values } = run(state, 11);
    for (let j = 0; j < 10; j++) {
      expect(values[j + 1]).toBeCloseTo(1 - j / 10, 10);
    }
  });

  it("is a no-op returning 0 when idle and started mid-block", () => {
    const state = makeState(4, 4);
    const finished: number[] = [];
    expect(advanceEnvelope(state, 5, 10, finished)).toBe(0);
    expect(state.currentSampleIndex).toBe(INDEX_NONE);
    expect(finished).toHaveLength(0);
  });

  it("does not move an active run when started mid-block", () => {
    const state = makeState(4, 4);
    retriggerEnvelope(state);
    run(state, 2);
    const finished: number[] = [];
    expect(advanceEnvelope(state, 3, 8, finished)).toBe(0);
    expect(state.currentSampleIndex).toBe(2);
  });

  it.each([
    [1, 1],
    [3, 5],
    [7, 2],
    [16, 16],
  ])("completes exactly once for attack %i / decay %i", (attack, decay) => {
    const state = makeState(attack, decay);
    retriggerEnvelope(state);
    const { finished } = run(state, attack + decay);
    expect(finished).toHaveLength(0);
    expect(isEnvelopeActive(state)).toBe(true);

    const last: number[] = [];
    expect(advanceEnvelope(state, 0, 64, last)).toBe(0);
    expect(last).toEqual([0]);
    expect(isEnvelopeActive(state)).toBe(false);
  });

  it("retriggers mid-decay from the current level", () => {
    const state = makeState(4, 4);
    retriggerEnvelope(state);
    const { values } = run(state, 6);
    expect(values[5]).toBeCloseTo(0.75, 10);

    retriggerEnvelope(state);
    expect(state.startingEnvelopeValue).toBeCloseTo(0.75, 10);
    expect(state.ease.getValue()).toBeCloseTo(0.75, 10);

    const [first, second] = run(state, 2).values;
    expect(first).toBeGreaterThanOrEqual(0.75);
    expect(first).toBeCloseTo(0.75, 10);
    expect(second).toBeCloseTo(0.8125, 10);
  });

  it("restarts from zero with hard reset", () => {
    const state = makeState(4, 4, 1, 1, true);
    retriggerEnvelope(state);
    run(state, 6);

    retriggerEnvelope(state);
    expect(state.startingEnvelopeValue).toBe(0);
    expect(run(state, 1).values[0]).toBe(0);
  });

  it("shapes each phase with its curve factor", () => {
    const attack = makeState(4, 4, 2, 1);
    retriggerEnvelope(attack);
    expect(run(attack, 3).values[2]).toBeCloseTo(0.25, 10);

    const slowDecay = makeState(1, 4, 1, 2);
    retriggerEnvelope(slowDecay);
    expect(run(slowDecay, 4).values[3]).toBeCloseTo(0.75, 10);

    const fastDecay = makeState(1, 4, 1, 0.5);
    retriggerEnvelope(fastDecay);
    expect(run(fastDecay, 4).values[3]).toBeCloseTo(1 - Math.SQRT1_2, 10);
  });
});

describe("updateEnvelopeParams", () => {
  it("derives sample counts from seconds", () => {
    const state = createEnvelopeState();
    updateEnvelopeParams(state, { attackTime: 0.01, decayTime: 1, attackCurve: 1, decayCurve: 1 }, 48000);
    expect(state.attackSampleCount).toBe(480);
    expect(state.decaySampleCount).toBe(48000);
  });

  it("floors degenerate times to one sample", () => {
    const state = createEnvelopeState();
    updateEnvelopeParams(state, { attackTime: 0, decayTime: -2, attackCurve: 1, decayCurve: 1 }, 48000);
    expect(state.attackSampleCount).toBe(1);
    expect(state.decaySampleCount).toBe(1);

    updateEnvelopeParams(state, { attackTime: NaN, decayTime: Infinity, attackCurve: 1, decayCurve: 1 }, 48000);
    expect(state.attackSampleCount).toBe(1);
    expect(state.decaySampleCount).toBe(MAX_SAMPLE_COUNT);
  });

  it("clamps non-positive curves to epsilon and keeps output finite", () => {
    const state = createEnvelopeState();
    updateEnvelopeParams(state, { attackTime: 4 / 48000, decayTime: 4 / 48000, attackCurve: 0, decayCurve: -3 }, 48000);
    expect(state.attackCurveFactor).toBe(KINDA_SMALL_NUMBER);
    expect(state.decayCurveFactor).toBe(KINDA_SMALL_NUMBER);

    retriggerEnvelope(state);
    const { values } = run(state, 9);
    for (const v of values) expect(Number.isFinite(v)).toBe(true);
  });
});

describe("envelope phases", () => {
  it("reports exactly one phase at each point of a run", () => {
    const state = makeState(2, 2);
    expect(getEnvelopePhase(state)).toBe("idle");
    retriggerEnvelope(state);
    const phases = [getEnvelopePhase(state)];
    for (let i = 0; i < 5; i++) {
      advanceEnvelope(state, 0, 64, []);
      phases.push(getEnvelopePhase(state));
    }
    expect(phases).toEqual(["attack", "attack", "decay", "decay", "decay", "idle"]);
  });

  it("resets to idle but keeps hard reset configuration", () => {
    const state = makeState(2, 2, 1, 1, true);
    retriggerEnvelope(state);
    run(state, 2);
    resetEnvelopeState(state);
    expect(state.currentSampleIndex).toBe(INDEX_NONE);
    expect(state.currentEnvelopeValue).toBe(0);
    expect(state.hardReset).toBe(true);
  });
});
