import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { renderGate, scheduleTriggers } from "../OfflineRenderEngine";

const SR = 1000;

function ones(length: number): Float32Array {
  return new Float32Array(length).fill(1);
}

describe("renderGate", () => {
  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("renders a triggered vca envelope block by block", async () => {
    const result = await renderGate(ones(100), {
      sampleRate: SR,
      blockSize: 10,
      params: { mode: "vca", attackTime: 0.001, decayTime: 0.004 },
      triggerTimes: [0],
    });

    expect(result.blockCount).toBe(10);
    expect(Array.from(result.envelope)).toEqual([1, 1, 0.75, 0.5, 0.25, 0, 0, 0, 0, 0]);
    expect(result.attackFrames).toEqual([0]);
    expect(result.doneFrames).toEqual([50]);
    expect(result.audio[15]).toBe(1);
    expect(result.audio[25]).toBe(0.75);
    expect(result.audio[99]).toBe(0);
    expect(result.clampsApplied).toEqual([]);
  });

  it("places a mid-block trigger at its absolute frame", async () => {
    const result = await renderGate(ones(100), {
      sampleRate: SR,
      blockSize: 10,
      params: { mode: "vca", attackTime: 0.001, decayTime: 0.004 },
      triggerTimes: [0.025],
    });

    expect(result.attackFrames).toEqual([25]);
    expect(Array.from(result.envelope.subarray(2, 9))).toEqual([0, 1, 1, 0.75, 0.5, 0.25, 0]);
    expect(result.doneFrames).toEqual([80]);
  });

  it("zero-pads the final partial block", async () => {
    const result = await renderGate(ones(25), {
      sampleRate: SR,
      blockSize: 10,
      params: { mode: "vca", attackTime: 0.001 },
      triggerTimes: [0],
    });

    expect(result.blockCount).toBe(3);
    expect(result.audio).toHaveLength(25);
    expect(result.envelope).toHaveLength(3);
  });

  it("applies automation at the start of the block containing its frame", async () => {
    const result = await renderGate(ones(100), {
      sampleRate: SR,
      blockSize: 10,
      params: { mode: "vca", attackTime: 0.001, decayTime: 0.004 },
      triggerTimes: [0],
      automation: [{ frame: 25, params: { decayTime: 0.002, decayCurve: 0 } }],
    });

    expect(result.envelope[2]).toBeCloseTo(1 - Math.pow(0.5, 1e-4), 10);
    expect(result.doneFrames).toEqual([30]);
    expect(result.clampsApplied).toEqual(["Decay curve clamped from 0 to 0.0001"]);
  });

  it("reports the clamps the gate applies", async () => {
    const result = await renderGate(ones(10), {
      sampleRate: SR,
      blockSize: 10,
      params: { attackCurve: -1, cutoff: 900 },
    });

    expect(result.clampsApplied).toEqual([
      "Attack curve clamped from -1 to 0.0001",
      "Cutoff clamped from 900Hz to 500Hz",
    ]);
  });

  it("drops trigger times outside the signal with a warning", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const result = await renderGate(ones(100), {
      sampleRate: SR,
      blockSize: 10,
      params: { mode: "vca" },
      triggerTimes: [5],
    });

    expect(result.attackFrames).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("reports progress up to completion", async () => {
    const onProgress = vi.fn();
    await renderGate(ones(30), { sampleRate: SR, blockSize: 10, onProgress });

    expect(onProgress).toHaveBeenCalledTimes(3);
    expect(onProgress).toHaveBeenLastCalledWith(1);
  });

  it("rejects with AbortError when cancelled", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      renderGate(ones(30), { sampleRate: SR, blockSize: 10, signal: controller.signal })
    ).rejects.toMatchObject({ name: "AbortError" });
  });

  it("rejects an invalid context", async () => {
    await expect(renderGate(ones(10), { sampleRate: 0 })).rejects.toThrow("createProcessContext");
  });
});

describe("scheduleTriggers", () => {
  it("buckets sorted trigger frames by block", () => {
    const byBlock = scheduleTriggers([0.013, 0.001, 0.012], SR, 10, 100);
    expect(byBlock.get(0)).toEqual([1]);
    expect(byBlock.get(1)).toEqual([2, 3]);
    expect(byBlock.size).toBe(2);
  });
});
