/**
 * Renders a whole mono signal through a LowPassGate,
 * block by block, as a host would deliver it.
 *
 * Trigger times are given in seconds and land on the block/frame that
 * contains them. Parameter automation applies at the start of the block
 * containing its frame. Time-budgeted yielding (8ms) keeps long renders
 * from starving the event loop.
 */

import { LowPassGate, type LowPassGateOptions } from "./plugins/LowPassGate";
import { createProcessContext, type LowPassGateParams } from "./types";
import { describeParamClamps } from "../safetyClamps";
import { startTimer } from "../perfTimer";

/** Default block length for offline render */
const DEFAULT_BLOCK_SIZE = 256;

/** Time budget per JS task before yielding (ms) */
const YIELD_BUDGET_MS = 8;

export interface AutomationEvent {
  /** Absolute frame the change takes effect from (applied at its block's start) */
  frame: number;
  params: Partial<LowPassGateParams>;
}

export interface GateRenderOptions extends LowPassGateOptions {
  sampleRate: number;
  blockSize?: number;
  params?: Partial<LowPassGateParams>;
  /** Attack trigger times in seconds */
  triggerTimes?: readonly number[];
  automation?: readonly AutomationEvent[];
  onProgress?: (pct: number) => void;
  signal?: AbortSignal;
}

export interface GateRenderResult {
  audio: Float32Array;
  /** Envelope output after each block */
  envelope: Float32Array;
  /** Absolute frames of attack-started events */
  attackFrames: number[];
  /** Absolute frames of envelope-done events */
  doneFrames: number[];
  blockCount: number;
  clampsApplied: string[];
}

/**
 * Bucket trigger times into per-block frame lists.
 * Times outside the signal are dropped with a warning.
 */
export function scheduleTriggers(
  triggerTimes: readonly number[],
  sampleRate: number,
  blockSize: number,
  length: number
): Map<number, number[]> {
  const byBlock = new Map<number, number[]>();
  const frames = triggerTimes
    .map((t) => Math.round(t * sampleRate))
    .sort((a, b) => a - b);

  for (const frame of frames) {
    if (!(frame >= 0 && frame < length)) {
      console.warn(`[OfflineRenderEngine] Dropping trigger at frame ${frame} outside signal of ${length} frames.`);
      continue;
    }
    const block = Math.floor(frame / blockSize);
    const list = byBlock.get(block);
    if (list) list.push(frame - block * blockSize);
    else byBlock.set(block, [frame - block * blockSize]);
  }
  return byBlock;
}

export async function renderGate(
  input: Float32Array,
  options: GateRenderOptions
): Promise<GateRenderResult> {
  const ctx = createProcessContext(options.sampleRate, options.blockSize ?? DEFAULT_BLOCK_SIZE);
  const { sampleRate, blockSize } = ctx;
  const endTimer = startTimer("renderGate");
  const length = input.length;
  const blockCount = Math.ceil(length / blockSize);

  const gate = new LowPassGate(ctx, options.params, {
    hardReset: options.hardReset,
    filter: options.filter,
  });

  const triggers = scheduleTriggers(options.triggerTimes ?? [], sampleRate, blockSize, length);
  const automation = [...(options.automation ?? [])].sort((a, b) => a.frame - b.frame);
  let nextAutomation = 0;

  const clampSet = new Set(describeParamClamps(gate.getParams(), sampleRate));

  const audio = new Float32Array(length);
  const envelope = new Float32Array(blockCount);
  const attackFrames: number[] = [];
  const doneFrames: number[] = [];
  const blockIn = new Float32Array(blockSize);
  const noTriggers: number[] = [];

  let lastYield = performance.now();

  for (let block = 0; block < blockCount; block++) {
    if (options.signal?.aborted) {
      endTimer();
      throw new DOMException("Render cancelled", "AbortError");
    }

    const offset = block * blockSize;
    const end = Math.min(offset + blockSize, length);

    // Apply every automation event that falls before this block ends
    let changed = false;
    while (nextAutomation < automation.length && automation[nextAutomation].frame < end) {
      gate.configure(automation[nextAutomation].params);
      nextAutomation++;
      changed = true;
    }
    if (changed) {
      for (const msg of describeParamClamps(gate.getParams(), sampleRate)) clampSet.add(msg);
    }

    // Zero-pad the final partial block
    blockIn.fill(0);
    blockIn.set(input.subarray(offset, end));

    const out = gate.process({ trigger: triggers.get(block) ?? noTriggers, audio: blockIn });

    audio.set(out.audio.subarray(0, end - offset), offset);
    envelope[block] = out.envelope;
    for (const frame of out.onAttack) attackFrames.push(offset + frame);
    for (const frame of out.onDone) doneFrames.push(offset + frame);

    if (options.onProgress) options.onProgress(end / length);

    // Yield only when time budget exceeded
    const now = performance.now();
    if (now - lastYield > YIELD_BUDGET_MS) {
      await yieldToEventLoop();
      lastYield = performance.now();
    }
  }

  endTimer();
  return {
    audio,
    envelope,
    attackFrames,
    doneFrames,
    blockCount,
    clampsApplied: [...clampSet],
  };
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
