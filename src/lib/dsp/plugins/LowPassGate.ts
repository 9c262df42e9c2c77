/**
 * Low-pass gate: an attack/decay envelope and a low-pass filter combined
 * per block in one of three modes.
 *
 * - lowPass: filter only; the envelope is left untouched
 * - vca:     audio scaled by the block's envelope value
 * - both:    audio scaled by envelope × cutoff control, then filtered
 *
 * The envelope runs at block rate: one value per sub-range between trigger
 * edges, broadcast across the block's frames.
 */

import { Plugin } from "../Plugin";
import { GateFilter } from "../GateFilter";
import { TriggerStream } from "../TriggerStream";
import type { MultiModeFilter } from "../StateVariableFilter";
import {
  LOW_PASS_GATE_DEFAULTS,
  type GateBlockInput,
  type GateBlockOutput,
  type LowPassGateParams,
  type ProcessContext,
} from "../types";
import {
  advanceEnvelope,
  createEnvelopeState,
  resetEnvelopeState,
  retriggerEnvelope,
  updateEnvelopeParams,
  type EnvelopeState,
} from "../envelope";
import { CUTOFF_CONTROL_MAX, mapRangeClamped } from "../../safetyClamps";

export interface LowPassGateOptions {
  /** Start every attack from 0 rather than the current envelope level */
  hardReset?: boolean;
  /** Replacement for the default state variable filter */
  filter?: MultiModeFilter;
}

export class LowPassGate extends Plugin<LowPassGateParams, GateBlockInput, GateBlockOutput> {
  private readonly envelopeState: EnvelopeState;
  private readonly filter: GateFilter;
  private readonly triggerIn: TriggerStream;
  private readonly onAttack: TriggerStream;
  private readonly onDone: TriggerStream;
  private readonly finishedFrames: number[] = [];
  /** Pre-gain buffer for both mode, sized once to the block */
  private readonly scratch: Float32Array;
  private readonly output: GateBlockOutput;
  /** cutoff read as a 0-1 gain, for both mode */
  private cutoffGain = 0;

  constructor(
    ctx: ProcessContext,
    params: Partial<LowPassGateParams> = {},
    options: LowPassGateOptions = {}
  ) {
    super(ctx, { ...LOW_PASS_GATE_DEFAULTS, ...params });
    this.envelopeState = createEnvelopeState(options.hardReset ?? false);
    this.filter = new GateFilter(ctx, options.filter);
    this.triggerIn = new TriggerStream(ctx.blockSize);
    this.onAttack = new TriggerStream(ctx.blockSize);
    this.onDone = new TriggerStream(ctx.blockSize);
    this.scratch = new Float32Array(ctx.blockSize);
    this.output = {
      onAttack: this.onAttack.frames,
      onDone: this.onDone.frames,
      envelope: 0,
      audio: new Float32Array(ctx.blockSize),
    };
    this.onConfigure();
  }

  protected onConfigure(): void {
    this.cutoffGain = mapRangeClamped(this.params.cutoff, 0, CUTOFF_CONTROL_MAX, 0, 1);
  }

  get envelope(): Readonly<EnvelopeState> {
    return this.envelopeState;
  }

  reset(): void {
    resetEnvelopeState(this.envelopeState);
    this.filter.reset();
    this.triggerIn.advanceBlock();
    this.onAttack.advanceBlock();
    this.onDone.advanceBlock();
    this.output.envelope = 0;
    this.output.audio.fill(0);
    this.scratch.fill(0);
  }

  process(input: GateBlockInput): GateBlockOutput {
    const numSamples = Math.min(input.audio.length, this.ctx.blockSize);
    const audioIn = input.audio;
    const audioOut = this.output.audio;

    this.triggerIn.load(input.trigger);

    switch (this.params.mode) {
      case "lowPass": {
        this.onAttack.advanceBlock();
        this.onDone.advanceBlock();
        this.filter.apply(audioIn, this.params.cutoff, audioOut, numSamples);
        break;
      }
      case "vca": {
        this.calculateEnvelope();
        const gain = this.output.envelope;
        for (let i = 0; i < numSamples; i++) {
          audioOut[i] = audioIn[i] * gain;
        }
        break;
      }
      case "both": {
        this.calculateEnvelope();
        // The cutoff both scales the gain (as a 0-20000 control) and sets the filter frequency.
        const gateEnvelope = this.output.envelope * this.cutoffGain;
        for (let i = 0; i < numSamples; i++) {
          this.scratch[i] = audioIn[i] * gateEnvelope;
        }
        this.filter.apply(this.scratch, this.params.cutoff, audioOut, numSamples);
        break;
      }
    }

    if (numSamples < this.ctx.blockSize) audioOut.fill(0, numSamples);

    return this.output;
  }

  private calculateEnvelope(): void {
    this.onAttack.advanceBlock();
    this.onDone.advanceBlock();
    this.refreshEnvelopeParams();
    this.triggerIn.executeBlock(this.handlePreTrigger, this.handleTrigger);
  }

  private refreshEnvelopeParams(): void {
    updateEnvelopeParams(this.envelopeState, this.params, this.ctx.sampleRate);
  }

  private advance(startFrame: number, endFrame: number): void {
    this.finishedFrames.length = 0;
    this.output.envelope = advanceEnvelope(this.envelopeState, startFrame, endFrame, this.finishedFrames);
    for (const frame of this.finishedFrames) {
      this.onDone.triggerFrame(startFrame + frame);
    }
  }

  private readonly handlePreTrigger = (startFrame: number, endFrame: number): void => {
    this.advance(startFrame, endFrame);
  };

  private readonly handleTrigger = (startFrame: number, endFrame: number): void => {
    // Controls may have moved since the block started
    this.refreshEnvelopeParams();
    retriggerEnvelope(this.envelopeState);
    this.advance(startFrame, endFrame);
    this.onAttack.triggerFrame(startFrame);
  };
}
