export { LowPassGate, type LowPassGateOptions } from "./lib/dsp/plugins/LowPassGate";
export { GateFilter } from "./lib/dsp/GateFilter";
export { StateVariableFilter, type FilterType, type MultiModeFilter } from "./lib/dsp/StateVariableFilter";
export { TriggerStream, type FrameRangeCallback } from "./lib/dsp/TriggerStream";
export { ExponentialEase } from "./lib/dsp/ExponentialEase";
export {
  INDEX_NONE,
  advanceEnvelope,
  createEnvelopeState,
  getEnvelopePhase,
  isEnvelopeActive,
  resetEnvelopeState,
  retriggerEnvelope,
  updateEnvelopeParams,
  type EnvelopePhase,
  type EnvelopeState,
  type EnvelopeTiming,
} from "./lib/dsp/envelope";
export {
  renderGate,
  scheduleTriggers,
  type AutomationEvent,
  type GateRenderOptions,
  type GateRenderResult,
} from "./lib/dsp/OfflineRenderEngine";
export {
  LOW_PASS_GATE_DEFAULTS,
  LOW_PASS_GATE_MODES,
  createProcessContext,
  modeFromIndex,
  type GateBlockInput,
  type GateBlockOutput,
  type LowPassGateMode,
  type LowPassGateParams,
  type ProcessContext,
} from "./lib/dsp/types";
export { describeParamClamps } from "./lib/safetyClamps";
export { clearTimings, getTimings, type TimingSummary } from "./lib/perfTimer";
