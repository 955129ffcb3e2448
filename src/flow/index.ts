/**
 * Flows, steps and their scheduling.
 */

export {
  Flow,
  createFlow,
  type CreateFlowOptions,
  type FlowDescription,
  type FlowInit,
  type FlowRunReport,
} from "./flow.js";
export {
  FlowSettingsSchema,
  StepModeSchema,
  modeKey,
  parseFlowConfig,
  type FlowConfigLayout,
  type FlowSettings,
  type ParsedFlowConfig,
} from "./flow-config.js";
export { MetadataBoard, readMetadata } from "./metadata.js";
export {
  findBlockedTasks,
  pruneExcluded,
  runPhase,
  type PhaseOptions,
  type PhaseReport,
  type PhaseTask,
  type StepOutcome,
} from "./phase-scheduler.js";
export { RecordSlot, collectRecords, createSlots } from "./record-slots.js";
export {
  RESERVED_KEY_PREFIX,
  STEP_MODES,
  bindStepConfig,
  configField,
  definePropagateStep,
  defineRecordStep,
  defineRecordStorage,
  defineUpdateStep,
  describeStepType,
  instantiateStep,
  toBlueprint,
  type ConcurrentPhase,
  type ConfigPrimitive,
  type ConfigShape,
  type PropagateStep,
  type PropagateStepType,
  type RecordStep,
  type RecordStepType,
  type RecordStorage,
  type RecordStorageType,
  type StepBlueprint,
  type StepConfig,
  type StepContext,
  type StepDefinition,
  type StepDescription,
  type StepKind,
  type StepMode,
  type StorageContext,
  type UpdateStep,
  type UpdateStepType,
  type ValidateInfo,
} from "./step.js";
