import { applyPatch } from "./patch-applier";
import type { PatchOptions, PatchResult, OutputSink } from "./types";

// 导出核心模块
export { planReplacements, createEmptyPlan } from "./core/replacement-planner";
export type { Replacement, ReplacementPlan } from "./core/replacement-planner";
export { applyReplacements } from "./core/text-patcher";
export { normalizeConfig, CONFIG_DEFAULTS } from "./core/config-normalizer";
export type { NormalizedPatchOptions } from "./core/config-normalizer";
export {
  createPatchError,
  enhanceError,
  formatError,
  formatErrorLines,
  ErrorCategory,
} from "./core/error-handler";
export type { PatchError } from "./core/error-handler";
export { run, createProgram } from "./cli";

export type { PatchOptions, PatchResult, OutputSink };
export { applyPatch };

export default applyPatch;
