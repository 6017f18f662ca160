/**
 * Task registry. To add a level: (1) write its create*Task factory in this
 * directory, (2) build it in createTaskRegistry() and (3) register it in getTask().
 */

import type { CadEvaluator } from "../../services/evaluation/collaborators";
import type { ReasoningJudge } from "../../services/evaluation/reasoningJudge";
import type { Thresholds } from "../../services/evaluation/types";
import { createLevel1Task, type CodeExecutor } from "./level1Stress";
import { createLevel2Task } from "./level2ShaftDesign";
import { createLevel3Task } from "./level3PlateOptimization";
import type { ScoringTask } from "./taskDefinition";

export type ScoringSettings = {
  thresholds: Thresholds;
  tolerance: number;
  falloff: number;
  sandbox: { timeoutMs: number; memoryMb: number };
  neutralScore: number;
};

export type TaskRegistryDeps = {
  settings: ScoringSettings;
  cadEvaluator?: CadEvaluator;
  reasoningJudge?: ReasoningJudge | null;
  execute?: CodeExecutor;
};

export type TaskRegistry = {
  getTask(level: number): ScoringTask | null;
  listTasks(): ScoringTask[];
};

export function createTaskRegistry(deps: TaskRegistryDeps): TaskRegistry {
  const { settings } = deps;
  const level1 = createLevel1Task({
    tolerance: settings.tolerance,
    falloff: settings.falloff,
    thresholds: settings.thresholds,
    sandbox: settings.sandbox,
    execute: deps.execute,
    reasoningJudge: deps.reasoningJudge
  });
  const level2 = createLevel2Task({
    tolerance: settings.tolerance,
    falloff: settings.falloff,
    thresholds: settings.thresholds,
    reasoningJudge: deps.reasoningJudge
  });
  const level3 = createLevel3Task({
    thresholds: settings.thresholds,
    cadEvaluator: deps.cadEvaluator,
    reasoningJudge: deps.reasoningJudge,
    neutralScore: settings.neutralScore
  });

  return {
    getTask(level) {
      switch (level) {
        case 1:
          return level1;
        case 2:
          return level2;
        case 3:
          return level3;
        default:
          return null;
      }
    },
    listTasks: () => [level1, level2, level3]
  };
}

export { bendingStressPa, LEVEL1_PARAMETERS, summarizeExecution, type CodeExecutor } from "./level1Stress";
export { LEVEL2_PARAMETERS, requiredShaftDiameter, torqueFromPower } from "./level2ShaftDesign";
export { LEVEL3_PARAMETERS, plateChanges } from "./level3PlateOptimization";
export { MATERIAL_YIELD_STRENGTH_PA } from "./materials";
export type { ScoringTask, TaskPrompt } from "./taskDefinition";
