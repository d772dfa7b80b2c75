/**
 * Workflow Planner
 *
 * Derives step dependencies from output mappings and groups steps into
 * stages. Stages keep declared order: a step joins the current stage
 * unless it consumes a placeholder produced within it, in which case a
 * new stage starts.
 *
 * @module agent-orchestrator/engine/planner
 */

import type { AgentDescriptor, WorkflowDescriptor } from '../catalog/types.js';
import { collectPlaceholders, isBuiltinPlaceholder } from './templates.js';

export interface StepPlan {
  /** 1-based position */
  position: number;
  agent: AgentDescriptor;
  /** 0-based stage */
  stage: number;
  /** Non-built-in placeholders the step uses */
  consumes: string[];
  /** Placeholders mapped to this step's output */
  produces: string[];
  /** Positions of the earlier steps producing what this step consumes */
  dependsOn: number[];
}

/**
 * Plan the steps of a workflow
 *
 * @example
 * ```typescript
 * // steps: transcribe -> ocr -> summarize, summarize uses both outputs
 * planWorkflow(workflow).map((plan) => plan.stage); // [0, 0, 1]
 * ```
 */
export function planWorkflow(workflow: WorkflowDescriptor): StepPlan[] {
  const producerOf = new Map<string, number>();
  workflow.steps.forEach((step, index) => {
    for (const placeholder of workflow.outputMappings[step.name] ?? []) {
      if (!producerOf.has(placeholder)) {
        producerOf.set(placeholder, index + 1);
      }
    }
  });

  const plans: StepPlan[] = [];
  let currentStage = 0;

  workflow.steps.forEach((agent, index) => {
    const position = index + 1;
    const consumes = collectPlaceholders(agent.arguments, agent.environmentVariables).filter(
      (name) => !isBuiltinPlaceholder(name),
    );
    const dependsOn = Array.from(
      new Set(
        consumes
          .map((name) => producerOf.get(name))
          .filter((producer): producer is number => producer !== undefined && producer < position),
      ),
    ).sort((a, b) => a - b);

    const latestDependency = Math.max(-1, ...dependsOn.map((dep) => plans[dep - 1]?.stage ?? -1));
    const stage = index === 0 ? 0 : Math.max(currentStage, latestDependency + 1);
    currentStage = stage;

    plans.push({
      position,
      agent,
      stage,
      consumes,
      produces: [...(workflow.outputMappings[agent.name] ?? [])],
      dependsOn,
    });
  });

  return plans;
}

/**
 * Group planned steps by stage, in stage order
 */
export function groupStages(plans: readonly StepPlan[]): StepPlan[][] {
  const stages: StepPlan[][] = [];
  for (const plan of plans) {
    const stage = stages[plan.stage] ?? [];
    stage.push(plan);
    stages[plan.stage] = stage;
  }
  return stages.filter((stage) => stage.length > 0);
}

/**
 * Placeholders an agent uses that have no value
 */
export function findUnresolvedPlaceholders(
  agent: AgentDescriptor,
  values: Readonly<Record<string, string>>,
): string[] {
  return collectPlaceholders(agent.arguments, agent.environmentVariables).filter(
    (name) => !Object.prototype.hasOwnProperty.call(values, name),
  );
}
