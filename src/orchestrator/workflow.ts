/**
 * Workflow definition checks
 *
 * A valid workflow has unique non-blank step ids, only known dependencies
 * and no cycles. Violations throw WorkflowDefinitionError before any step
 * is submitted.
 */

import type { Workflow, WorkflowStep } from '@/types/index.js';
import { WorkflowDefinitionError } from '@/types/index.js';

/**
 * Validate a workflow and return its steps in a dependency-respecting order
 * (ties keep declaration order)
 */
export function validateWorkflow(workflow: Workflow): WorkflowStep[] {
  if (!workflow.name || !workflow.name.trim()) {
    throw new WorkflowDefinitionError('Workflow name is required');
  }
  if (!Array.isArray(workflow.steps) || workflow.steps.length === 0) {
    throw new WorkflowDefinitionError(
      `Workflow ${workflow.name} has no steps`,
      { workflow: workflow.name }
    );
  }

  const byId = new Map<string, WorkflowStep>();
  for (const step of workflow.steps) {
    const id = typeof step.id === 'string' ? step.id : '';
    if (!id.trim()) {
      throw new WorkflowDefinitionError('Every step needs an id', {
        workflow: workflow.name,
      });
    }
    if (byId.has(id)) {
      throw new WorkflowDefinitionError(`Duplicate step id: ${id}`, {
        workflow: workflow.name,
        stepId: id,
      });
    }
    if (!step.type || !step.type.trim()) {
      throw new WorkflowDefinitionError(`Step ${id} has no task type`, {
        stepId: id,
      });
    }
    if (!step.capability || !step.capability.trim()) {
      throw new WorkflowDefinitionError(`Step ${id} has no capability`, {
        stepId: id,
      });
    }
    byId.set(id, step);
  }

  for (const step of workflow.steps) {
    for (const dependency of step.dependsOn ?? []) {
      if (dependency === step.id) {
        throw new WorkflowDefinitionError(`Step ${step.id} depends on itself`, {
          stepId: step.id,
        });
      }
      if (!byId.has(dependency)) {
        throw new WorkflowDefinitionError(
          `Step ${step.id} depends on unknown step ${dependency}`,
          { stepId: step.id, dependency }
        );
      }
    }
  }

  // Kahn's algorithm, picking ready steps in declaration order
  const remaining = new Map<string, number>();
  for (const step of workflow.steps) {
    remaining.set(step.id, new Set(step.dependsOn ?? []).size);
  }
  const ordered: WorkflowStep[] = [];
  const done = new Set<string>();

  while (ordered.length < workflow.steps.length) {
    const ready = workflow.steps.find(
      (step) => !done.has(step.id) && remaining.get(step.id) === 0
    );
    if (!ready) {
      const blocked = workflow.steps
        .filter((step) => !done.has(step.id))
        .map((step) => step.id);
      throw new WorkflowDefinitionError(
        `Workflow ${workflow.name} contains a dependency cycle`,
        { workflow: workflow.name, steps: blocked }
      );
    }
    ordered.push(ready);
    done.add(ready.id);
    for (const step of workflow.steps) {
      if (!done.has(step.id) && (step.dependsOn ?? []).includes(ready.id)) {
        remaining.set(step.id, (remaining.get(step.id) ?? 0) - 1);
      }
    }
  }

  return ordered;
}
