// File: src/lib/operations/BatchRunner.ts
import { OperationRegistry } from './OperationRegistry';
import { planSteps } from './PlanParser';
import { Operation, Plan, StepResult } from './types';

export interface StepOutcome {
    /** 1-based position in the plan. */
    step: number;
    operation: Operation;
    result: StepResult;
}

export interface BatchReport {
    mode: Plan['mode'];
    outcomes: StepOutcome[];
    allSucceeded: boolean;
}

/**
 * Runs a plan's steps one after another. A failed step never stops the run:
 * every step gets exactly one outcome, in plan order.
 */
export class BatchRunner {
    constructor(private readonly registry: OperationRegistry) {}

    async run(plan: Plan): Promise<BatchReport> {
        const outcomes: StepOutcome[] = [];
        for (const [i, operation] of planSteps(plan).entries()) {
            const step = i + 1;
            const result = await this.registry.dispatch(operation);
            outcomes.push({ step, operation, result });
        }
        return {
            mode: plan.mode,
            outcomes,
            allSucceeded: outcomes.every(outcome => outcome.result.succeeded),
        };
    }
}
