// File: src/lib/operations/PlanParser.ts
import { buildOperation } from './OperationRegistry';
import { Operation, Plan } from './types';

export const NO_VALID_OPERATIONS = 'No valid operations found in the command.';

export type PlanParseResult =
    | { ok: true; plan: Plan }
    | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Loose truthiness for model output: `"true"` and `1` count, `0`, `""`, `[]` and `{}` do not. */
function isSet(value: unknown): boolean {
    if (Array.isArray(value)) return value.length > 0;
    if (isRecord(value)) return Object.keys(value).length > 0;
    return Boolean(value);
}

function toOperation(entry: unknown): Operation {
    if (!isRecord(entry)) {
        return { kind: 'unrecognized', requested: '' };
    }
    return buildOperation(entry.operation, entry.parameters);
}

/**
 * Reads the interpreter's JSON into a Plan. Accepts
 * `{ operation, parameters }` or `{ has_multiple_operations: true, operations: [...] }`, where any truthy flag selects a sequence.
 * Anything else that is not a usable sequence becomes a single unrecognized step.
 */
export function parsePlan(raw: unknown): PlanParseResult {
    if (!isRecord(raw)) {
        return { ok: true, plan: { mode: 'single', operation: toOperation(raw) } };
    }

    if (isSet(raw.has_multiple_operations)) {
        const operations = raw.operations;
        if (!Array.isArray(operations) || operations.length === 0) {
            return { ok: false, reason: NO_VALID_OPERATIONS };
        }
        return { ok: true, plan: { mode: 'sequence', operations: operations.map(toOperation) } };
    }

    return { ok: true, plan: { mode: 'single', operation: toOperation(raw) } };
}

export function planSteps(plan: Plan): Operation[] {
    return plan.mode === 'single' ? [plan.operation] : plan.operations;
}
