// File: src/lib/CommandProcessor.ts
import chalk from 'chalk';
import { v4 as uuidv4 } from 'uuid';
import { CommandInterpreter } from './interpreter/CommandInterpreter';
import { JsonlFile } from './JsonlFile';
import { BatchReport, BatchRunner } from './operations/BatchRunner';
import { parsePlan } from './operations/PlanParser';
import { Plan, ResultCode } from './operations/types';
import { errorMessage } from './utils';

interface HistoryEntryBase { runId: string; timestamp: string; }
interface RequestHistoryEntry extends HistoryEntryBase { type: 'request'; command: string; }
interface PlanHistoryEntry extends HistoryEntryBase { type: 'plan'; plan: Plan; }
interface ResultHistoryEntry extends HistoryEntryBase {
    type: 'result';
    step: number;
    operation: string;
    succeeded: boolean;
    code?: ResultCode;
    message: string;
}
interface ErrorHistoryEntry extends HistoryEntryBase { type: 'error'; error: string; }
export type HistoryEntry = RequestHistoryEntry | PlanHistoryEntry | ResultHistoryEntry | ErrorHistoryEntry;

type DistributiveOmit<T, K extends keyof T> = T extends unknown ? Omit<T, K> : never;
type HistoryEntryData = DistributiveOmit<HistoryEntry, 'runId' | 'timestamp'>;

export type CommandOutcome =
    | { status: 'completed'; runId: string; report: BatchReport }
    | { status: 'rejected'; runId: string; message: string };

/** What an unusable interpreter reply turns into. */
const UNKNOWN_PLAN = { operation: 'unknown', parameters: {} };

/**
 * Front door for one user request: interpret the text, validate the plan
 * shape, run it, and keep a JSONL trail of what happened.
 */
export class CommandProcessor {
    constructor(
        private readonly interpreter: CommandInterpreter,
        private readonly runner: BatchRunner,
        private readonly history?: JsonlFile<HistoryEntry>,
    ) {}

    async processCommand(command: string): Promise<CommandOutcome> {
        const runId = uuidv4();
        await this.record(runId, { type: 'request', command });

        const interpretation = await this.interpreter.interpret(command);
        let raw: unknown = UNKNOWN_PLAN;
        if (interpretation.ok) {
            raw = interpretation.plan;
        } else {
            console.warn(chalk.yellow(`Warning: ${interpretation.reason}`));
            await this.record(runId, { type: 'error', error: interpretation.reason });
        }
        return this.execute(runId, raw);
    }

    /** Runs plan JSON that did not come from the interpreter (e.g. `--plan file.json`). */
    async runPlanData(raw: unknown): Promise<CommandOutcome> {
        return this.execute(uuidv4(), raw);
    }

    private async execute(runId: string, raw: unknown): Promise<CommandOutcome> {
        const parsed = parsePlan(raw);
        if (!parsed.ok) {
            await this.record(runId, { type: 'error', error: parsed.reason });
            return { status: 'rejected', runId, message: parsed.reason };
        }

        await this.record(runId, { type: 'plan', plan: parsed.plan });
        const report = await this.runner.run(parsed.plan);
        for (const { step, operation, result } of report.outcomes) {
            await this.record(runId, {
                type: 'result',
                step,
                operation: operation.kind,
                succeeded: result.succeeded,
                code: result.code,
                message: result.message,
            });
        }
        return { status: 'completed', runId, report };
    }

    private async record(runId: string, entry: HistoryEntryData): Promise<void> {
        if (!this.history) return;
        const logData: HistoryEntry = { ...entry, runId, timestamp: new Date().toISOString() };
        try {
            await this.history.append(logData);
        } catch (err) {
            console.warn(chalk.yellow(`Warning: could not write command history to ${this.history.path}: ${errorMessage(err)}`));
        }
    }
}
