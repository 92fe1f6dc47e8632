// File: src/lib/UserInterface.ts
import inquirer from 'inquirer';
import chalk from 'chalk';
import { BatchReport, StepOutcome } from './operations/BatchRunner';
import { SearchRow } from './operations/types';
import { CommandOutcome } from './CommandProcessor';

export const EXIT_WORDS: readonly string[] = ['exit', 'quit'];

const HELP_EXAMPLES = [
    'Create folder reports on Desktop',
    'Move document.txt from Downloads to Documents',
    'Open file explorer in drive D',
    'Play movie Inception',
    'Search for budget files in Documents',
    'Rename folder old_stuff to archive',
];

/** Lays out search hits as a `#  File Name  Path` table. */
export function formatSearchTable(term: string, rows: readonly SearchRow[]): string[] {
    const headers = ['#', 'File Name', 'Path'];
    const cells = rows.map(row => [String(row.index), row.fileName, row.directory]);
    const widths = headers.map((header, col) =>
        Math.max(header.length, ...cells.map(cell => cell[col].length)));
    const line = (values: string[]) =>
        values.map((value, col) => (col === values.length - 1 ? value : value.padEnd(widths[col]))).join('  ');

    return [
        `Search Results for '${term}'`,
        line(headers),
        ...cells.map(line),
    ];
}

/** The text printed for one outcome: `Result:` for single plans, `Step i:` for sequences. */
export function formatOutcome(mode: BatchReport['mode'], outcome: StepOutcome): string {
    const label = mode === 'single' ? 'Result:' : `Step ${outcome.step}:`;
    return `${label} ${outcome.result.message}`;
}

export function helpText(): string {
    return [
        'File Commander',
        '',
        'A natural language file management tool that lets you control your files and folders using everyday language.',
        '',
        'Example commands:',
        ...HELP_EXAMPLES.map(example => `- ${example}`),
    ].join('\n');
}

/**
 * Console rendering and prompts for the CLI.
 */
class UserInterface {
    displayHeader(): void {
        console.log(chalk.bold.blue('File Commander') + chalk.dim(' - Natural Language File Management'));
    }

    displayCommand(command: string): void {
        console.log(`${chalk.bold.cyan('Command:')} ${command}`);
    }

    displayHelp(): void {
        console.log(chalk.green(helpText()));
    }

    displayBulkProgress(done: number, total: number, fileName: string): void {
        console.log(chalk.dim(`  [${done}/${total}] ${fileName}`));
    }

    displayOutcome(outcome: CommandOutcome): void {
        if (outcome.status === 'rejected') {
            console.log(chalk.bold.yellow(outcome.message));
            return;
        }
        const { report } = outcome;
        for (const stepOutcome of report.outcomes) {
            const text = formatOutcome(report.mode, stepOutcome);
            console.log(stepOutcome.result.succeeded ? chalk.green(text) : chalk.red(text));
            const rows = stepOutcome.result.rows;
            if (rows && rows.length > 0 && stepOutcome.operation.kind === 'search_files') {
                const [title, header, ...body] = formatSearchTable(stepOutcome.operation.searchTerm, rows);
                console.log(chalk.bold(title));
                console.log(chalk.cyan(header));
                body.forEach(row => console.log(row));
            }
        }
    }

    /** Reads the next command; `null` ends the session. */
    async promptCommand(): Promise<string | null> {
        const { command } = await inquirer.prompt<{ command: string }>([
            {
                type: 'input',
                name: 'command',
                message: 'fcmd>',
                filter: (input: string) => input.trim(),
            },
        ]);
        if (!command || EXIT_WORDS.includes(command.toLowerCase())) {
            return null;
        }
        return command;
    }
}

export { UserInterface };
