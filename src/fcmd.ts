#!/usr/bin/env node
// src/fcmd.ts
import * as fsSync from 'fs'; // Startup scaffolding is synchronous
import path from 'path';
import os from 'os';
import chalk from 'chalk';
import { DEFAULT_CONFIG_YAML } from './lib/config_defaults';
import { Config, ConfigOptions } from './lib/Config';
import { FileSystem } from './lib/FileSystem';
import { JsonlFile } from './lib/JsonlFile';
import { AIClient } from './lib/AIClient';
import { CommandProcessor, CommandOutcome, HistoryEntry } from './lib/CommandProcessor';
import { CommandInterpreter } from './lib/interpreter/CommandInterpreter';
import { LlmCommandInterpreter } from './lib/interpreter/LlmCommandInterpreter';
import { DesktopLauncher, Launcher } from './lib/launcher/Launcher';
import { AliasTable } from './lib/locations/AliasTable';
import { LocationResolver } from './lib/locations/LocationResolver';
import { detectLocationSeed } from './lib/locations/PlatformLocations';
import { BatchRunner } from './lib/operations/BatchRunner';
import { FileOperations } from './lib/operations/FileOperations';
import { OperationRegistry } from './lib/operations/OperationRegistry';
import { UserInterface } from './lib/UserInterface';
import { errorMessage } from './lib/utils';

/** Writes a default config.yaml on first run. Never fatal. */
export function ensureConfigScaffold(configDir: string): void {
    const configPath = path.join(configDir, 'config.yaml');
    if (fsSync.existsSync(configPath)) {
        return;
    }
    try {
        fsSync.mkdirSync(configDir, { recursive: true });
        fsSync.writeFileSync(configPath, DEFAULT_CONFIG_YAML, 'utf8');
        console.log(chalk.dim(`Created default config at ${configPath}`));
    } catch (writeError) {
        console.warn(chalk.yellow(`Warning: could not create default config at ${configPath}: ${errorMessage(writeError)}`));
    }
}

export interface AppDependencies {
    config: Config;
    ui: UserInterface;
    /** Built lazily: `--plan` runs never need an interpreter. */
    createInterpreter?: (config: Config) => CommandInterpreter;
    launcher?: Launcher;
    fs?: FileSystem;
    homeDir?: string;
}

/**
 * Wires the operation stack from configuration. The interpreter is only
 * constructed when a natural-language command needs it.
 */
export class FileCommanderApp {
    private readonly config: Config;
    private readonly ui: UserInterface;
    private readonly fs: FileSystem;
    private readonly runner: BatchRunner;
    private readonly history: JsonlFile<HistoryEntry>;
    private readonly createInterpreter: (config: Config) => CommandInterpreter;
    private processor: CommandProcessor | null = null;

    constructor(deps: AppDependencies) {
        this.config = deps.config;
        this.ui = deps.ui;
        this.fs = deps.fs ?? new FileSystem();
        this.createInterpreter = deps.createInterpreter ?? ((config) => new LlmCommandInterpreter(new AIClient(config)));

        const { locations, playback } = this.config;
        const aliases = AliasTable.fromSeed(detectLocationSeed({
            homeDir: deps.homeDir ?? os.homedir(),
            moviesDir: locations.movies_dir,
            customAliases: locations.aliases,
        }));
        const operations = new FileOperations({
            fs: this.fs,
            resolver: new LocationResolver(aliases),
            launcher: deps.launcher ?? new DesktopLauncher(),
            currentPath: locations.start_dir,
            mediaRoot: locations.movies_dir,
            mediaExtensions: playback.media_extensions,
            onBulkProgress: process.stdout.isTTY
                ? (done, total, fileName) => this.ui.displayBulkProgress(done, total, fileName)
                : undefined,
        });
        this.runner = new BatchRunner(new OperationRegistry(operations));
        this.history = new JsonlFile<HistoryEntry>(this.fs, this.config.logging.history_file);
    }

    private getProcessor(): CommandProcessor {
        if (!this.processor) {
            this.processor = new CommandProcessor(this.createInterpreter(this.config), this.runner, this.history);
        }
        return this.processor;
    }

    async runCommand(command: string): Promise<boolean> {
        this.ui.displayCommand(command);
        const outcome = await this.getProcessor().processCommand(command);
        return this.report(outcome);
    }

    async runPlanFile(planPath: string): Promise<boolean> {
        const content = await this.fs.readFile(path.resolve(planPath));
        if (content === null) {
            console.error(chalk.red(`Plan file not found: ${planPath}`));
            return false;
        }
        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (parseError) {
            console.error(chalk.red(`Plan file is not valid JSON: ${errorMessage(parseError)}`));
            return false;
        }
        const processor = new CommandProcessor(
            { interpret: async () => ({ ok: false, reason: 'No interpreter for plan files.' }) },
            this.runner,
            this.history,
        );
        return this.report(await processor.runPlanData(raw));
    }

    async runInteractive(): Promise<boolean> {
        this.ui.displayHelp();
        let allSucceeded = true;
        for (;;) {
            const command = await this.ui.promptCommand();
            if (command === null) break;
            allSucceeded = (await this.runCommand(command)) && allSucceeded;
        }
        return allSucceeded;
    }

    private report(outcome: CommandOutcome): boolean {
        this.ui.displayOutcome(outcome);
        return outcome.status === 'completed' && outcome.report.allSucceeded;
    }
}

export async function main(argv: string[], configOptions: ConfigOptions = {}): Promise<number> {
    const ui = new UserInterface();
    const [first, ...rest] = argv;

    if (first === 'help' || first === '--help' || first === '-h') {
        ui.displayHelp();
        return 0;
    }

    const config = new Config(configOptions);
    ensureConfigScaffold(config.configDir);
    ui.displayHeader();

    const app = new FileCommanderApp({ config, ui });

    if (first === '--plan') {
        if (!rest[0]) {
            console.error(chalk.red('Usage: fcmd --plan <file.json>'));
            return 1;
        }
        return (await app.runPlanFile(rest[0])) ? 0 : 1;
    }

    if (!config.interpreter.api_key) {
        console.error(chalk.red(`${config.apiKeyVariable()} is not set. Export it to use the ${config.interpreter.provider} interpreter.`));
        return 1;
    }

    if (argv.length === 0) {
        return (await app.runInteractive()) ? 0 : 1;
    }
    return (await app.runCommand(argv.join(' '))) ? 0 : 1;
}

if (require.main === module) {
    main(process.argv.slice(2))
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error(chalk.red('Fatal error:'), errorMessage(error));
            process.exitCode = 1;
        });
}
