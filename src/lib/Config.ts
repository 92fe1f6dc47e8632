// File: src/lib/Config.ts
import * as fsSync from 'fs'; // Config is read once, synchronously, at startup
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import chalk from 'chalk';
import { DEFAULT_MEDIA_EXTENSIONS } from './operations/FuzzyMatcher';
import { expandHome } from './utils';

// --- Interfaces ---

export type InterpreterProvider = 'openrouter' | 'openai' | 'gemini';

const PROVIDERS: readonly InterpreterProvider[] = ['openrouter', 'openai', 'gemini'];

interface InterpreterConfig {
    provider: InterpreterProvider;
    api_key: string; // Loaded from ENV, empty when unset
    model_name: string;
    base_url?: string; // Only used by OpenAI-compatible providers
    temperature: number;
    max_retries: number;
    retry_base_delay_ms: number;
}

interface LocationsConfig {
    start_dir: string; // Absolute
    movies_dir: string; // Absolute
    aliases: Record<string, string>; // Absolute targets
}

interface PlaybackConfig {
    media_extensions: string[]; // Lower-case, with leading dot
}

interface LoggingConfig {
    history_file: string; // Absolute
    verbose: boolean;
}

// Raw sections as loaded from YAML; every field is checked before use
type YamlConfigData = {
    interpreter?: Record<string, unknown>;
    locations?: Record<string, unknown>;
    playback?: Record<string, unknown>;
    logging?: Record<string, unknown>;
};

export interface ConfigOptions {
    /** Directory holding config.yaml and logs. Defaults to $FCMD_HOME or ~/.fcmd */
    configDir?: string;
    env?: NodeJS.ProcessEnv;
    homeDir?: string;
    platform?: NodeJS.Platform;
}

const DEFAULT_MODELS: Record<InterpreterProvider, string> = {
    openrouter: 'deepseek/deepseek-r1',
    openai: 'gpt-4o-mini',
    gemini: 'gemini-2.0-flash',
};

const API_KEY_VARIABLES: Record<InterpreterProvider, string> = {
    openrouter: 'OPENROUTER_API_KEY',
    openai: 'OPENAI_API_KEY',
    gemini: 'GEMINI_API_KEY',
};

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isProvider(value: unknown): value is InterpreterProvider {
    return typeof value === 'string' && PROVIDERS.some(provider => provider === value);
}

function asString(value: unknown): string | undefined {
    return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function asNumber(value: unknown): number | undefined {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : undefined;
}

function normalizeExtension(ext: string): string {
    const lower = ext.trim().toLowerCase();
    return lower.startsWith('.') ? lower : `.${lower}`;
}

// --- Config Class ---
class ConfigLoader {
    interpreter: InterpreterConfig;
    locations: LocationsConfig;
    playback: PlaybackConfig;
    logging: LoggingConfig;
    readonly configDir: string;
    private configFilePath: string;

    constructor(options: ConfigOptions = {}) {
        const env = options.env ?? process.env;
        const homeDir = options.homeDir ?? os.homedir();
        const platform = options.platform ?? process.platform;

        this.configDir = options.configDir ?? (env.FCMD_HOME ? expandHome(env.FCMD_HOME, homeDir) : path.join(homeDir, '.fcmd'));
        this.configFilePath = path.join(this.configDir, 'config.yaml');

        const yamlConfig = this.loadYaml();

        // 1. Interpreter: provider from YAML, key from ENV
        const rawProvider = yamlConfig.interpreter?.provider;
        let provider: InterpreterProvider = 'openrouter';
        if (rawProvider !== undefined) {
            if (isProvider(rawProvider)) {
                provider = rawProvider;
            } else {
                console.warn(chalk.yellow(`Warning: unknown interpreter provider '${String(rawProvider)}'. Using 'openrouter'.`));
            }
        }
        this.interpreter = {
            provider,
            api_key: env[API_KEY_VARIABLES[provider]] ?? '',
            model_name: asString(yamlConfig.interpreter?.model_name) ?? DEFAULT_MODELS[provider],
            base_url: asString(yamlConfig.interpreter?.base_url) ?? (provider === 'openrouter' ? OPENROUTER_BASE_URL : undefined),
            temperature: asNumber(yamlConfig.interpreter?.temperature) ?? 0,
            max_retries: asNumber(yamlConfig.interpreter?.max_retries) ?? 2,
            retry_base_delay_ms: asNumber(yamlConfig.interpreter?.retry_base_delay_ms) ?? 1000,
        };

        // 2. Locations
        const defaultMovies = platform === 'win32' ? 'D:\\Movies' : path.join(homeDir, 'Movies');
        const startDir = asString(yamlConfig.locations?.start_dir);
        const moviesDir = asString(yamlConfig.locations?.movies_dir);
        const aliases: Record<string, string> = {};
        const rawAliases = yamlConfig.locations?.aliases;
        if (isRecord(rawAliases)) {
            for (const [name, target] of Object.entries(rawAliases)) {
                const targetPath = asString(target);
                if (targetPath) {
                    aliases[name] = expandHome(targetPath, homeDir);
                } else {
                    console.warn(chalk.yellow(`Warning: ignoring alias '${name}' with no target path.`));
                }
            }
        }
        this.locations = {
            start_dir: startDir ? expandHome(startDir, homeDir) : homeDir,
            movies_dir: moviesDir ? expandHome(moviesDir, homeDir) : defaultMovies,
            aliases,
        };

        // 3. Playback
        const rawExtensions = yamlConfig.playback?.media_extensions;
        const extensions = Array.isArray(rawExtensions)
            ? rawExtensions.filter((ext): ext is string => typeof ext === 'string' && ext.trim() !== '').map(normalizeExtension)
            : [];
        this.playback = {
            media_extensions: extensions.length > 0 ? extensions : [...DEFAULT_MEDIA_EXTENSIONS],
        };

        // 4. Logging
        const historyFile = asString(yamlConfig.logging?.history_file);
        this.logging = {
            history_file: historyFile ? expandHome(historyFile, homeDir) : path.join(this.configDir, 'logs', 'history.jsonl'),
            verbose: yamlConfig.logging?.verbose === true,
        };
    }

    private loadYaml(): YamlConfigData {
        try {
            if (!fsSync.existsSync(this.configFilePath)) {
                return {};
            }
            const loaded = yaml.load(fsSync.readFileSync(this.configFilePath, 'utf8'));
            if (loaded === undefined || loaded === null) {
                return {};
            }
            if (!isRecord(loaded)) {
                console.warn(chalk.yellow(`Warning: config.yaml at ${this.configFilePath} is not a mapping. Using defaults.`));
                return {};
            }
            const sections: YamlConfigData = {};
            if (isRecord(loaded.interpreter)) sections.interpreter = loaded.interpreter;
            if (isRecord(loaded.locations)) sections.locations = loaded.locations;
            if (isRecord(loaded.playback)) sections.playback = loaded.playback;
            if (isRecord(loaded.logging)) sections.logging = loaded.logging;
            return sections;
        } catch (e) {
            console.error(chalk.red(`Error loading or parsing config.yaml at ${this.configFilePath}:`), e instanceof Error ? e.message : e);
            console.warn(chalk.yellow('Continuing with default configuration...'));
            return {};
        }
    }

    /** Name of the environment variable the current provider reads its key from. */
    apiKeyVariable(): string {
        return API_KEY_VARIABLES[this.interpreter.provider];
    }

    public getConfigFilePath(): string {
        return this.configFilePath;
    }
}

export { ConfigLoader as Config };
export type { InterpreterConfig, LocationsConfig, PlaybackConfig, LoggingConfig };
