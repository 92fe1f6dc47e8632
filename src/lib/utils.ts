import os from 'os';
import path from 'path';

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** `plural(1, 'file')` -> "1 file", `plural(3, 'file')` -> "3 files" */
export function plural(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Expands a leading `~` and makes relative paths absolute against `baseDir`.
 */
export function expandHome(input: string, homeDir: string = os.homedir(), baseDir: string = homeDir): string {
    const trimmed = input.trim();
    if (trimmed === '~') return homeDir;
    if (trimmed.startsWith('~/') || trimmed.startsWith('~\\')) {
        return path.join(homeDir, trimmed.slice(2));
    }
    return path.isAbsolute(trimmed) ? trimmed : path.resolve(baseDir, trimmed);
}

export function normalizeAliasKey(name: string): string {
    return name.trim().toLowerCase();
}
