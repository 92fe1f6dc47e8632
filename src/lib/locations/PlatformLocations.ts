// File: src/lib/locations/PlatformLocations.ts
import * as fsSync from 'fs';
import path from 'path';
import { LocationSeed } from './AliasTable';

export interface SeedOptions {
    homeDir: string;
    moviesDir: string;
    customAliases?: Record<string, string>;
    platform?: NodeJS.Platform;
    /** Existence probe for volume roots; sync because it runs once at startup. */
    exists?: (candidate: string) => boolean;
}

const DRIVE_LETTERS = 'CDEFGHIJKLMNOPQRSTUVWXYZ';

/**
 * Lists the drive roots that exist right now. Only Windows has more than one.
 */
export function detectVolumes(
    platform: NodeJS.Platform = process.platform,
    exists: (candidate: string) => boolean = fsSync.existsSync,
): string[] {
    if (platform !== 'win32') return [];
    return DRIVE_LETTERS.split('')
        .map(letter => `${letter}:\\`)
        .filter(root => exists(root));
}

export function detectLocationSeed(options: SeedOptions): LocationSeed {
    const platform = options.platform ?? process.platform;
    const pathApi = platform === 'win32' ? path.win32 : path.posix;
    const home = options.homeDir;
    return {
        home,
        desktop: pathApi.join(home, 'Desktop'),
        downloads: pathApi.join(home, 'Downloads'),
        documents: pathApi.join(home, 'Documents'),
        pictures: pathApi.join(home, 'Pictures'),
        music: pathApi.join(home, 'Music'),
        videos: pathApi.join(home, 'Videos'),
        movies: options.moviesDir,
        volumes: detectVolumes(platform, options.exists),
        custom: options.customAliases,
    };
}
