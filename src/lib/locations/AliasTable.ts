// File: src/lib/locations/AliasTable.ts
import { normalizeAliasKey } from '../utils';

/**
 * Well-known directories of the current machine. Built once at startup by
 * `detectLocationSeed` (or by hand in tests) and never re-queried.
 */
export interface LocationSeed {
    home: string;
    desktop: string;
    downloads: string;
    documents: string;
    pictures: string;
    music: string;
    videos: string;
    movies: string;
    /** Existing volume roots, e.g. `C:\`. Empty on single-root platforms. */
    volumes: string[];
    /** User-defined aliases from config; these win over the built-ins. */
    custom?: Record<string, string>;
}

const SPELLING_VARIANTS: ReadonlyArray<[string, keyof Omit<LocationSeed, 'volumes' | 'custom'>]> = [
    ['docs', 'documents'],
    ['my documents', 'documents'],
    ['my desktop', 'desktop'],
    ['my downloads', 'downloads'],
    ['pics', 'pictures'],
    ['photos', 'pictures'],
];

/**
 * Immutable mapping from a lower-cased location name to an absolute path.
 */
export class AliasTable {
    private readonly entries: ReadonlyMap<string, string>;
    private readonly volumeRoots: ReadonlyMap<string, string>;

    private constructor(entries: Map<string, string>, volumeRoots: Map<string, string>) {
        this.entries = entries;
        this.volumeRoots = volumeRoots;
        Object.freeze(this);
    }

    static fromSeed(seed: LocationSeed): AliasTable {
        const entries = new Map<string, string>();
        const volumeRoots = new Map<string, string>();

        const wellKnown = ['home', 'desktop', 'downloads', 'documents', 'pictures', 'music', 'videos', 'movies'] as const;
        for (const name of wellKnown) {
            entries.set(name, seed[name]);
        }
        for (const [variant, target] of SPELLING_VARIANTS) {
            entries.set(variant, seed[target]);
        }

        for (const root of seed.volumes) {
            const letter = root.charAt(0).toLowerCase();
            if (!/^[a-z]$/.test(letter)) continue;
            volumeRoots.set(letter, root);
            for (const key of [`drive_${letter}`, `${letter}_drive`, letter, `drive ${letter}`]) {
                entries.set(key, root);
            }
        }

        for (const [name, target] of Object.entries(seed.custom ?? {})) {
            const key = normalizeAliasKey(name);
            if (key) entries.set(key, target);
        }

        return new AliasTable(entries, volumeRoots);
    }

    /** Looks up a location name; case and surrounding whitespace are ignored. */
    get(name: string): string | undefined {
        return this.entries.get(normalizeAliasKey(name));
    }

    /** Root of the volume with this drive letter, if it was present at startup. */
    volumeRoot(letter: string): string | undefined {
        return this.volumeRoots.get(letter.toLowerCase());
    }

    names(): string[] {
        return [...this.entries.keys()].sort();
    }
}
