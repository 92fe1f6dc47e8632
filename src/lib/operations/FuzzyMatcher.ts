// File: src/lib/operations/FuzzyMatcher.ts
import path from 'path';
import { FileSystem } from '../FileSystem';
import { FileMatch } from './types';

export const DEFAULT_MEDIA_EXTENSIONS = [
    '.mp4', '.mkv', '.avi', '.mov', '.wmv', '.flv', '.webm',
    '.m4v', '.mpg', '.mpeg', '.3gp', '.3g2', '.m2ts',
];

const WHOLE_QUERY_POINTS = 50;
const WORD_POINTS = 10;

/**
 * Scores a filename against a query.
 *
 * The whole-query bonus and the per-word bonus are independent, so a filename
 * containing the full query also collects every word again, and a word repeated
 * in the query counts once per repetition. Changing this changes which file
 * gets opened.
 */
export function scoreCandidate(query: string, fileName: string): number {
    const name = fileName.toLowerCase();
    const wanted = query.toLowerCase();

    let score = 0;
    if (name.includes(wanted)) {
        score += WHOLE_QUERY_POINTS;
    }
    for (const word of wanted.split(/\s+/).filter(Boolean)) {
        if (name.includes(word)) {
            score += WORD_POINTS;
        }
    }
    return score;
}

export function hasExtension(fileName: string, extensions: readonly string[]): boolean {
    const name = fileName.toLowerCase();
    return extensions.some(ext => name.endsWith(ext.toLowerCase()));
}

/**
 * Picks the single best-scoring media file in a tree.
 *
 * Ties go to the first candidate in walk order, and the walk visits a
 * directory's files (sorted by name) before its subdirectories (also sorted),
 * so the winner does not depend on how the OS happens to list a directory.
 */
export class FuzzyMatcher {
    constructor(private readonly fs: FileSystem) {}

    async findBest(query: string, rootPath: string, extensions: readonly string[]): Promise<FileMatch | null> {
        let best: FileMatch | null = null;
        for await (const entry of this.fs.walkFiles(rootPath)) {
            if (!hasExtension(entry.name, extensions)) continue;
            const score = scoreCandidate(query, entry.name);
            if (score === 0) continue;
            if (!best || score > best.score) {
                best = { path: path.join(entry.directory, entry.name), score };
            }
        }
        return best;
    }
}
