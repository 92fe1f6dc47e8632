// File: src/lib/operations/BulkMover.ts
import path from 'path';
import { FileSystem } from '../FileSystem';
import { errorMessage, plural } from '../utils';
import { StepResult } from './types';

export interface BulkMoveResult extends StepResult {
    moved: number;
    skipped: number;
}

/** Called once per file after it has been moved or skipped. */
export type BulkMoveProgress = (done: number, total: number, fileName: string) => void;

/**
 * Moves every regular file directly inside one directory into another.
 * Subdirectories are left alone; a file whose name is already taken in the
 * destination is skipped and both copies stay untouched.
 */
export class BulkMover {
    constructor(private readonly fs: FileSystem) {}

    async moveAll(sourcePath: string, destPath: string, onProgress?: BulkMoveProgress): Promise<BulkMoveResult> {
        let moved = 0;
        let skipped = 0;
        try {
            const sourceStats = await this.fs.stat(sourcePath);
            if (!sourceStats) {
                return this.failure(`Source directory does not exist: ${sourcePath}`, 'SourceMissing');
            }
            if (!sourceStats.isDirectory()) {
                return this.failure(`Source is not a directory: ${sourcePath}`, 'NotADirectory');
            }

            const destStats = await this.fs.stat(destPath);
            if (!destStats) {
                return this.failure(`Destination directory does not exist: ${destPath}`, 'NotADirectory');
            }
            if (!destStats.isDirectory()) {
                return this.failure(`Destination is not a directory: ${destPath}`, 'NotADirectory');
            }

            const files: string[] = [];
            for (const entry of await this.fs.listDirectory(sourcePath)) {
                if (await this.fs.isFileEntry(sourcePath, entry)) files.push(entry.name);
            }

            if (files.length === 0) {
                return {
                    message: `No files found in the source directory: ${sourcePath}`,
                    succeeded: true,
                    code: 'NoFilesFound',
                    moved: 0,
                    skipped: 0,
                };
            }

            for (const [i, file] of files.entries()) {
                const target = path.join(destPath, file);
                if (await this.fs.exists(target)) {
                    skipped++;
                } else {
                    await this.fs.move(path.join(sourcePath, file), target);
                    moved++;
                }
                onProgress?.(i + 1, files.length, file);
            }

            let message = `Moved ${plural(moved, 'file')} from ${sourcePath} to ${destPath}`;
            if (skipped > 0) {
                message += `\nSkipped ${plural(skipped, 'file')} already present in the destination.`;
            }
            return { message, succeeded: true, moved, skipped };
        } catch (error) {
            // Files moved before the fault stay moved.
            const progress = moved + skipped > 0
                ? ` after moving ${plural(moved, 'file')} and skipping ${skipped}`
                : '';
            return {
                message: `Error moving files${progress}: ${errorMessage(error)}`,
                succeeded: false,
                code: 'UnderlyingIOFailure',
                moved,
                skipped,
            };
        }
    }

    private failure(message: string, code: BulkMoveResult['code']): BulkMoveResult {
        return { message, succeeded: false, code, moved: 0, skipped: 0 };
    }
}
