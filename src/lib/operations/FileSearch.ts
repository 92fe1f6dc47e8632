// File: src/lib/operations/FileSearch.ts
import { FileSystem } from '../FileSystem';
import { errorMessage, plural } from '../utils';
import { SearchRow, StepResult } from './types';

export const MAX_SEARCH_RESULTS = 10;

/**
 * Case-insensitive filename search below `basePath`. The walk stops at the
 * `limit`-th hit, so files further along the traversal are never seen.
 */
export class FileSearch {
    constructor(
        private readonly fs: FileSystem,
        private readonly limit: number = MAX_SEARCH_RESULTS,
    ) {}

    async search(term: string, basePath: string): Promise<StepResult> {
        if (!term) {
            return { message: 'No search term specified.', succeeded: false, code: 'MissingArgument' };
        }

        try {
            if (!(await this.fs.exists(basePath))) {
                return { message: `Search location does not exist: ${basePath}`, succeeded: false, code: 'SourceMissing' };
            }

            const needle = term.toLowerCase();
            const rows: SearchRow[] = [];
            for await (const entry of this.fs.walkFiles(basePath)) {
                if (!entry.name.toLowerCase().includes(needle)) continue;
                rows.push({ index: rows.length + 1, fileName: entry.name, directory: entry.directory });
                if (rows.length >= this.limit) break;
            }

            if (rows.length === 0) {
                return {
                    message: `No files found containing '${term}' in ${basePath}`,
                    succeeded: true,
                    code: 'NoFilesFound',
                    rows,
                };
            }
            return {
                message: `Found ${plural(rows.length, 'file')} containing '${term}'`,
                succeeded: true,
                rows,
            };
        } catch (error) {
            return { message: `Error searching files: ${errorMessage(error)}`, succeeded: false, code: 'UnderlyingIOFailure' };
        }
    }
}
