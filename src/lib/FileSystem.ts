// File: src/lib/FileSystem.ts
import fsPromises from 'fs/promises';
import { Dirent, Stats } from 'fs';
import path from 'path';
import chalk from 'chalk';

export interface WalkEntry {
    directory: string;
    name: string;
}

function errnoCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

class FileSystem {

    async readFile(filePath: string): Promise<string | null> {
        try {
            return await fsPromises.readFile(filePath, 'utf-8');
        } catch (error) {
            if (errnoCode(error) === 'ENOENT') {
                return null;
            }
            console.error(chalk.red(`Error reading file ${filePath}:`), error);
            throw error;
        }
    }

    /**
     * Gets file status information.
     * @returns The Stats object, or null if nothing exists at `filePath`.
     */
    async stat(filePath: string): Promise<Stats | null> {
        try {
            return await fsPromises.stat(filePath);
        } catch (error) {
            const code = errnoCode(error);
            if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'ELOOP') return null;
            throw error;
        }
    }

    async exists(filePath: string): Promise<boolean> {
        return (await this.stat(filePath)) !== null;
    }

    async isDirectory(filePath: string): Promise<boolean> {
        return (await this.stat(filePath))?.isDirectory() ?? false;
    }

    /**
     * Ensures the specified directory exists. Used for the config and log directories.
     */
    async ensureDirExists(dir: string): Promise<void> {
        try {
            await fsPromises.access(dir);
        } catch (error) {
            if (errnoCode(error) === 'ENOENT') {
                await fsPromises.mkdir(dir, { recursive: true });
                console.log(chalk.dim(`  Created directory: ${dir}`));
            } else {
                console.error(chalk.red(`Error checking/creating directory ${dir}:`), error);
                throw error;
            }
        }
    }

    /** Creates `dirPath` and any missing parents. */
    async createDirectory(dirPath: string): Promise<void> {
        await fsPromises.mkdir(dirPath, { recursive: true });
    }

    /**
     * Creates a new file. Fails with EEXIST rather than truncating something
     * that appeared after the caller's existence check.
     */
    async createFile(filePath: string, content: string = ''): Promise<void> {
        await fsPromises.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
    }

    async rename(fromPath: string, toPath: string): Promise<void> {
        await fsPromises.rename(fromPath, toPath);
    }

    /**
     * Moves a file or directory. Falls back to copy + remove when the two
     * paths live on different devices.
     */
    async move(fromPath: string, toPath: string): Promise<void> {
        try {
            await fsPromises.rename(fromPath, toPath);
        } catch (error) {
            if (errnoCode(error) !== 'EXDEV') throw error;
            await fsPromises.cp(fromPath, toPath, { recursive: true, errorOnExist: true, force: false });
            await fsPromises.rm(fromPath, { recursive: true, force: true });
        }
    }

    /** Direct children of `dirPath`, sorted by name. */
    async listDirectory(dirPath: string): Promise<Dirent[]> {
        const entries = await fsPromises.readdir(dirPath, { withFileTypes: true });
        return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    }

    /**
     * Whether a listed entry is a regular file. A symlink counts when its
     * target is a file; links to directories and dangling links do not.
     */
    async isFileEntry(directory: string, entry: Dirent): Promise<boolean> {
        if (entry.isFile()) return true;
        if (!entry.isSymbolicLink()) return false;
        return (await this.stat(path.join(directory, entry.name)))?.isFile() ?? false;
    }

    /**
     * Walks the tree below `root` top-down: a directory's files are yielded
     * before anything from its subdirectories, and siblings come in name order.
     * Symlinked directories are not followed. Directories that cannot be read
     * are skipped with a warning.
     */
    async *walkFiles(root: string): AsyncGenerator<WalkEntry> {
        let entries: Dirent[];
        try {
            entries = await this.listDirectory(root);
        } catch (error) {
            const code = errnoCode(error);
            if (code === 'ENOTDIR' || code === 'ENOENT') return;
            if (code === 'EACCES' || code === 'EPERM') {
                console.warn(chalk.yellow(`Skipping unreadable directory ${root} (${code})`));
                return;
            }
            throw error;
        }

        const subdirectories: string[] = [];
        for (const entry of entries) {
            if (entry.isDirectory()) {
                subdirectories.push(path.join(root, entry.name));
            } else if (await this.isFileEntry(root, entry)) {
                yield { directory: root, name: entry.name };
            }
        }
        for (const subdirectory of subdirectories) {
            yield* this.walkFiles(subdirectory);
        }
    }
}

export { FileSystem };
