// File: src/lib/operations/FileOperations.ts
import path from 'path';
import { FileSystem } from '../FileSystem';
import { LocationResolver } from '../locations/LocationResolver';
import { Launcher } from '../launcher/Launcher';
import { errorMessage } from '../utils';
import { BulkMover, BulkMoveProgress } from './BulkMover';
import { FileSearch } from './FileSearch';
import { FuzzyMatcher } from './FuzzyMatcher';
import {
    CreateFileOperation,
    CreateFolderOperation,
    MoveAllOperation,
    MoveOperation,
    OpenLocationOperation,
    PlayBestMatchOperation,
    RenameOperation,
    SearchOperation,
    StepResult,
} from './types';

export interface FileOperationsOptions {
    fs: FileSystem;
    resolver: LocationResolver;
    launcher: Launcher;
    /** The working location relative names are resolved against. */
    currentPath: string;
    /** Root of the media tree `playBestMatch` searches. */
    mediaRoot: string;
    mediaExtensions: readonly string[];
    onBulkProgress?: BulkMoveProgress;
}

function missing(message: string): StepResult {
    return { message, succeeded: false, code: 'MissingArgument' };
}

/**
 * One handler per operation kind. Every handler resolves its own location
 * arguments and reports through a StepResult; none of them throws.
 */
export class FileOperations {
    private readonly fs: FileSystem;
    private readonly resolver: LocationResolver;
    private readonly launcher: Launcher;
    private readonly bulkMover: BulkMover;
    private readonly fileSearch: FileSearch;
    private readonly matcher: FuzzyMatcher;

    constructor(private readonly options: FileOperationsOptions) {
        this.fs = options.fs;
        this.resolver = options.resolver;
        this.launcher = options.launcher;
        this.bulkMover = new BulkMover(options.fs);
        this.fileSearch = new FileSearch(options.fs);
        this.matcher = new FuzzyMatcher(options.fs);
    }

    private resolve(token: string): string {
        return this.resolver.resolve(token, this.options.currentPath);
    }

    async createFolder({ folderName, location }: CreateFolderOperation): Promise<StepResult> {
        const name = folderName.trim();
        if (!name) return missing('No folder name specified.');

        const folderPath = path.join(this.resolve(location), name);
        try {
            if (await this.fs.exists(folderPath)) {
                return { message: `Folder already exists: ${folderPath}`, succeeded: false, code: 'AlreadyExists' };
            }
            await this.fs.createDirectory(folderPath);
            return { message: `Created folder: ${folderPath}`, succeeded: true };
        } catch (error) {
            return { message: `Error creating folder: ${errorMessage(error)}`, succeeded: false, code: 'UnderlyingIOFailure' };
        }
    }

    /** An existing file is left as it is and reported with `AlreadyExists`, but not as a failure. */
    async createFile({ fileName, location, content }: CreateFileOperation): Promise<StepResult> {
        const name = fileName.trim();
        if (!name) return missing('No file name specified.');

        const filePath = path.join(this.resolve(location), name);
        try {
            if (await this.fs.exists(filePath)) {
                return { message: `File already exists: ${filePath}`, succeeded: true, code: 'AlreadyExists' };
            }
            await this.fs.createFile(filePath, content);
            return { message: `Created file: ${filePath}`, succeeded: true };
        } catch (error) {
            return { message: `Error creating file: ${errorMessage(error)}`, succeeded: false, code: 'UnderlyingIOFailure' };
        }
    }

    async renameItem({ oldName, newName, location }: RenameOperation): Promise<StepResult> {
        if (!oldName.trim() || !newName.trim()) return missing('Both the current and the new name are required to rename.');

        const basePath = this.resolve(location);
        const oldPath = path.join(basePath, oldName.trim());
        const newPath = path.join(basePath, newName.trim());
        try {
            if (!(await this.fs.exists(oldPath))) {
                return { message: `Source does not exist: ${oldPath}`, succeeded: false, code: 'SourceMissing' };
            }
            if (await this.fs.exists(newPath)) {
                return { message: `Destination already exists: ${newPath}`, succeeded: false, code: 'DestinationExists' };
            }
            await this.fs.rename(oldPath, newPath);
            return { message: `Renamed from ${oldPath} to ${newPath}`, succeeded: true };
        } catch (error) {
            return { message: `Error renaming item: ${errorMessage(error)}`, succeeded: false, code: 'UnderlyingIOFailure' };
        }
    }

    async moveItem({ source, destination }: MoveOperation): Promise<StepResult> {
        if (!source.trim()) return missing('No source specified to move.');
        if (!destination.trim()) return missing('No destination specified to move.');

        try {
            const sourcePath = this.resolve(source);
            let destPath = this.resolve(destination);

            if (!(await this.fs.exists(sourcePath))) {
                return { message: `Source does not exist: ${sourcePath}`, succeeded: false, code: 'SourceMissing' };
            }
            // Moving onto a directory means moving into it.
            if (await this.fs.isDirectory(destPath)) {
                destPath = path.join(destPath, path.basename(sourcePath));
            }
            if (await this.fs.exists(destPath)) {
                return { message: `Destination already exists: ${destPath}`, succeeded: false, code: 'DestinationExists' };
            }
            await this.fs.move(sourcePath, destPath);
            return { message: `Moved from ${sourcePath} to ${destPath}`, succeeded: true };
        } catch (error) {
            return { message: `Error moving item: ${errorMessage(error)}`, succeeded: false, code: 'UnderlyingIOFailure' };
        }
    }

    async moveAllFiles({ sourceDir, destinationDir }: MoveAllOperation): Promise<StepResult> {
        if (!sourceDir.trim() || !destinationDir.trim()) {
            return missing('Both a source and a destination directory are required.');
        }
        const result = await this.bulkMover.moveAll(
            this.resolve(sourceDir),
            this.resolve(destinationDir),
            this.options.onBulkProgress,
        );
        return { message: result.message, succeeded: result.succeeded, code: result.code };
    }

    async openFileExplorer({ location }: OpenLocationOperation): Promise<StepResult> {
        try {
            const target = this.resolve(location);
            if (!(await this.fs.exists(target))) {
                return { message: `Location does not exist: ${target}`, succeeded: false, code: 'SourceMissing' };
            }
            await this.launcher.openInFileManager(target);
            return { message: `Opened file explorer at: ${target}`, succeeded: true };
        } catch (error) {
            return { message: `Error opening file explorer: ${errorMessage(error)}`, succeeded: false, code: 'UnderlyingIOFailure' };
        }
    }

    async searchFiles({ searchTerm, searchPath }: SearchOperation): Promise<StepResult> {
        return this.fileSearch.search(searchTerm, this.resolve(searchPath));
    }

    async playMovie({ movieName }: PlayBestMatchOperation): Promise<StepResult> {
        if (!movieName.trim()) return missing('No movie name specified.');

        const mediaRoot = this.options.mediaRoot;
        try {
            if (!(await this.fs.isDirectory(mediaRoot))) {
                return { message: `Movies directory does not exist: ${mediaRoot}`, succeeded: false, code: 'SourceMissing' };
            }
            const match = await this.matcher.findBest(movieName, mediaRoot, this.options.mediaExtensions);
            if (!match) {
                return { message: `No movie found with name '${movieName}'`, succeeded: false, code: 'NoMatchFound' };
            }
            await this.launcher.openWithDefaultApplication(match.path);
            return { message: `Playing movie: ${path.basename(match.path)}`, succeeded: true };
        } catch (error) {
            return { message: `Error playing movie: ${errorMessage(error)}`, succeeded: false, code: 'UnderlyingIOFailure' };
        }
    }
}
