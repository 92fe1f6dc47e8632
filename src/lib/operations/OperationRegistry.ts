// File: src/lib/operations/OperationRegistry.ts
import chalk from 'chalk';
import { errorMessage } from '../utils';
import { FileOperations } from './FileOperations';
import { assertNever, Operation, OPERATION_KINDS, OperationKind, StepResult } from './types';

export interface ParameterSpec {
    name: string;
    required: boolean;
}

type OperationOf<K extends OperationKind> = Extract<Operation, { kind: K }>;

interface OperationDescriptor<K extends OperationKind> {
    summary: string;
    parameters: ParameterSpec[];
    build(read: (name: string) => string): OperationOf<K>;
}

const required = (name: string): ParameterSpec => ({ name, required: true });
const optional = (name: string): ParameterSpec => ({ name, required: false });

/**
 * The fixed catalog: wire name -> parameter schema and how to build the typed operation.
 */
export const OPERATION_CATALOG: { [K in OperationKind]: OperationDescriptor<K> } = {
    create_folder: {
        summary: 'Create a folder (and any missing parents)',
        parameters: [required('folder_name'), optional('location')],
        build: read => ({ kind: 'create_folder', folderName: read('folder_name'), location: read('location') }),
    },
    create_file: {
        summary: 'Create a file, optionally with content',
        parameters: [required('file_name'), optional('location'), optional('content')],
        build: read => ({ kind: 'create_file', fileName: read('file_name'), location: read('location'), content: read('content') }),
    },
    rename_item: {
        summary: 'Rename a file or folder in place',
        parameters: [required('old_name'), required('new_name'), optional('location')],
        build: read => ({ kind: 'rename_item', oldName: read('old_name'), newName: read('new_name'), location: read('location') }),
    },
    move_item: {
        summary: 'Move a file or folder; a folder destination means "into"',
        parameters: [required('source'), required('destination')],
        build: read => ({ kind: 'move_item', source: read('source'), destination: read('destination') }),
    },
    move_all_files: {
        summary: 'Move every file (not subfolders) from one folder to another',
        parameters: [required('source_dir'), required('destination_dir')],
        build: read => ({ kind: 'move_all_files', sourceDir: read('source_dir'), destinationDir: read('destination_dir') }),
    },
    open_file_explorer: {
        summary: 'Open the file manager at a location',
        parameters: [optional('location')],
        build: read => ({ kind: 'open_file_explorer', location: read('location') }),
    },
    search_files: {
        summary: 'Find up to 10 files whose name contains a term',
        parameters: [required('search_term'), optional('search_path')],
        build: read => ({ kind: 'search_files', searchTerm: read('search_term'), searchPath: read('search_path') }),
    },
    play_movie: {
        summary: 'Play the best-matching video from the movies folder',
        parameters: [required('movie_name')],
        build: read => ({ kind: 'play_movie', movieName: read('movie_name') }),
    },
};

export function isOperationKind(value: unknown): value is OperationKind {
    return typeof value === 'string' && OPERATION_KINDS.some(kind => kind === value);
}

function parameterValue(params: Record<string, unknown>, name: string): string {
    const value = params[name];
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return '';
}

/**
 * Builds the typed operation for a wire-level kind and parameter bag.
 * Unknown kinds come back as the `unrecognized` variant; nothing here throws.
 */
export function buildOperation(kind: unknown, params: unknown): Operation {
    if (!isOperationKind(kind)) {
        return { kind: 'unrecognized', requested: typeof kind === 'string' ? kind : '' };
    }
    const bag: Record<string, unknown> =
        typeof params === 'object' && params !== null && !Array.isArray(params) ? { ...params } : {};
    return OPERATION_CATALOG[kind].build(name => parameterValue(bag, name));
}

export const UNRECOGNIZED_MESSAGE = "Sorry, I couldn't understand that command. Please try again.";

export class OperationRegistry {
    constructor(private readonly handlers: FileOperations) {}

    /** Wire-level entry point: kind name plus raw parameters. */
    async execute(kind: string, params: Record<string, unknown>): Promise<StepResult> {
        return this.dispatch(buildOperation(kind, params));
    }

    async dispatch(operation: Operation): Promise<StepResult> {
        try {
            return await this.route(operation);
        } catch (error) {
            // Handlers report their own failures; reaching this is a bug, but the caller still gets a result.
            console.error(chalk.red(`Unexpected failure in '${operation.kind}' handler:`), error);
            return { message: `Error running ${operation.kind}: ${errorMessage(error)}`, succeeded: false, code: 'UnderlyingIOFailure' };
        }
    }

    private async route(operation: Operation): Promise<StepResult> {
        switch (operation.kind) {
            case 'create_folder': return this.handlers.createFolder(operation);
            case 'create_file': return this.handlers.createFile(operation);
            case 'rename_item': return this.handlers.renameItem(operation);
            case 'move_item': return this.handlers.moveItem(operation);
            case 'move_all_files': return this.handlers.moveAllFiles(operation);
            case 'open_file_explorer': return this.handlers.openFileExplorer(operation);
            case 'search_files': return this.handlers.searchFiles(operation);
            case 'play_movie': return this.handlers.playMovie(operation);
            case 'unrecognized': return { message: UNRECOGNIZED_MESSAGE, succeeded: false, code: 'UnrecognizedOperation' };
            default: return assertNever(operation);
        }
    }
}
