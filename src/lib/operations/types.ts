// File: src/lib/operations/types.ts

// Wire names the interpreter uses for each operation.
export const OPERATION_KINDS = [
    'create_folder',
    'create_file',
    'rename_item',
    'move_item',
    'move_all_files',
    'open_file_explorer',
    'search_files',
    'play_movie',
] as const;

export type OperationKind = typeof OPERATION_KINDS[number];

export interface CreateFolderOperation { kind: 'create_folder'; folderName: string; location: string; }
export interface CreateFileOperation { kind: 'create_file'; fileName: string; location: string; content: string; }
export interface RenameOperation { kind: 'rename_item'; oldName: string; newName: string; location: string; }
export interface MoveOperation { kind: 'move_item'; source: string; destination: string; }
export interface MoveAllOperation { kind: 'move_all_files'; sourceDir: string; destinationDir: string; }
export interface OpenLocationOperation { kind: 'open_file_explorer'; location: string; }
export interface SearchOperation { kind: 'search_files'; searchTerm: string; searchPath: string; }
export interface PlayBestMatchOperation { kind: 'play_movie'; movieName: string; }

/** Anything the interpreter asked for that is not in the catalog. */
export interface UnrecognizedOperation { kind: 'unrecognized'; requested: string; }

export type Operation =
    | CreateFolderOperation
    | CreateFileOperation
    | RenameOperation
    | MoveOperation
    | MoveAllOperation
    | OpenLocationOperation
    | SearchOperation
    | PlayBestMatchOperation
    | UnrecognizedOperation;

export type Plan =
    | { mode: 'single'; operation: Operation }
    | { mode: 'sequence'; operations: Operation[] };

export type ResultCode =
    | 'SourceMissing'
    | 'DestinationExists'
    | 'NotADirectory'
    | 'AlreadyExists'
    | 'NoMatchFound'
    | 'NoFilesFound'
    | 'UnrecognizedOperation'
    | 'UnderlyingIOFailure'
    | 'MissingArgument';

/** One row of a search listing. `index` starts at 1. */
export interface SearchRow {
    index: number;
    fileName: string;
    directory: string;
}

export interface StepResult {
    message: string;
    succeeded: boolean;
    /** Set whenever the outcome is anything but a plain success. */
    code?: ResultCode;
    rows?: SearchRow[];
}

export interface FileMatch {
    path: string;
    score: number;
}

export function assertNever(value: never): never {
    throw new Error(`Unhandled operation variant: ${JSON.stringify(value)}`);
}
