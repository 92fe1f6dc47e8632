import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileSystem } from '../../FileSystem';
import { Launcher } from '../../launcher/Launcher';
import { AliasTable } from '../../locations/AliasTable';
import { LocationResolver } from '../../locations/LocationResolver';
import { FileOperations } from '../FileOperations';
import { buildOperation, isOperationKind, OPERATION_CATALOG, OperationRegistry, UNRECOGNIZED_MESSAGE } from '../OperationRegistry';
import { OPERATION_KINDS } from '../types';

const noopLauncher: Launcher = {
  openInFileManager: async () => {},
  openWithDefaultApplication: async () => {},
};

function makeOperations(home: string): FileOperations {
  const aliases = AliasTable.fromSeed({
    home,
    desktop: path.join(home, 'Desktop'),
    downloads: path.join(home, 'Downloads'),
    documents: path.join(home, 'Documents'),
    pictures: path.join(home, 'Pictures'),
    music: path.join(home, 'Music'),
    videos: path.join(home, 'Videos'),
    movies: path.join(home, 'Movies'),
    volumes: [],
  });
  return new FileOperations({
    fs: new FileSystem(),
    resolver: new LocationResolver(aliases),
    launcher: noopLauncher,
    currentPath: home,
    mediaRoot: path.join(home, 'Movies'),
    mediaExtensions: ['.mp4'],
  });
}

describe('buildOperation', () => {
  it('maps wire parameters onto the typed operation', () => {
    expect(buildOperation('rename_item', { old_name: 'a', new_name: 'b', location: 'Desktop' })).toEqual({
      kind: 'rename_item',
      oldName: 'a',
      newName: 'b',
      location: 'Desktop',
    });
  });

  it('fills absent parameters with empty strings and coerces scalars', () => {
    expect(buildOperation('create_file', { file_name: 2024, content: true })).toEqual({
      kind: 'create_file',
      fileName: '2024',
      location: '',
      content: 'true',
    });
    expect(buildOperation('search_files', null)).toEqual({ kind: 'search_files', searchTerm: '', searchPath: '' });
  });

  it('returns the unrecognized variant for unknown kinds', () => {
    expect(buildOperation('delete_everything', {})).toEqual({ kind: 'unrecognized', requested: 'delete_everything' });
    expect(buildOperation(42, {})).toEqual({ kind: 'unrecognized', requested: '' });
  });

  it('has a catalog entry for every operation kind', () => {
    expect(Object.keys(OPERATION_CATALOG).sort()).toEqual([...OPERATION_KINDS].sort());
    expect(isOperationKind('play_movie')).toBe(true);
    expect(isOperationKind('unknown')).toBe(false);
  });
});

describe('OperationRegistry', () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'fcmd-registry-'));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('routes a wire-level request to its handler', async () => {
    const registry = new OperationRegistry(makeOperations(home));
    const result = await registry.execute('create_folder', { folder_name: 'reports' });
    expect(result).toEqual({ message: `Created folder: ${path.join(home, 'reports')}`, succeeded: true });
  });

  it('answers unknown operations without touching the filesystem', async () => {
    const registry = new OperationRegistry(makeOperations(home));
    const result = await registry.execute('format_disk', { drive: 'C' });
    expect(result).toEqual({ message: UNRECOGNIZED_MESSAGE, succeeded: false, code: 'UnrecognizedOperation' });
    expect(fs.readdirSync(home)).toEqual([]);
  });

  it('turns an unexpected handler throw into a failed result', async () => {
    const operations = makeOperations(home);
    jest.spyOn(operations, 'searchFiles').mockRejectedValue(new Error('boom'));
    const errorSpy = jest.spyOn(console, 'error').mockImplementation();

    const result = await new OperationRegistry(operations).execute('search_files', { search_term: 'x' });

    expect(result).toEqual({ message: 'Error running search_files: boom', succeeded: false, code: 'UnderlyingIOFailure' });
    expect(errorSpy).toHaveBeenCalled();
    errorSpy.mockRestore();
  });
});
