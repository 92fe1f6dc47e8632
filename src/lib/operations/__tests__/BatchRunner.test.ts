import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileSystem } from '../../FileSystem';
import { Launcher } from '../../launcher/Launcher';
import { AliasTable } from '../../locations/AliasTable';
import { LocationResolver } from '../../locations/LocationResolver';
import { BatchRunner } from '../BatchRunner';
import { FileOperations } from '../FileOperations';
import { OperationRegistry, UNRECOGNIZED_MESSAGE } from '../OperationRegistry';
import { Plan } from '../types';

const noopLauncher: Launcher = {
  openInFileManager: async () => {},
  openWithDefaultApplication: async () => {},
};

describe('BatchRunner', () => {
  let home: string;
  let runner: BatchRunner;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'fcmd-batch-'));
    fs.mkdirSync(path.join(home, 'Desktop'));
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
    const operations = new FileOperations({
      fs: new FileSystem(),
      resolver: new LocationResolver(aliases),
      launcher: noopLauncher,
      currentPath: home,
      mediaRoot: path.join(home, 'Movies'),
      mediaExtensions: ['.mp4'],
    });
    runner = new BatchRunner(new OperationRegistry(operations));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('runs later steps after a failed one', async () => {
    const plan: Plan = {
      mode: 'sequence',
      operations: [
        { kind: 'rename_item', oldName: 'ghost', newName: 'spirit', location: '' },
        { kind: 'create_folder', folderName: 'reports', location: 'Desktop' },
      ],
    };

    const report = await runner.run(plan);

    expect(report.mode).toBe('sequence');
    expect(report.allSucceeded).toBe(false);
    expect(report.outcomes.map(outcome => outcome.step)).toEqual([1, 2]);
    expect(report.outcomes[0].result).toEqual({
      message: `Source does not exist: ${path.join(home, 'ghost')}`,
      succeeded: false,
      code: 'SourceMissing',
    });
    expect(report.outcomes[1].result).toEqual({
      message: `Created folder: ${path.join(home, 'Desktop', 'reports')}`,
      succeeded: true,
    });
    expect(fs.existsSync(path.join(home, 'Desktop', 'reports'))).toBe(true);
  });

  it('lets a later step build on an earlier one', async () => {
    const report = await runner.run({
      mode: 'sequence',
      operations: [
        { kind: 'create_folder', folderName: 'movies', location: 'Desktop' },
        { kind: 'create_folder', folderName: 'hollywood', location: 'Desktop/movies' },
      ],
    });
    expect(report.allSucceeded).toBe(true);
    expect(fs.existsSync(path.join(home, 'Desktop', 'movies', 'hollywood'))).toBe(true);
  });

  it('returns one outcome for a single plan', async () => {
    const report = await runner.run({ mode: 'single', operation: { kind: 'unrecognized', requested: 'dance' } });
    expect(report.outcomes).toHaveLength(1);
    expect(report.outcomes[0].result.message).toBe(UNRECOGNIZED_MESSAGE);
    expect(report.allSucceeded).toBe(false);
  });
});
