import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { defaultConfig } from '../../src/config/defaults.js';
import { PathNotFoundError, RenameError } from '../../src/errors.js';
import { NameTransformer } from '../../src/naming/transformer.js';
import {
  formatRenameEvent,
  processPath,
  type RenameEvent,
} from '../../src/renamer/processor.js';

const FIXED_NOW = new Date('2024-03-07T12:00:00Z');

async function createTestbed(root: string): Promise<void> {
  await mkdir(join(root, 'node-project'));
  await mkdir(join(root, 'subdirectory'));
  await writeFile(join(root, 'file with spaces.txt'), '');
  await writeFile(join(root, 'FileWithMixedCase.rs'), '');
  await writeFile(join(root, 'another-file-with-dashes.js'), '');
  await writeFile(join(root, 'my-executable.exe'), '');
  await writeFile(join(root, 'My Tool.exe'), '');
  await writeFile(join(root, 'node-project', 'package.json'), '{}');
  await writeFile(join(root, 'node-project', 'main file.js'), '');
  await writeFile(join(root, 'subdirectory', 'nested file with spaces.md'), '');
  await writeFile(join(root, 'subdirectory', 'CamelCaseFile.ts'), '');
}

describe('processPath', () => {
  let root: string;
  let events: RenameEvent[];
  const transformer = new NameTransformer(defaultConfig(), () => FIXED_NOW);
  const onRename = (event: RenameEvent): void => {
    events.push(event);
  };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'namefmt-process-'));
    await createTestbed(root);
    events = [];
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('reports planned renames without touching the disk', async () => {
    const summary = await processPath(root, transformer, { onRename });

    expect(events.map(formatRenameEvent)).toEqual([
      `Would rename: ${join(root, 'My Tool.exe')} -> ${join(root, 'my-tool.exe')}`,
      `Would rename: ${join(root, 'file with spaces.txt')} -> ${join(root, 'file_with_spaces.txt')}`,
      `Would rename: ${join(root, 'node-project', 'main file.js')} -> ${join(root, 'node-project', 'main-file.js')}`,
      `Would rename: ${join(root, 'subdirectory', 'nested file with spaces.md')} -> ${join(root, 'subdirectory', 'nested_file_with_spaces.md')}`,
    ]);
    expect(summary).toEqual({ scanned: 9, planned: 4 });
    expect(existsSync(join(root, 'file with spaces.txt'))).toBe(true);
    expect(existsSync(join(root, 'file_with_spaces.txt'))).toBe(false);
  });

  test('renames files in place', async () => {
    await processPath(root, transformer, { inplace: true, onRename });

    expect(events.map((e) => e.action)).toEqual(['renamed', 'renamed', 'renamed', 'renamed']);
    expect(existsSync(join(root, 'file_with_spaces.txt'))).toBe(true);
    expect(existsSync(join(root, 'file with spaces.txt'))).toBe(false);
    expect(existsSync(join(root, 'my-tool.exe'))).toBe(true);
    expect(existsSync(join(root, 'node-project', 'main-file.js'))).toBe(true);
    expect(existsSync(join(root, 'subdirectory', 'nested_file_with_spaces.md'))).toBe(true);
    expect(existsSync(join(root, 'FileWithMixedCase.rs'))).toBe(true);
  });

  test('processes a single file', async () => {
    const file = join(root, 'subdirectory', 'nested file with spaces.md');
    const summary = await processPath(file, transformer, { onRename });

    expect(summary).toEqual({ scanned: 1, planned: 1 });
    expect(events[0]?.plan.newName).toBe('nested_file_with_spaces.md');
  });

  test('prefixes every file with the date when asked', async () => {
    const summary = await processPath(join(root, 'subdirectory'), transformer, {
      timestamp: true,
      onRename,
    });

    expect(summary).toEqual({ scanned: 2, planned: 2 });
    expect(events.map((e) => e.plan.newName)).toEqual([
      '2024_03_07__CamelCaseFile.ts',
      '2024_03_07__nested_file_with_spaces.md',
    ]);
  });

  test('rejects a missing root', async () => {
    const missing = join(root, 'does-not-exist');

    await expect(processPath(missing, transformer, { onRename })).rejects.toThrow(PathNotFoundError);
    await expect(processPath(missing, transformer, { onRename })).rejects.toThrow(
      `Path does not exist: ${missing}`,
    );
  });

  test('aborts on the first failed rename', async () => {
    // The destination is a non-empty directory, so rename fails
    await mkdir(join(root, 'subdirectory', 'nested_file_with_spaces.md'));
    await writeFile(join(root, 'subdirectory', 'nested_file_with_spaces.md', 'keep'), '');

    await expect(
      processPath(root, transformer, { inplace: true, onRename }),
    ).rejects.toThrow(RenameError);

    // Files walked before the failure stay renamed
    expect(events.map((e) => e.plan.newName)).toEqual([
      'my-tool.exe',
      'file_with_spaces.txt',
      'main-file.js',
    ]);
  });
});
