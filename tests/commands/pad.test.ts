import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { padCommand, parseWidth } from '@/commands/pad.js';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from '@/lib/config.js';
import { writeJsonFile } from '@/lib/fs.js';
import { createRecordingIO } from '../helpers/io.js';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

describe('padCommand', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'padkit-pad-test-'));
    configPath = join(testDir, CONFIG_FILE_NAME);
    await writeJsonFile(configPath, DEFAULT_CONFIG);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('pads every text argument on its own line', async () => {
    const io = createRecordingIO();
    await padCommand({ texts: ['hej', '9184'], width: '6', alignment: 'Left', configPath }, io);

    expect(io.output).toEqual(['hej   \n9184  \n']);
    expect(io.warnings).toEqual([]);
  });

  it('reads stdin lines when no text is given', async () => {
    const io = createRecordingIO(['abc', 'de']);
    await padCommand({ texts: [], width: '4', alignment: 'Center', symbol: 'Underscore', configPath }, io);

    expect(io.output).toEqual(['abc_\n_de_\n']);
  });

  it('warns when a line is truncated', async () => {
    const io = createRecordingIO();
    await padCommand({ texts: ['kappa'], width: '3', alignment: 'Center', configPath }, io);

    expect(io.output).toEqual(['app\n']);
    expect(io.warnings).toEqual([
      'could not pad `kappa` to width 3 (length 5); sliced to fit with Center alignment, 2 character(s) dropped',
    ]);
  });

  it('summarizes repeated truncation', async () => {
    const io = createRecordingIO();
    await padCommand({ texts: ['abcdef', 'ghijkl'], width: '2', alignment: 'Left', configPath }, io);

    expect(io.output).toEqual(['ab\ngh\n']);
    expect(io.warnings).toHaveLength(3);
    expect(io.warnings[2]).toBe('2 of 2 lines were truncated to width 2');
  });

  it('stays quiet with --quiet', async () => {
    const io = createRecordingIO();
    await padCommand({ texts: ['kappa'], width: '3', quiet: true, configPath }, io);

    expect(io.output).toEqual(['ppa\n']);
    expect(io.warnings).toEqual([]);
  });

  it('uses config defaults', async () => {
    await writeJsonFile(configPath, {
      version: '1',
      defaults: { width: 5, alignment: 'Right', symbol: 'Zero' },
      warn_on_truncate: false,
    });
    const io = createRecordingIO();
    await padCommand({ texts: ['42', 'toolong'], configPath }, io);

    expect(io.output).toEqual(['00042\nolong\n']);
    expect(io.warnings).toEqual([]);
  });

  it('reads a request file and lets flags override it', async () => {
    const requestPath = join(testDir, 'request.json');
    await writeJsonFile(requestPath, { width: 3, alignment: 'Left', symbol: 'Hyphen' });

    const fromFile = createRecordingIO();
    await padCommand({ texts: ['a'], request: requestPath, configPath }, fromFile);
    expect(fromFile.output).toEqual(['a--\n']);

    const overridden = createRecordingIO();
    await padCommand({ texts: ['a'], request: requestPath, width: '4', symbol: 'Period', configPath }, overridden);
    expect(overridden.output).toEqual(['a...\n']);
  });

  it('requires a width from somewhere', async () => {
    await expect(padCommand({ texts: ['a'], configPath }, createRecordingIO())).rejects.toThrow('No width given');
  });

  it('rejects unknown tags', async () => {
    await expect(
      padCommand({ texts: ['a'], width: '3', alignment: 'middle', configPath }, createRecordingIO())
    ).rejects.toThrow("Unknown alignment 'middle'");
  });
});

describe('parseWidth', () => {
  it('accepts non-negative integers', () => {
    expect(parseWidth('0')).toBe(0);
    expect(parseWidth('128')).toBe(128);
  });

  it('rejects everything else', () => {
    for (const value of ['', ' ', '-1', '2.5', 'abc']) {
      expect(() => parseWidth(value)).toThrow(`Invalid width: ${value}`);
    }
  });
});
