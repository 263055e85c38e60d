import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseCliArgs, runCli } from '@/cli/index';
import { ConfigError } from '@/lib/errors';

describe('parseCliArgs', () => {
  it('collects files and options', () => {
    expect(
      parseCliArgs(['--range', 'B1=F2:H6', '--range', 'J2:K3', '--conditions', 'a, b', '--no-header', 'x.xlsx', 'y.xlsx'])
    ).toEqual({
      files: ['x.xlsx', 'y.xlsx'],
      blocks: [
        { label: 'B1', range: 'F2:H6' },
        { label: 'J2:K3', range: 'J2:K3' },
      ],
      conditions: ['a', 'b'],
      noHeader: true,
    });
  });

  it('shows help without arguments', () => {
    expect(parseCliArgs([])).toBe('help');
    expect(parseCliArgs(['a.csv', '--help'])).toBe('help');
  });

  it('rejects unknown options, bad modes and missing values', () => {
    expect(() => parseCliArgs(['--colour', 'a.csv'])).toThrow(ConfigError);
    expect(() => parseCliArgs(['--mode', 'rows', 'a.csv'])).toThrow('Unknown mode "rows" (expected columns or range)');
    expect(() => parseCliArgs(['a.csv', '--out-dir'])).toThrow('Option --out-dir needs a value');
    expect(() => parseCliArgs(['--mode', 'range'])).toThrow('No input files given');
  });

  it('rejects an empty condition label instead of shifting the pairing', () => {
    expect(() => parseCliArgs(['--conditions', 'cold,,hot', 'a.csv', 'b.csv', 'c.csv'])).toThrow(
      'Empty condition label at position 2 in "cold,,hot"'
    );
  });
});

describe('runCli', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'consolidate-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeInput(name: string, lines: string[]): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, lines.join('\n'));
    return file;
  }

  it('writes the CSV and workbook for a range run', async () => {
    const a = writeInput('a.csv', ['x,y,z', '1,2,3', '4,5,6']);
    const b = writeInput('b.csv', ['x,y,z', '7,8,9', '10,11,12']);
    const outDir = path.join(dir, 'out');

    const code = await runCli(['--range', 'B2:C3', '--conditions', 'cold,hot', '--out-dir', outDir, a, b]);

    expect(code).toBe(0);
    const csv = fs.readFileSync(path.join(outDir, 'consolidated.csv'));
    expect([...csv.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
    expect(new TextDecoder().decode(csv)).toBe(
      'Condition,File,y,z\r\ncold,a.csv,2,3\r\ncold,a.csv,5,6\r\nhot,b.csv,8,9\r\nhot,b.csv,11,12'
    );
    expect(fs.existsSync(path.join(outDir, 'consolidated.xlsx'))).toBe(true);
  });

  it('reports an unreadable input and still writes the rest', async () => {
    const a = writeInput('a.csv', ['x,y,z', '1,2,3', '4,5,6']);
    const folder = path.join(dir, 'folder.csv');
    fs.mkdirSync(folder);
    const outDir = path.join(dir, 'out');

    const code = await runCli(['--range', 'B2:C3', '--conditions', 'cold,hot', '--out-dir', outDir, a, folder]);

    expect(code).toBe(0);
    expect(new TextDecoder().decode(fs.readFileSync(path.join(outDir, 'consolidated.csv')))).toBe(
      'Condition,File,y,z\r\ncold,a.csv,2,3\r\ncold,a.csv,5,6'
    );
    expect(console.error).toHaveBeenCalledWith(
      expect.stringMatching(/^- hot \/ folder\.csv: Failed to read folder\.csv: /)
    );
  });

  it('exits with 1 when nothing was consolidated', async () => {
    const a = writeInput('a.csv', ['x,y', '1,2']);
    const code = await runCli(['--out-dir', path.join(dir, 'out'), a]);

    expect(code).toBe(1);
    expect(fs.existsSync(path.join(dir, 'out'))).toBe(false);
  });

  it('exits with 1 for missing input files', async () => {
    const code = await runCli([path.join(dir, 'nope.csv')]);
    expect(code).toBe(1);
  });
});
