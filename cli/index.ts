import fs from 'node:fs';
import path from 'node:path';
import {
  buildArtifacts,
  ConfigError,
  consolidateNamedColumns,
  consolidateRanges,
  describeFailure,
  errorMessage,
  loadConfig,
  SUPPORTED_SUFFIXES,
} from '@/lib';
import type { AppConfig, BatchResult, BlockSpec, InputSource } from '@/lib';

export type ModeName = AppConfig['mode'];

export interface ParsedCliArgs {
  files: string[];
  mode?: ModeName;
  blocks: BlockSpec[];
  conditions?: string[];
  noHeader: boolean;
  outDir?: string;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  consolidate [options] <file...>

Modes:
  columns   Extract the configured named columns from every file (default)
  range     Extract spreadsheet blocks such as F2:H6 from every file

Options:
  --config <path>        Optional path to JSON config file
  --mode <columns|range> Override the configured mode
  --range [label=]<ref>  Block to extract in range mode (repeatable)
  --conditions <a,b,...> Condition labels, one per file in order
  --no-header            Range mode: row 1 is data, not column names
  --out-dir <dir>        Directory for the CSV and workbook outputs
  -h, --help             Show this help

Accepted files: ${SUPPORTED_SUFFIXES.join(' ')}
`;

const VALUE_OPTIONS = new Set(['--config', '--mode', '--range', '--conditions', '--out-dir']);

function parseMode(raw: string | undefined): ModeName | undefined {
  if (raw === 'columns' || raw === 'range') {
    return raw;
  }
  return undefined;
}

function parseBlock(raw: string): BlockSpec {
  const separator = raw.indexOf('=');
  if (separator < 0) {
    return { label: raw, range: raw };
  }
  return { label: raw.slice(0, separator), range: raw.slice(separator + 1) };
}

/** Labels pair with files by position, so an empty one is rejected rather than dropped */
function parseConditions(raw: string): string[] {
  const labels = raw.split(',').map((label) => label.trim());
  const empty = labels.findIndex((label) => label === '');
  if (empty >= 0) {
    throw new ConfigError(`Empty condition label at position ${empty + 1} in "${raw}"`);
  }
  return labels;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | 'help' {
  if (argv.includes('-h') || argv.includes('--help') || argv.length === 0) {
    return 'help';
  }

  const parsed: ParsedCliArgs = { files: [], blocks: [], noHeader: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--no-header') {
      parsed.noHeader = true;
      continue;
    }

    if (VALUE_OPTIONS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigError(`Option ${arg} needs a value`);
      }
      i++;

      switch (arg) {
        case '--config':
          parsed.configPath = value;
          break;
        case '--mode': {
          const mode = parseMode(value);
          if (!mode) {
            throw new ConfigError(`Unknown mode "${value}" (expected columns or range)`);
          }
          parsed.mode = mode;
          break;
        }
        case '--range':
          parsed.blocks.push(parseBlock(value));
          break;
        case '--conditions':
          parsed.conditions = parseConditions(value);
          break;
        case '--out-dir':
          parsed.outDir = value;
          break;
      }
      continue;
    }

    if (arg.startsWith('--')) {
      throw new ConfigError(`Unknown option ${arg}`);
    }
    parsed.files.push(arg);
  }

  if (parsed.files.length === 0) {
    throw new ConfigError('No input files given');
  }
  return parsed;
}

function applyArgs(config: AppConfig, args: ParsedCliArgs): AppConfig {
  return {
    ...config,
    mode: args.mode ?? (args.blocks.length > 0 ? 'range' : config.mode),
    range: {
      headerPresent: args.noHeader ? false : config.range.headerPresent,
      blocks: args.blocks.length > 0 ? args.blocks : config.range.blocks,
      conditions: args.conditions ?? config.range.conditions,
    },
    output: {
      ...config.output,
      directory: args.outDir ?? config.output.directory,
    },
  };
}

/**
 * Paths that do not exist are a usage error. A path that exists but cannot
 * be read stays in the batch as a read_failed file.
 */
function readInputs(paths: string[]): InputSource[] {
  const missing = paths.filter((filePath) => !fs.existsSync(filePath));
  if (missing.length > 0) {
    throw new ConfigError('Input files not found', missing);
  }

  return paths.map((filePath): InputSource => {
    const name = path.basename(filePath);
    try {
      return { name, data: fs.readFileSync(filePath) };
    } catch (error) {
      return { name, error: `Failed to read ${name}: ${errorMessage(error)}` };
    }
  });
}

interface PreparedRun {
  batch: BatchResult;
  output: AppConfig['output'];
}

function runBatch(argv: string[]): PreparedRun | 'help' {
  const args = parseCliArgs(argv);
  if (args === 'help') {
    return 'help';
  }

  const config = applyArgs(loadConfig(args.configPath), args);
  const files = readInputs(args.files);
  console.log(`[CLI] ${config.mode} mode, ${files.length} files`);

  const batch =
    config.mode === 'range' ? consolidateRanges(files, config) : consolidateNamedColumns(files, config);
  return { batch, output: config.output };
}

async function writeArtifacts(batch: BatchResult, output: AppConfig['output']): Promise<number> {
  const { outcome } = batch;
  if (outcome.failures.length > 0) {
    console.error('Some files could not be processed:');
    for (const failure of outcome.failures) {
      console.error(`- ${describeFailure(failure)}`);
    }
  }

  const artifacts = buildArtifacts(batch);
  if (!artifacts || outcome.status === 'empty') {
    console.error('Nothing was consolidated (every file failed or lacked the requested data).');
    return 1;
  }

  await fs.promises.mkdir(output.directory, { recursive: true });
  const csvPath = path.join(output.directory, `${output.baseName}.csv`);
  const xlsxPath = path.join(output.directory, `${output.baseName}.xlsx`);
  await fs.promises.writeFile(csvPath, artifacts.csv);
  await fs.promises.writeFile(xlsxPath, artifacts.xlsx);

  const okFiles = new Set(outcome.blocks.map((block) => block.provenance.fileName));
  const rowCount = outcome.groups.reduce((sum, group) => sum + group.table.rows.length, 0);
  console.log(`Consolidated ${rowCount} rows from ${okFiles.size} files (sheets: ${artifacts.sheets.join(', ')})`);
  console.log(`Wrote ${csvPath}`);
  console.log(`Wrote ${xlsxPath}`);
  return 0;
}

export async function runCli(argv: string[]): Promise<number> {
  let run: PreparedRun | 'help';
  try {
    run = runBatch(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  if (run === 'help') {
    console.log(HELP_TEXT.trim());
    return 0;
  }
  return writeArtifacts(run.batch, run.output);
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
