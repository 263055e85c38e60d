import fs from 'node:fs';
import path from 'node:path';
import type { ZodError } from 'zod';
import { ConfigError, errorMessage } from '@/lib/errors';
import { appConfigSchema, configFileSchema } from './schema';
import type { AppConfig, ConfigOverrides } from './schema';

/** Timing labels expected in every named-column source file */
export const DEFAULT_REQUIRED_COLUMNS = [
  'K',
  'Início global (s)',
  'Fim global (s)',
  'Duração global (s)',
  'Comp1 início (s)',
  'Comp1 fim (s)',
  'Comp1 duração (s)',
  'Comp2 início (s)',
  'Comp2 fim (s)',
  'Comp2 duração (s)',
];

const DEFAULT_CONFIG: AppConfig = {
  mode: 'columns',
  namedColumns: {
    requiredColumns: DEFAULT_REQUIRED_COLUMNS,
  },
  range: {
    headerPresent: true,
    blocks: [],
    conditions: [],
  },
  provenance: {
    fileColumn: 'File',
    conditionColumn: 'Condition',
  },
  output: {
    directory: 'output',
    baseName: 'consolidated',
  },
};

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, [errorMessage(error)]);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${absolutePath}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no') {
    return false;
  }
  return fallback;
}

/**
 * Merge overrides over the defaults and validate the result
 */
export function parseConfig(overrides: ConfigOverrides, env: NodeJS.ProcessEnv = {}): AppConfig {
  const merged = {
    mode: overrides.mode ?? DEFAULT_CONFIG.mode,
    namedColumns: { ...DEFAULT_CONFIG.namedColumns, ...(overrides.namedColumns ?? {}) },
    range: { ...DEFAULT_CONFIG.range, ...(overrides.range ?? {}) },
    provenance: { ...DEFAULT_CONFIG.provenance, ...(overrides.provenance ?? {}) },
    output: { ...DEFAULT_CONFIG.output, ...(overrides.output ?? {}) },
  };

  const withEnv = {
    ...merged,
    range: {
      ...merged.range,
      headerPresent: toBool(env.CONSOLIDATE_HEADER_PRESENT, merged.range.headerPresent),
    },
    output: {
      directory: env.CONSOLIDATE_OUTPUT_DIR ?? merged.output.directory,
      baseName: env.CONSOLIDATE_OUTPUT_BASENAME ?? merged.output.baseName,
    },
  };

  const parsed = appConfigSchema.safeParse(withEnv);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Load configuration: defaults, then the optional JSON file, then environment
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  return parseConfig(readConfigFile(configPath), env);
}

export { DEFAULT_CONFIG };
