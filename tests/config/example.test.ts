import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '@/lib/config';

const root = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

describe('config.example.json', () => {
  it('is a valid range-mode configuration', () => {
    const config = loadConfig(path.join(root, 'config.example.json'), {});
    expect(config.mode).toBe('range');
    expect(config.range.blocks.map((block) => block.label)).toEqual(['B1', 'B2']);
    expect(config.namedColumns.requiredColumns).toHaveLength(10);
  });
});
