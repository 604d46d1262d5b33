import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import type { ArithmeticOptions } from 'core-types';
import { warnOnce } from './log';

export const ArithmeticSchema = z.object({
  width: z.enum(['int32', 'int53']),
});

export const MatrixSchema = z.object({
  layout: z.enum(['rows', 'columns']),
});

export const LinalgConfigSchema = z.object({
  arithmetic: ArithmeticSchema,
  matrix: MatrixSchema,
});

export type LinalgConfig = z.infer<typeof LinalgConfigSchema>;

const HERE = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_CONFIG_PATH = path.resolve(HERE, '..', 'config', 'default.yaml');

function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);
  for (const val of Object.values(obj)) {
    if (typeof val === 'object' && val !== null && !Object.isFrozen(val)) {
      deepFreeze(val);
    }
  }
  return obj;
}

const cache = new Map<string, LinalgConfig>();

function resolveConfigPath(preferred: string): string {
  const candidates = [preferred, path.resolve(process.cwd(), preferred)];
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  throw new Error(`Unable to locate configuration file. Tried: ${candidates.join(', ')}`);
}

/**
 * Load, validate and freeze a YAML config. Results are cached per resolved
 * path; call {@link resetConfigCache} to re-read.
 */
export function loadConfig(configPath = DEFAULT_CONFIG_PATH): LinalgConfig {
  const resolved = resolveConfigPath(configPath);
  const hit = cache.get(resolved);
  if (hit) return hit;

  const parsed: unknown = YAML.parse(fs.readFileSync(resolved, 'utf-8'));
  if (parsed && typeof parsed === 'object') {
    const known = Object.keys(LinalgConfigSchema.shape);
    for (const key of Object.keys(parsed)) {
      if (!known.includes(key)) {
        warnOnce('config', `ignoring unknown key "${key}" in ${resolved}`);
      }
    }
  }

  const cfg = deepFreeze(LinalgConfigSchema.parse(parsed));
  cache.set(resolved, cfg);
  return cfg;
}

export function resetConfigCache(): void {
  cache.clear();
}

export function optionsFromConfig(cfg: LinalgConfig): ArithmeticOptions {
  return { width: cfg.arithmetic.width, layout: cfg.matrix.layout };
}
