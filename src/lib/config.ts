import { PlateError } from './errors';
import type { Polarity } from './types';
import defaults from './data/defaults.json';

export interface ComparatorConfig {
  dpi: number;          // Scanner dots per inch
  offset: number;       // mm
  tolerancePx: number;  // Match radius for delete/comment, in plate pixels
  polarity: Polarity;
  zoomLevels: number[];
  defaultZoom: number;
  nudgeRange: number;   // Max |nudge| in pixels
  traceStep: number;    // Plot sampling step in pixels
}

type Env = Record<string, string | undefined>;

function invalid(field: string, value: unknown): PlateError {
  return new PlateError('InvalidConfig', `Invalid ${field}: ${JSON.stringify(value)}`);
}

function parsePolarity(value: unknown): Polarity {
  if (value === 'direct' || value === 'inverted') return value;
  throw invalid('polarity', value);
}

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw invalid(key, raw);
  return value;
}

export function validateConfig(config: ComparatorConfig): ComparatorConfig {
  const positive: (keyof ComparatorConfig)[] = ['dpi', 'defaultZoom', 'traceStep'];
  for (const key of positive) {
    const value = config[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) throw invalid(key, value);
  }
  if (!Number.isFinite(config.offset)) throw invalid('offset', config.offset);
  if (!Number.isFinite(config.tolerancePx) || config.tolerancePx < 0) throw invalid('tolerancePx', config.tolerancePx);
  if (!Number.isFinite(config.nudgeRange) || config.nudgeRange < 0) throw invalid('nudgeRange', config.nudgeRange);
  if (config.zoomLevels.length === 0 || config.zoomLevels.some(z => !(z > 0))) {
    throw invalid('zoomLevels', config.zoomLevels);
  }
  if (!config.zoomLevels.includes(config.defaultZoom)) throw invalid('defaultZoom', config.defaultZoom);
  parsePolarity(config.polarity);
  return config;
}

/**
 * Defaults from data/defaults.json, then PLATE_* environment variables,
 * then explicit overrides.
 */
export function resolveConfig(
  overrides: Partial<ComparatorConfig> = {},
  env: Env = process.env
): ComparatorConfig {
  const fromEnv: Partial<ComparatorConfig> = {};
  const dpi = envNumber(env, 'PLATE_DPI');
  if (dpi !== undefined) fromEnv.dpi = dpi;
  const offset = envNumber(env, 'PLATE_OFFSET');
  if (offset !== undefined) fromEnv.offset = offset;
  const tolerancePx = envNumber(env, 'PLATE_TOLERANCE_PX');
  if (tolerancePx !== undefined) fromEnv.tolerancePx = tolerancePx;
  if (env.PLATE_POLARITY) fromEnv.polarity = parsePolarity(env.PLATE_POLARITY);

  return validateConfig({
    ...defaults,
    polarity: parsePolarity(defaults.polarity),
    zoomLevels: [...defaults.zoomLevels],
    ...fromEnv,
    ...overrides,
  });
}
