/**
 * Runtime configuration from environment variables
 */

import type { ExportFormat } from '@/types';
import type { LogFormat } from '@/utils/logger';

export interface GiveawayConfig {
  /** Number of winners to draw */
  winnerCount: number;
  /** Alternates drawn after the winners */
  alternateCount: number;
  /** Seed for a reproducible draw; unset means CSPRNG */
  seed?: string;
  /** Entry count above which a participant is audited */
  highVolumeThreshold: number;
  /** Entries listed per audited participant */
  highVolumeSample: number;
  /** Render score charts in text reports */
  charts: boolean;
  outputDir: string;
  format: ExportFormat;
  logLevel: string;
  logFormat: LogFormat;
}

export const DEFAULT_GIVEAWAY_CONFIG: GiveawayConfig = {
  winnerCount: 10,
  alternateCount: 0,
  highVolumeThreshold: 50,
  highVolumeSample: 10,
  charts: true,
  outputDir: '.',
  format: 'text',
  logLevel: 'info',
  logFormat: 'text',
};

export interface LoadedConfig {
  config: GiveawayConfig;
  /** Values that were ignored in favour of the default */
  warnings: string[];
}

/**
 * Read configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const warnings: string[] = [];
  const defaults = DEFAULT_GIVEAWAY_CONFIG;

  const integer = (name: string, fallback: number, min: number): number => {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      warnings.push(`${name}="${raw}" is not an integer >= ${min}; using ${fallback}`);
      return fallback;
    }
    return value;
  };

  const seed = env.GIVEAWAY_SEED;
  const format = env.GIVEAWAY_FORMAT;
  let exportFormat = defaults.format;
  if (format === 'csv' || format === 'json' || format === 'text') {
    exportFormat = format;
  } else if (format) {
    warnings.push(`GIVEAWAY_FORMAT="${format}" is not one of text, csv, json; using ${defaults.format}`);
  }

  return {
    config: {
      winnerCount: integer('GIVEAWAY_WINNER_COUNT', defaults.winnerCount, 1),
      alternateCount: integer('GIVEAWAY_ALTERNATE_COUNT', defaults.alternateCount, 0),
      seed: seed ? seed : undefined,
      highVolumeThreshold: integer('GIVEAWAY_HIGH_VOLUME_THRESHOLD', defaults.highVolumeThreshold, 0),
      highVolumeSample: integer('GIVEAWAY_HIGH_VOLUME_SAMPLE', defaults.highVolumeSample, 0),
      charts: parseBoolean(env.GIVEAWAY_CHARTS, defaults.charts),
      outputDir: env.GIVEAWAY_OUTPUT_DIR || defaults.outputDir,
      format: exportFormat,
      logLevel: env.LOG_LEVEL || defaults.logLevel,
      logFormat: env.LOG_FORMAT === 'json' ? 'json' : defaults.logFormat,
    },
    warnings,
  };
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(value.toLowerCase());
}
