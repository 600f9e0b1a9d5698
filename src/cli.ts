#!/usr/bin/env node
/**
 * Command-line entry point
 *
 *   giveaway-picker clean  <comments.csv> [--out file]
 *   giveaway-picker draw   <comments.csv> [--count n] [--alternates n] [--seed s]
 *                          [--format text|csv|json] [--out dir] [--no-charts]
 *   giveaway-picker report <comments.csv> --winners a,b,c [--threshold n] [--sample n]
 */

import 'dotenv/config';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { GiveawayService } from '@/api';
import { loadConfig, type GiveawayConfig } from '@/config';
import type { Draw, DrawMode, ExportFormat, ReportOptions } from '@/types';
import {
  drawFileName,
  exportCleanedCSV,
  exportDraw,
  exportToCSV,
  exportToText,
  InputFileError,
  normalizeRecords,
  parseCommentsCSV,
  renderHighVolumeReport,
  UsageError,
  type ParsedCSV,
} from '@/utils';
import { configureLogger, createLogger } from '@/utils/logger';

const log = createLogger('cli');

const USAGE = `Usage:
  giveaway-picker clean  <comments.csv> [--out file]
  giveaway-picker draw   <comments.csv> [--count n] [--alternates n] [--seed s]
                         [--format text|csv|json] [--out dir] [--no-charts]
  giveaway-picker report <comments.csv> --winners a,b,c [--threshold n] [--sample n]
                         [--out dir] [--no-charts]

--winners takes usernames exactly as they appear in the export.`;

const CLEANED_FILE = 'comments_cleaned.csv';
const WINNER_SUMMARY_FILE = 'winner_stats_summary.csv';
const HIGH_VOLUME_FILE = 'high_entry_user_report.txt';

/**
 * Run the CLI and return the process exit code
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const { config, warnings } = loadConfig(env);
  configureLogger({ level: config.logLevel, format: config.logFormat });
  for (const warning of warnings) {
    log.warn(warning);
  }

  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        out: { type: 'string' },
        count: { type: 'string' },
        alternates: { type: 'string' },
        seed: { type: 'string' },
        format: { type: 'string' },
        winners: { type: 'string' },
        threshold: { type: 'string' },
        sample: { type: 'string' },
        'no-charts': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });

    const [command, inputPath] = positionals;

    if (values.help || !command) {
      process.stdout.write(`${USAGE}\n`);
      return values.help ? 0 : 1;
    }
    if (!inputPath) {
      throw new UsageError(`Missing input CSV for "${command}"`);
    }

    const settings: GiveawayConfig = {
      ...config,
      winnerCount: parseCount('--count', values.count, config.winnerCount, 1),
      alternateCount: parseCount('--alternates', values.alternates, config.alternateCount, 0),
      seed: values.seed ?? config.seed,
      highVolumeThreshold: parseCount('--threshold', values.threshold, config.highVolumeThreshold, 0),
      highVolumeSample: parseCount('--sample', values.sample, config.highVolumeSample, 0),
      charts: values['no-charts'] ? false : config.charts,
      format: parseFormat(values.format, config.format),
    };

    switch (command) {
      case 'clean':
        await runClean(inputPath, values.out ?? path.join(settings.outputDir, CLEANED_FILE));
        return 0;
      case 'draw':
        await runDraw(inputPath, values.out ?? settings.outputDir, settings, {
          kind: 'random',
          count: settings.winnerCount,
          alternates: settings.alternateCount,
          seed: settings.seed,
        });
        return 0;
      case 'report': {
        const usernames = (values.winners ?? '')
          .split(',')
          .map(name => name.trim())
          .filter(name => name.length > 0);
        if (usernames.length === 0) {
          throw new UsageError('"report" needs --winners with at least one username');
        }
        await runDraw(inputPath, values.out ?? settings.outputDir, settings, { kind: 'lookup', usernames });
        return 0;
      }
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (error) {
    if (error instanceof InputFileError) {
      log.error(`${error.message}: ${error.path}`);
      log.error(error.hint);
    } else if (error instanceof UsageError) {
      log.error(error.message);
      process.stderr.write(`${USAGE}\n`);
    } else if (error instanceof Error) {
      log.error(error.message, { name: error.name });
    } else {
      log.error('Unexpected failure', { error: String(error) });
    }
    return 1;
  }
}

async function runClean(inputPath: string, outputPath: string): Promise<void> {
  const csv = await loadCSV(inputPath, 'Export the post comments to CSV before cleaning.');
  const result = normalizeRecords(csv.records, csv.header);

  for (const diagnostic of result.diagnostics) {
    log.warn(diagnostic.message, { code: diagnostic.code });
  }

  await saveFile(outputPath, exportCleanedCSV(result.records));

  const participants = new Set(result.records.map(r => r.username)).size;
  process.stdout.write(
    [
      `Total rows before cleaning: ${result.inputCount}`,
      `Identical duplicate rows removed: ${result.duplicatesRemoved}`,
      `Rows after cleaning: ${result.records.length}`,
      `Unique participants: ${participants}`,
      `Cleaned data saved to ${outputPath}`,
      '',
    ].join('\n')
  );
}

async function runDraw(
  inputPath: string,
  outputDir: string,
  settings: GiveawayConfig,
  mode: DrawMode
): Promise<Draw> {
  const csv = await loadCSV(
    inputPath,
    'Run "giveaway-picker clean" on the raw export first, or pass the raw export directly.'
  );
  const options: ReportOptions = { charts: settings.charts };
  const service = new GiveawayService();

  const prepared = service.prepare({ records: csv.records, header: csv.header });
  const draw = service.complete(prepared, mode);
  const audit = service.auditHighVolume(prepared, {
    threshold: settings.highVolumeThreshold,
    sampleSize: settings.highVolumeSample,
  });

  process.stdout.write(`${exportToText(draw, options)}\n\n${renderHighVolumeReport(audit)}\n`);

  await saveFile(path.join(outputDir, drawFileName(draw, settings.format)), exportDraw(draw, settings.format, options));
  if (draw.winners.length > 0) {
    await saveFile(path.join(outputDir, WINNER_SUMMARY_FILE), exportToCSV(draw));
  }
  if (audit.participants.length > 0) {
    await saveFile(path.join(outputDir, HIGH_VOLUME_FILE), renderHighVolumeReport(audit));
  }

  return draw;
}

async function loadCSV(inputPath: string, hint: string): Promise<ParsedCSV> {
  let text: string;
  try {
    text = await readFile(inputPath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputFileError(`Could not read input file (${reason})`, inputPath, hint);
  }

  const csv = parseCommentsCSV(text);
  for (const warning of csv.warnings) {
    log.warn(warning, { file: inputPath });
  }
  log.info('Loaded CSV', { file: inputPath, rows: csv.records.length });
  return csv;
}

async function saveFile(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content.endsWith('\n') ? content : `${content}\n`, 'utf8');
  log.info('Saved file', { file: filePath });
}

function parseCount(flag: string, value: string | undefined, fallback: number, min: number): number {
  if (value === undefined) return fallback;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new UsageError(`${flag} must be an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

function parseFormat(value: string | undefined, fallback: ExportFormat): ExportFormat {
  if (value === undefined) return fallback;
  if (value === 'text' || value === 'csv' || value === 'json') return value;
  throw new UsageError(`--format must be text, csv or json, got "${value}"`);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      log.error('Unexpected failure', { error: String(error) });
      process.exitCode = 1;
    }
  );
}
