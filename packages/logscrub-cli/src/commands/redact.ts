import fs from 'node:fs/promises';
import path from 'node:path';

import {
  BUILTIN_PROFILES,
  DEFAULT_SOURCE,
  RedactionEngine,
  TraceAggregator,
  createDefaultLogger,
  decodeText,
  fileInput,
  loadProfile,
  matchProfileForFile,
  mergeConfig,
  parseConfig,
  runBatch,
  type BatchFile,
  type BatchFileResult,
  type Logger,
  type LogscrubConfig,
  type ProfileOverrides,
  type StructuredFormat,
} from '@logscrub/core';

import { createBackend } from '../backends.js';
import { collectFiles, processIo, readAll, type CommandIo } from '../io.js';
import { parseOverrides, type OverrideOptions } from '../overrides.js';
import { formatPreview } from '../preview.js';
import { formatSummary } from '../stats.js';

export interface RedactOptions extends OverrideOptions {
  profile?: string;
  autoProfile?: boolean;
  recursive?: boolean;
  outDir?: string;
  structured?: string;
  trace?: string;
  traceFormat?: string;
  concurrency?: string;
  backend?: string;
  logLevel?: string;
  enginePath?: string;
  timeout?: string;
  /** Run everything but write nothing; list per-file counts instead. */
  dryRun?: boolean;
  /** Like `dryRun`, printing a line diff of every change. */
  preview?: boolean;
  /** Print per-rule counts once the run is over. */
  stats?: boolean;
}

interface Job {
  file: BatchFile;
  /** Output path under `--out-dir`; unset for stdin. */
  relative?: string;
  profileRef: string;
}

export const redactCommands = {
  async redact(paths: string[], options: RedactOptions = {}, io: CommandIo = processIo): Promise<void> {
    const { config, errors } = parseConfig({
      profile: options.profile,
      backend: options.backend,
      concurrency: options.concurrency,
      logLevel: options.logLevel,
      traceFormat: options.traceFormat,
      enginePath: options.enginePath,
      timeoutMs: options.timeout,
    });
    const structured = parseStructured(options.structured, errors);
    const overrides = parseOverrides(options, errors);

    if (errors.length > 0) {
      console.error('Invalid options:');
      errors.forEach((err) => console.error(`   - ${err}`));
      process.exit(1);
      return;
    }

    const settings = mergeConfig(config);
    const logger = createDefaultLogger(settings.logLevel);
    const controller = new AbortController();
    const onInterrupt = () => {
      logger.warn('Interrupted; discarding files still in progress');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const jobs = await planJobs(paths, options, settings, logger, io);
      const aggregator = new TraceAggregator();
      const dryRun = options.dryRun === true || options.preview === true;
      const outDir = dryRun ? undefined : options.outDir;
      const relatives = new Map(jobs.map((job) => [job.file.source, job.relative]));

      const results = await runJobs(jobs, {
        settings,
        structured,
        overrides,
        aggregator,
        logger,
        signal: controller.signal,
        onFile: async (result) => {
          const relative = relatives.get(result.source);
          if (outDir === undefined || relative === undefined) return;
          if (result.status !== 'completed' || result.text === undefined) return;
          const target = path.join(outDir, relative);
          await fs.mkdir(path.dirname(target), { recursive: true });
          await fs.writeFile(target, result.text, 'utf8');
        },
      });

      for (const job of jobs) {
        const result = results.get(job.file.source);
        if (result?.status !== 'completed' || result.text === undefined) continue;
        if (options.preview) {
          const before = await readOriginal(job.file);
          const diff = formatPreview(job.file.source, before, result.text);
          if (diff.length > 0) io.stdout.write(`${diff.join('\n')}\n`);
        } else if (dryRun) {
          io.stdout.write(`${job.file.source}: ${result.redactions} redaction(s)\n`);
        } else if (outDir === undefined || job.relative === undefined) {
          io.stdout.write(result.text);
        }
        for (const note of result.notes) {
          logger.warn(`${note.source}:${note.line}: ${note.message}`);
        }
      }

      if (options.trace && !dryRun) {
        const content = aggregator.export(settings.traceFormat);
        await fs.writeFile(options.trace, content === '' ? '' : `${content}\n`, 'utf8');
        logger.info(`Trace written to ${options.trace} (${aggregator.size} entries, digest ${aggregator.digest()})`);
      }

      const files = [...results.values()];
      const completed = files.filter((f) => f.status === 'completed').length;

      if (options.stats) {
        const summary = aggregator.summary();
        console.error('Redaction statistics:');
        console.error(`   Files: ${completed} of ${files.length} completed`);
        console.error(`   Redactions: ${summary.total} across ${summary.sources} source(s)`);
        formatSummary(summary).forEach((line) => console.error(line));
      }

      if (dryRun) {
        logger.info(`Dry run: ${aggregator.size} redaction(s) in ${completed} of ${files.length} file(s); nothing written`);
      } else {
        logger.info(`Redacted ${completed} of ${files.length} file(s): ${aggregator.size} redaction(s)`);
      }

      if (completed < files.length) {
        process.exit(1);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Failed to redact: ${message}`);
      process.exit(1);
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  },
};

function parseStructured(value: string | undefined, errors: string[]): StructuredFormat | undefined {
  if (value === undefined || value === 'json' || value === 'yaml') return value;
  errors.push(`Invalid structured format: ${value}. Must be one of: json, yaml`);
  return undefined;
}

async function planJobs(
  paths: readonly string[],
  options: RedactOptions,
  settings: Required<LogscrubConfig>,
  logger: Logger,
  io: CommandIo,
): Promise<Job[]> {
  if (paths.length === 0) {
    const bytes = await readAll(io.stdin);
    return [{ file: { source: DEFAULT_SOURCE, load: async () => bytes }, profileRef: settings.profile }];
  }

  const files = await collectFiles(paths, options.recursive === true);
  const candidates = options.autoProfile ? BUILTIN_PROFILES.map((name) => loadProfile(name)) : [];

  return files.map((file) => {
    const matched = matchProfileForFile(file.path, candidates);
    if (matched) {
      logger.debug(`${file.path}: using profile "${matched.name}"`);
    }
    return {
      file: fileInput(file.path),
      relative: file.relative,
      profileRef: matched?.name ?? settings.profile,
    };
  });
}

async function readOriginal(file: BatchFile): Promise<string> {
  const raw = await file.load();
  return typeof raw === 'string' ? raw : decodeText(raw).text;
}

interface RunOptions {
  settings: Required<LogscrubConfig>;
  structured?: StructuredFormat;
  overrides?: ProfileOverrides;
  aggregator: TraceAggregator;
  logger: Logger;
  signal: AbortSignal;
  onFile: (result: BatchFileResult) => Promise<void>;
}

/** One batch per profile; every batch reports into the same aggregator. */
async function runJobs(jobs: readonly Job[], options: RunOptions): Promise<Map<string, BatchFileResult>> {
  const groups = new Map<string, BatchFile[]>();
  for (const job of jobs) {
    const group = groups.get(job.profileRef);
    if (group) group.push(job.file);
    else groups.set(job.profileRef, [job.file]);
  }

  const results = new Map<string, BatchFileResult>();
  for (const [profileRef, files] of groups) {
    const engine = new RedactionEngine(loadProfile(profileRef, { overrides: options.overrides }));
    const backend = createBackend(options.settings, {
      engine,
      profileRef,
      overrides: options.overrides,
      signal: options.signal,
    });
    options.logger.debug(`Redacting ${files.length} file(s) with profile "${engine.profile.name}" on the ${backend.name} backend`);

    try {
      const report = await runBatch(files, {
        backend,
        concurrency: options.settings.concurrency,
        structured: options.structured,
        signal: options.signal,
        aggregator: options.aggregator,
        logger: options.logger,
        onFile: options.onFile,
      });
      for (const file of report.files) results.set(file.source, file);
    } finally {
      await backend.close?.();
    }
  }

  return results;
}
