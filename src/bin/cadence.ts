#!/usr/bin/env node
import fs from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import { createColors } from 'colorette';

import { checkSource, type AnalysisResult } from '../cadence/analyze.js';
import { validateAnalysisConfig, type AnalysisConfig } from '../cadence/config.js';
import type { Diagnostic } from '../cadence/diagnostics.js';
import { formatPacing, streamGraphToDot } from '../cadence/graph-dot.js';
import type { AnalyzedProgram, StreamId } from '../cadence/ir.js';
import { buildSchedule, type Schedule } from '../cadence/schedule.js';
import { formatStreamType } from '../cadence/types.js';
import { describeError, formatDiagnostics, formatSummary } from '../utils/index.js';

const CONFIG_FILE = 'cadence.config.json';

/** Where the command line writes; swapped out by tests. */
export interface CliIO {
  cwd: string;
  out: (text: string) => void;
  err: (text: string) => void;
}

type Logger = ReturnType<typeof createLogger>;

function createLogger(io: CliIO, useColor: boolean) {
  const colors = createColors({ useColor });
  return {
    useColor,
    out: (text: string) => io.out(text),
    report: (text: string) => io.err(text),
    error: (text: string) => io.err(`${colors.red(colors.bold('error'))}: ${text}`),
    heading: (text: string) => colors.bold(text),
  };
}

const VALUE_FLAGS = new Set(['--config']);

function parseArgs(argv: string[]) {
  const [command, ...rest] = argv;
  const files: string[] = [];
  const args = new Map<string, string | boolean>();
  for (let i = 0; i < rest.length; i++) {
    const a = rest[i];
    if (a.startsWith('--')) {
      const next = rest[i + 1];
      if (VALUE_FLAGS.has(a) && next !== undefined && !next.startsWith('--')) {
        args.set(a, next);
        i++;
      } else {
        args.set(a, true);
      }
    } else if (a === '-h') {
      args.set('--help', true);
    } else {
      files.push(a);
    }
  }
  return { command, files, args };
}

type LoadedConfig = { config: Partial<AnalysisConfig>; include: string[] };

async function loadConfig(cwd: string, explicit: string | undefined, log: Logger): Promise<LoadedConfig | null> {
  const configPath = path.resolve(cwd, explicit ?? CONFIG_FILE);
  if (!existsSync(configPath)) {
    if (explicit) {
      log.error(`Config file not found: ${configPath}`);
      return null;
    }
    return { config: {}, include: [] };
  }

  const name = path.basename(configPath);
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(configPath, 'utf-8'));
  } catch (error: unknown) {
    log.report(`Invalid ${name}:`);
    log.report(`  - ${describeError(error)}`);
    return null;
  }

  const validation = validateAnalysisConfig(raw);
  if (validation.errors.length > 0) {
    log.report(`Invalid ${name}:`);
    validation.errors.forEach(err => log.report(`  - ${err}`));
    return null;
  }
  return { config: validation.config, include: validation.include ?? [] };
}

interface FileReport {
  file: string;
  source?: string;
  result: AnalysisResult;
}

async function checkFile(cwd: string, file: string, config: Partial<AnalysisConfig>): Promise<FileReport | { file: string; readError: string }> {
  let source: string;
  try {
    source = await fs.readFile(path.resolve(cwd, file), 'utf-8');
  } catch (error: unknown) {
    return { file, readError: describeError(error) };
  }
  return { file, source, result: checkSource(source, config) };
}

function scheduleToJson(schedule: Schedule, nameOf: (id: StreamId) => string) {
  return {
    gcd: schedule.gcd.toString(),
    hyperPeriod: schedule.hyperPeriod.toString(),
    deadlines: schedule.deadlines.map(deadline => ({
      pause: deadline.pause.toString(),
      due: deadline.due.map(nameOf),
    })),
  };
}

function programToJson(program: AnalyzedProgram) {
  const names = new Map(program.streams.map(stream => [stream.id, stream.name]));
  const nameOf = (id: StreamId): string => names.get(id) ?? `#${id}`;
  return {
    nameOf,
    streams: program.streams.map(stream => ({
      name: stream.name,
      kind: stream.kind,
      type: formatStreamType(stream.type),
      pacing: formatPacing(stream.pacing, nameOf).replace(/^@ /, ''),
      layer: stream.layer,
      memory: stream.memory.kind === 'samples'
        ? { samples: stream.memory.samples }
        : { samples: stream.memory.samples, duration: stream.memory.duration.toString() },
    })),
    evaluationOrder: program.evaluationOrder.map(nameOf),
  };
}

function diagnosticToJson(file: string, diagnostic: Diagnostic) {
  return {
    file,
    severity: diagnostic.severity,
    code: diagnostic.code,
    message: diagnostic.message,
    line: diagnostic.location.start.line,
    column: diagnostic.location.start.column,
  };
}

/** Timetable as text, e.g. `+0.5s  a, b`. */
function formatSchedule(schedule: Schedule | null, nameOf: (id: StreamId) => string): string {
  if (!schedule) return 'schedule: no periodic streams';
  const lines = [`schedule: gcd ${schedule.gcd.toString()}s, hyper-period ${schedule.hyperPeriod.toString()}s`];
  for (const deadline of schedule.deadlines) {
    lines.push(`  +${deadline.pause.toString()}s  ${deadline.due.map(nameOf).join(', ')}`);
  }
  return lines.join('\n');
}

function printHelp(io: CliIO) {
  io.out(`
cadence <command> [files...] [options]

Commands:
  check <files|globs...>   Parse and analyze Cadence specifications

Options:
  --json             Print the results as JSON
  --dot              Print the stream graph of each file in Graphviz format
  --schedule         Print the periodic schedule of each file
  --no-color         Disable colored output
  --config <path>    Config file (default: ${CONFIG_FILE})
  -h, --help         Show this help

Config file:
  ${CONFIG_FILE} supports eventCombination, frequencyPolicy, allowLookahead,
  warnUnusedInputs and include (globs checked when no files are named)
`);
}

export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const { command, files, args } = parseArgs(argv);
  if (!command || command === '--help' || command === '-h' || command === 'help' || args.has('--help')) {
    printHelp(io);
    return 0;
  }

  const log = createLogger(io, !args.has('--no-color'));
  if (command !== 'check') {
    log.error(`Unknown command '${command}'; run 'cadence --help'`);
    return 1;
  }

  const configArg = args.get('--config');
  const loaded = await loadConfig(io.cwd, typeof configArg === 'string' ? configArg : undefined, log);
  if (!loaded) return 1;

  const patterns = files.length > 0 ? files : loaded.include;
  if (patterns.length === 0) {
    log.error(`No input files; name them or set "include" in ${CONFIG_FILE}`);
    return 1;
  }
  const matched = (await fg(patterns, { cwd: io.cwd, onlyFiles: true, unique: true, dot: false })).sort();
  if (matched.length === 0) {
    log.error(`No files match ${patterns.join(', ')}`);
    return 1;
  }

  const json = args.has('--json');
  const dot = args.has('--dot');
  const withSchedule = args.has('--schedule');
  let failed = 0;
  const jsonFiles: unknown[] = [];

  for (const file of matched) {
    const report = await checkFile(io.cwd, file, loaded.config);
    if ('readError' in report) {
      failed++;
      if (json) jsonFiles.push({ file, success: false, error: report.readError });
      else log.error(`Cannot read ${file}: ${report.readError}`);
      continue;
    }

    const { result, source } = report;
    if (!result.success) failed++;

    if (json) {
      const entry: Record<string, unknown> = {
        file,
        success: result.success,
        diagnostics: result.diagnostics.map(d => diagnosticToJson(file, d)),
      };
      if (result.success) {
        const { nameOf, ...program } = programToJson(result.program);
        Object.assign(entry, program);
        if (withSchedule) {
          const schedule = buildSchedule(result.program);
          entry.schedule = schedule ? scheduleToJson(schedule, nameOf) : null;
        }
      }
      jsonFiles.push(entry);
      continue;
    }

    // Keep stdout clean for the graph.
    const emit = dot ? log.report : log.out;
    emit(result.diagnostics.length > 0
      ? formatDiagnostics(result.diagnostics, source, { useColors: log.useColor, file })
      : `${log.heading(file)}: ${formatSummary([], log.useColor)}`);

    if (!result.success) continue;
    if (dot) log.out(streamGraphToDot(result.program));
    if (withSchedule) {
      const { nameOf } = programToJson(result.program);
      emit(formatSchedule(buildSchedule(result.program), nameOf));
    }
  }

  if (json) {
    io.out(JSON.stringify({ success: failed === 0, files: jsonFiles }, null, 2));
  }
  return failed > 0 ? 1 : 0;
}

if (require.main === module) {
  runCli(process.argv.slice(2), {
    cwd: process.cwd(),
    out: text => console.log(text),
    err: text => console.error(text),
  }).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    }
  );
}
