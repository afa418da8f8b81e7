/**
 * External TeX compiler invocation
 *
 * texscribe never typesets anything itself. A finished `.tex` file is handed
 * to a TeX engine running as a child process; the engine writes into a private
 * auxiliary directory and, on success, the PDF is moved to its destination.
 *
 * A failing engine is an expected outcome and is reported through the
 * returned `CompileResult`. Only an engine that exceeds its time limit is
 * treated as fatal.
 */

import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { CompilerTimeoutError, OutputExistsError, type Describable } from './errors.js';

export const TEX_ENGINES = ['pdflatex', 'xelatex', 'lualatex'] as const;

export type TeXEngine = (typeof TEX_ENGINES)[number];

export const DEFAULT_COMPILE_TIMEOUT_MS = 120_000;

/**
 * What a finished child process reported
 */
export interface ProcessOutcome {
  status: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be started or was killed */
  error?: Error;
  timedOut: boolean;
}

export interface RunOptions {
  cwd: string;
  timeoutMs: number;
}

/**
 * Runs a command to completion. Swapped out in tests.
 */
export type ProcessRunner = (command: string, args: readonly string[], options: RunOptions) => ProcessOutcome;

function isTimeout(error: Error | undefined): boolean {
  return error !== undefined && 'code' in error && error.code === 'ETIMEDOUT';
}

export const spawnRunner: ProcessRunner = (command, args, { cwd, timeoutMs }) => {
  const result = spawnSync(command, [...args], {
    cwd,
    timeout: timeoutMs,
    encoding: 'utf-8',
    shell: false,
  });
  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    error: result.error,
    timedOut: isTimeout(result.error),
  };
};

export interface CompileOptions {
  /** Where the PDF goes (default: next to the `.tex` file) */
  outFile?: string;
  engine?: TeXEngine;
  /** Replace an existing PDF (default false) */
  overwrite?: boolean;
  /** Remove the auxiliary directory after a successful run (default true) */
  deleteAuxFiles?: boolean;
  /** Extra command line arguments for the engine */
  customOptions?: readonly string[];
  timeoutMs?: number;
  runner?: ProcessRunner;
}

export interface CompileResult {
  success: boolean;
  pdfPath: string;
  exitCode: number | null;
  /** Engine output (stdout followed by stderr) */
  log: string;
  command: readonly string[];
  /** Why the run failed, when it did */
  error?: string;
}

/**
 * PDF path for `texPath` given an optional explicit output file
 */
export function resolvePdfPath(texPath: string, outFile?: string): string {
  const target = path.resolve(outFile ?? texPath.replace(/\.tex$/i, ''));
  return target.toLowerCase().endsWith('.pdf') ? target : `${target}.pdf`;
}

/**
 * Compile `texPath` with an external TeX engine
 *
 * @throws OutputExistsError if the PDF exists and `overwrite` is not set
 * @throws CompilerTimeoutError if the engine runs longer than `timeoutMs`
 */
export function compileTeX(texPath: string, options: CompileOptions = {}, source?: Describable): CompileResult {
  const {
    engine = 'pdflatex',
    overwrite = false,
    deleteAuxFiles = true,
    customOptions = [],
    timeoutMs = DEFAULT_COMPILE_TIMEOUT_MS,
    runner = spawnRunner,
  } = options;

  const texFile = path.resolve(texPath);
  const pdfPath = resolvePdfPath(texFile, options.outFile);
  if (!overwrite && fs.existsSync(pdfPath)) {
    throw new OutputExistsError(pdfPath, source);
  }

  const outDir = path.dirname(pdfPath);
  const jobName = path.basename(pdfPath, path.extname(pdfPath));
  const auxDir = path.join(outDir, `.${jobName}-aux`);
  fs.mkdirSync(auxDir, { recursive: true });

  const args = [
    '-interaction=nonstopmode',
    '-halt-on-error',
    `-output-directory=${auxDir}`,
    `-jobname=${jobName}`,
    ...customOptions,
    path.basename(texFile),
  ];
  const command = [engine, ...args];

  if (process.env.DEBUG_TEX) {
    console.error(`compileTeX: ${command.join(' ')} (cwd ${path.dirname(texFile)})`);
  }

  const outcome = runner(engine, args, { cwd: path.dirname(texFile), timeoutMs });
  const log = outcome.stdout + outcome.stderr;

  if (outcome.timedOut) {
    throw new CompilerTimeoutError(engine, timeoutMs, source);
  }

  if (process.env.DEBUG_TEX) {
    console.error(`compileTeX: ${engine} exited with ${outcome.status}`);
  }

  const producedPdf = path.join(auxDir, `${jobName}.pdf`);
  let error: string | undefined;
  if (outcome.error) {
    error = `Could not run ${engine}: ${outcome.error.message}`;
  } else if (outcome.status !== 0) {
    error = `${engine} exited with code ${outcome.status}`;
  } else if (!fs.existsSync(producedPdf)) {
    error = `${engine} finished but did not produce ${producedPdf}`;
  }

  if (error !== undefined) {
    return { success: false, pdfPath, exitCode: outcome.status, log, command, error };
  }

  fs.renameSync(producedPdf, pdfPath);
  if (deleteAuxFiles) {
    fs.rmSync(auxDir, { recursive: true, force: true });
  }
  return { success: true, pdfPath, exitCode: outcome.status, log, command };
}
