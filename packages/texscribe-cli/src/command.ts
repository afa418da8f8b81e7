/**
 * The texscribe command
 *
 * texscribe <input.json> [-o out.tex] [--pdf [out.pdf]] [--engine name]
 *           [--overwrite] [--keep-aux] [--timeout ms]
 */

import { Command } from 'commander';
import * as fs from 'fs';
import { z } from 'zod';
import {
  DEFAULT_COMPILE_TIMEOUT_MS,
  TEX_ENGINES,
  TeXError,
  TeXValueError,
  type CompileOptions,
  type LaTeXDocument,
} from 'texscribe-core';
import { parseDescription } from './schema.js';
import { renderDocument } from './render.js';

export const VERSION = '0.1.0';

export const CliOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  pdf: z.union([z.string().min(1), z.boolean()]).optional(),
  engine: z.enum(TEX_ENGINES),
  overwrite: z.boolean(),
  keepAux: z.boolean(),
  timeout: z.coerce.number().int().positive(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function parseCliOptions(raw: unknown): CliOptions {
  const result = CliOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
    throw new TeXValueError(`Invalid options: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * `.tex` path for `inputFile` when no output is given
 */
export function defaultOutputPath(inputFile: string): string {
  return `${inputFile.replace(/\.json$/i, '')}.tex`;
}

/**
 * Read, validate and render `inputFile`
 *
 * @throws TeXError when the input is missing or compiling was asked for and failed
 */
export function runTexscribe(inputFile: string, options: CliOptions): LaTeXDocument {
  if (!fs.existsSync(inputFile)) {
    throw new TeXError(`Input file not found: ${inputFile}`);
  }
  const description = parseDescription(fs.readFileSync(inputFile, 'utf-8'), inputFile);

  let compile: CompileOptions | undefined;
  if (options.pdf !== undefined && options.pdf !== false) {
    compile = {
      outFile: typeof options.pdf === 'string' ? options.pdf : undefined,
      engine: options.engine,
      overwrite: options.overwrite,
      deleteAuxFiles: !options.keepAux,
      timeoutMs: options.timeout,
    };
  }

  const document = renderDocument(description, options.output ?? defaultOutputPath(inputFile), {
    overwrite: options.overwrite,
    compile,
  });
  if (compile !== undefined && !document.successfullyCompiled) {
    const reason = document.compileResult?.error ?? 'no result';
    throw new TeXError(`Compiling ${document.path} failed: ${reason}`);
  }
  return document;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('texscribe')
    .description('Render a JSON document description to LaTeX and, optionally, PDF')
    .version(VERSION)
    .argument('<input>', 'JSON document description')
    .option('-o, --output <file>', 'Output .tex file (default: the input path with .tex)')
    .option('--pdf [file]', 'Compile the written source, optionally to the given PDF path')
    .option('--engine <name>', 'TeX engine (pdflatex, xelatex, lualatex)', 'pdflatex')
    .option('--overwrite', 'Replace existing .tex and PDF files', false)
    .option('--keep-aux', 'Keep the auxiliary files of the TeX engine', false)
    .option('--timeout <ms>', 'Time limit of the TeX engine in milliseconds', String(DEFAULT_COMPILE_TIMEOUT_MS))
    .action((inputFile: string, rawOptions: unknown) => {
      try {
        const document = runTexscribe(inputFile, parseCliOptions(rawOptions));
        const result = document.compileResult;
        console.log(result?.success ? `Wrote ${document.path} and ${result.pdfPath}` : `Wrote ${document.path}`);
      } catch (error) {
        if (error instanceof Error) {
          console.error('Error:', error.message);
          if (process.env.DEBUG) {
            console.error(error.stack);
          }
        } else {
          console.error('Error:', error);
        }
        process.exitCode = 1;
      }
    });

  return program;
}
