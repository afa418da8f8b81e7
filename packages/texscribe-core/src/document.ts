/**
 * LaTeX document
 *
 * The root of every scope chain. A document collects text in two handlers,
 * the preamble and the body, and records the packages and TikZ libraries the
 * content needs. Nothing touches the disk until the document is closed: only
 * then is the complete source assembled and written to `path`, and, when
 * requested, compiled.
 *
 * ```ts
 * const doc = new LaTeXDocument('out/report.tex', { title: 'Report' });
 * doc.use(() => {
 *   doc.body.writeLine('Hello.');
 * });
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';
import { TeXError, OutputExistsError } from './errors.js';
import { TeXHandler } from './handler.js';
import { Lifecycle, withResource, type Resource } from './resource.js';
import { RequirementRegistry, type PackageOptions } from './requirements.js';
import { OpenChildTracker, type ParentScope } from './scope.js';
import { compileTeX, type CompileOptions, type CompileResult } from './compiler.js';

export interface DocumentOptions {
  documentClass?: string;
  documentOptions?: string;
  /** Packages loaded by every document (default `amsmath`) */
  defaultPackages?: readonly string[];
  title?: string;
  /** Only used together with `title` */
  subtitle?: string;
  author?: string;
  showDate?: boolean;
  showPageNumbers?: boolean;
  /** Soft-wrap preamble and body lines at this width */
  lineWrapLength?: number;
  indentUnit?: string;
  tabWidth?: number;
  /** Replace an existing `.tex` file (default true) */
  overwrite?: boolean;
  /** Compile right after the source has been written */
  compile?: CompileOptions;
}

export const DEFAULT_DOCUMENT_OPTIONS = {
  documentClass: 'article',
  documentOptions: 'a4paper, 12pt',
  defaultPackages: ['amsmath'],
  showDate: false,
  showPageNumbers: false,
  indentUnit: '\t',
  tabWidth: 4,
  overwrite: true,
} as const;

export type DefinitionKind = 'usepackage' | 'usetikzlibrary';

export class LaTeXDocument implements ParentScope {
  readonly lifecycle: Lifecycle = new Lifecycle(this);
  readonly requirements: RequirementRegistry = new RequirementRegistry();

  /** Absolute path of the `.tex` file */
  readonly path: string;
  readonly documentClass: string;
  readonly documentOptions: string;
  readonly title: string | undefined;
  readonly subtitle: string | undefined;
  readonly author: string | undefined;
  readonly showDate: boolean;
  readonly showPageNumbers: boolean;
  readonly overwrite: boolean;
  readonly compileOptions: CompileOptions | undefined;

  private readonly _preamble: TeXHandler;
  private readonly _body: TeXHandler;
  private readonly children = new OpenChildTracker(this);
  private saved = false;
  private _compileResult: CompileResult | undefined;

  constructor(filePath: string, options: DocumentOptions = {}) {
    const defaults = DEFAULT_DOCUMENT_OPTIONS;
    this.path = path.resolve(filePath.toLowerCase().endsWith('.tex') ? filePath : `${filePath}.tex`);
    this.documentClass = options.documentClass ?? defaults.documentClass;
    this.documentOptions = options.documentOptions ?? defaults.documentOptions;
    this.title = options.title;
    this.subtitle = options.subtitle;
    this.author = options.author;
    this.showDate = options.showDate ?? defaults.showDate;
    this.showPageNumbers = options.showPageNumbers ?? defaults.showPageNumbers;
    this.overwrite = options.overwrite ?? defaults.overwrite;
    this.compileOptions = options.compile;

    const handlerOptions = {
      lineWrapLength: options.lineWrapLength,
      indentUnit: options.indentUnit ?? defaults.indentUnit,
      tabWidth: options.tabWidth ?? defaults.tabWidth,
    };
    this._preamble = new TeXHandler({ ...handlerOptions, indentLevel: 0 });
    this._body = new TeXHandler({ ...handlerOptions, indentLevel: 1 });

    for (const name of options.defaultPackages ?? defaults.defaultPackages) {
      this.requirements.requirePackage(name);
    }
  }

  get document(): LaTeXDocument {
    return this;
  }

  /**
   * Handler for text placed before `\begin{document}`
   */
  get preamble(): TeXHandler {
    this.lifecycle.requireOpen('preamble');
    return this._preamble;
  }

  /**
   * Handler for text placed between `\begin{document}` and `\end{document}`
   */
  get body(): TeXHandler {
    this.lifecycle.requireOpen('body');
    return this._body;
  }

  get contentHandler(): TeXHandler {
    return this.body;
  }

  get openChild(): Resource | undefined {
    return this.children.current;
  }

  get hasTitle(): boolean {
    return this.title !== undefined || this.author !== undefined;
  }

  get lineWrapLength(): number | undefined {
    return this._body.lineWrapLength;
  }

  /**
   * Every inclusion statement the preamble will contain, in order
   */
  get definitions(): ReadonlyArray<readonly [DefinitionKind, string]> {
    return [
      ...this.requirements.packageNames.map((name) => ['usepackage', name] as const),
      ...this.requirements.tikzLibraries.map((name) => ['usetikzlibrary', name] as const),
    ];
  }

  /**
   * True once the document has been closed and its `.tex` file exists
   */
  get successfullySavedTex(): boolean {
    return this.lifecycle.isFinished && this.saved && fs.existsSync(this.path);
  }

  /**
   * True once `toPdf()` (or the compile step at close) produced a PDF
   */
  get successfullyCompiled(): boolean {
    return this._compileResult?.success ?? false;
  }

  get compileResult(): CompileResult | undefined {
    return this._compileResult;
  }

  attachChild(child: Resource): void {
    this.children.attach(child);
  }

  detachChild(child: Resource): void {
    this.children.detach(child);
  }

  usePackage(name: string, options?: PackageOptions): void {
    this.lifecycle.requireOpen('usePackage');
    this.requirements.requirePackage(name, options);
  }

  useTikzLibrary(...names: string[]): void {
    this.lifecycle.requireOpen('useTikzLibrary');
    for (const name of names) {
      this.requirements.requireTikzLibrary(name);
    }
  }

  pageBreak(): void {
    this.body.writeLine('\\newpage');
    this.body.newline();
  }

  open(): void {
    this.checkOverwrite();
    this.lifecycle.enter();
    if (process.env.DEBUG_TEX) {
      console.error(`LaTeXDocument: opened ${this.path}`);
    }
    this.writeFrontMatter();
  }

  /**
   * Close the document and write its source. When `error` is given the
   * scope ended with a failure and nothing is written.
   */
  close(error?: unknown): void {
    this.children.requireNone('close the document');
    this.lifecycle.exit();

    if (error !== undefined) {
      if (process.env.DEBUG_TEX) {
        console.error(`LaTeXDocument: not writing ${this.path} after error:`, error);
      }
      return;
    }

    this.checkOverwrite();
    try {
      fs.mkdirSync(path.dirname(this.path), { recursive: true });
      fs.writeFileSync(this.path, this.toString(), 'utf-8');
    } catch (err) {
      throw new TeXError(`Error while writing to '${this.path}'`, this, { cause: err });
    }
    this.saved = true;
    if (process.env.DEBUG_TEX) {
      console.error(`LaTeXDocument: wrote ${this.path}`);
    }

    if (this.compileOptions) {
      this.toPdf(this.compileOptions);
    }
  }

  /**
   * Open the document, run `body` and close it on every exit path
   */
  use<T>(body: (document: this) => T): T {
    return withResource(this, body);
  }

  /**
   * Compile the written `.tex` file. A failing engine is reported in the
   * result and in `successfullyCompiled`, not thrown.
   */
  toPdf(options: CompileOptions = {}): CompileResult {
    this.lifecycle.requireUsed('toPdf');
    this._compileResult = undefined;
    const result = compileTeX(this.path, options, this);
    this._compileResult = result;
    if (!result.success && process.env.DEBUG_TEX) {
      console.error(`LaTeXDocument: compiling ${this.path} failed: ${result.error}`);
    }
    return result;
  }

  /**
   * The complete LaTeX source in its current state
   */
  toString(): string {
    const classOptions = this.documentOptions.trim() === '' ? '' : `[${this.documentOptions}]`;
    const sections = [
      `\\documentclass${classOptions}{${this.documentClass}}`,
      '',
      '% ---- packages ----',
      ...this.requirements.definitionLines(),
      '',
      '% ---- preamble ----',
      this._preamble.toString(),
      '',
      '% ---- body ----',
      '\\begin{document}',
      this._body.toString(),
      '\\end{document}',
      '',
    ];
    return sections.join('\n');
  }

  describe(): string {
    return `LaTeXDocument(${path.basename(this.path)}, ${this.lifecycle.state})`;
  }

  private checkOverwrite(): void {
    if (!this.overwrite && fs.existsSync(this.path)) {
      throw new OutputExistsError(this.path, this);
    }
  }

  private writeFrontMatter(): void {
    if (this.hasTitle) {
      this._body.writeLine('\\maketitle');
      this._body.newline();
      if (this.title !== undefined) {
        if (this.subtitle !== undefined) {
          this.requirements.requirePackage('relsize');
          this._preamble.writeLine(`\\title{${this.title}\\\\[0.4em]\\smaller{${this.subtitle}}}`);
        } else {
          this._preamble.writeLine(`\\title{${this.title}}`);
        }
      }
      if (this.author !== undefined) {
        this._preamble.writeLine(`\\author{${this.author}}`);
      }
      if (!this.showDate) {
        this._preamble.writeLine('\\date{}');
      }
    }

    if (!this.showPageNumbers) {
      this._preamble.writeLine('\\pagenumbering{gobble}');
    }
  }
}
