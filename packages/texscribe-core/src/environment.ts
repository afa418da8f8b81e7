/**
 * LaTeX environments
 *
 * An environment is a scope nested in a document or in another environment.
 * While open it collects its content in its own handler. Closing it wraps the
 * content in `\begin{name}` / `\end{name}`, indents it one level (by default)
 * and appends the result to the parent's handler at the parent's current
 * indentation. Requirements declared on the environment reach the document
 * when it closes.
 *
 * ```ts
 * doc.use(() => {
 *   new Center(doc).use((center) => {
 *     new LaTeXEnvironment(center, 'equation').use((eq) => eq.writeLine('a^2 + b^2 = c^2'));
 *   });
 * });
 * ```
 */

import { NestingError } from './errors.js';
import { TeXHandler } from './handler.js';
import { Lifecycle, withResource, type Resource } from './resource.js';
import { RequirementRegistry, type PackageOptions } from './requirements.js';
import { OpenChildTracker, type ParentScope } from './scope.js';
import { texMathsString, type MathValue } from './utils.js';
import type { LaTeXDocument } from './document.js';

export interface EnvironmentOptions {
  /** Options after `\begin{name}`; brackets are added when missing */
  options?: string;
  requiredPackages?: readonly string[];
  /** Indentation of the content relative to the begin/end lines (default 1) */
  indentLevel?: number;
  /** Allow the environment to be opened again after closing */
  reusable?: boolean;
}

function normalizeOptions(options: string): string {
  const trimmed = options.trim();
  if (trimmed === '' || (trimmed.startsWith('[') && trimmed.endsWith(']'))) {
    return trimmed;
  }
  return `[${trimmed}]`;
}

export class LaTeXEnvironment implements ParentScope {
  readonly lifecycle: Lifecycle;
  readonly parent: ParentScope;
  readonly name: string;
  readonly options: string;
  readonly indentLevel: number;

  /** Requirements collected while open, merged into the document on close */
  protected readonly requirements = new RequirementRegistry();
  protected handler: TeXHandler = new TeXHandler();
  private readonly children = new OpenChildTracker(this);
  private readonly requiredPackages: readonly string[];

  constructor(parent: ParentScope, name: string, options: EnvironmentOptions = {}) {
    this.parent = parent;
    this.name = name;
    this.options = normalizeOptions(options.options ?? '');
    this.indentLevel = options.indentLevel ?? 1;
    this.requiredPackages = options.requiredPackages ?? [];
    this.lifecycle = new Lifecycle(this, options.reusable ?? false);
  }

  /**
   * Root document of this environment; a relation, not ownership
   */
  get document(): LaTeXDocument {
    return this.parent.document;
  }

  get contentHandler(): TeXHandler {
    this.lifecycle.requireOpen('contentHandler');
    return this.handler;
  }

  get openChild(): Resource | undefined {
    return this.children.current;
  }

  get beginText(): string {
    return `\\begin{${this.name}}${this.options}`;
  }

  get endText(): string {
    return `\\end{${this.name}}`;
  }

  attachChild(child: Resource): void {
    this.children.attach(child);
  }

  detachChild(child: Resource): void {
    this.children.detach(child);
  }

  open(): void {
    if (!this.parent.lifecycle.isOpen) {
      throw new NestingError(
        `Cannot open ${this.describe()} because its parent ${this.parent.describe()} is not open`,
        this
      );
    }
    const sibling = this.parent.openChild;
    if (sibling) {
      throw new NestingError(
        `Cannot open ${this.describe()} while ${sibling.describe()} is still open in the same parent`,
        this
      );
    }
    this.lifecycle.enter();
    this.parent.attachChild(this);
    this.handler = new TeXHandler();
    for (const name of this.requiredPackages) {
      this.requirements.requirePackage(name);
    }
    this.onOpen();
  }

  /**
   * Close the environment and flush its content into the parent. The flush
   * also happens when the scope ended with `error`.
   */
  close(error?: unknown): void {
    this.children.requireNone(`close ${this.describe()}`);
    this.lifecycle.requireOpen('close');
    if (!this.parent.lifecycle.isOpen) {
      throw new NestingError(`Parent ${this.parent.describe()} was closed before ${this.describe()}`, this);
    }

    try {
      this.beforeClose(error);
    } finally {
      this.parent.contentHandler.append(this.render());
      this.document.requirements.merge(this.requirements);
      this.lifecycle.exit();
      this.parent.detachChild(this);
    }
  }

  /**
   * Open the environment, run `body` and close it on every exit path
   */
  use<T>(body: (environment: this) => T): T {
    return withResource(this, body);
  }

  /**
   * Append `text` to the current line
   */
  write(text: string): void {
    this.lifecycle.requireOpen('write');
    this.handler.write(text);
  }

  writeLine(text: string = ''): void {
    this.lifecycle.requireOpen('writeLine');
    this.handler.writeLine(text);
  }

  newline(count: number = 1): void {
    this.lifecycle.requireOpen('newline');
    this.handler.newline(count);
  }

  requirePackage(name: string, options?: PackageOptions): void {
    this.lifecycle.requireOpen('requirePackage');
    this.requirements.requirePackage(name, options);
  }

  requireTikzLibrary(...names: string[]): void {
    this.lifecycle.requireOpen('requireTikzLibrary');
    for (const name of names) {
      this.requirements.requireTikzLibrary(name);
    }
  }

  describe(): string {
    return `${this.constructor.name}(${this.name}, ${this.lifecycle.state})`;
  }

  toString(): string {
    return this.render().toString();
  }

  /**
   * Called right after the environment has been opened
   */
  protected onOpen(): void {}

  /**
   * Called before the content is flushed; may still write
   */
  protected beforeClose(_error: unknown): void {}

  /**
   * Handlers placed before the begin line, at the indentation of the
   * environment itself
   */
  protected leadingSections(): TeXHandler[] {
    return [];
  }

  /**
   * Handlers placed between the begin and end lines, in order
   */
  protected sections(): TeXHandler[] {
    return [this.handler];
  }

  private render(): TeXHandler {
    const out = new TeXHandler();
    for (const section of this.leadingSections()) {
      out.append(section);
    }
    out.writeLine(this.beginText);
    out.pushIndent(this.indentLevel);
    for (const section of this.sections()) {
      out.append(section);
    }
    out.popIndent();
    out.writeLine(this.endText);
    out.newline();
    return out;
  }
}

export interface CenterOptions {
  indentLevel?: number;
}

/**
 * The standard `center` environment
 */
export class Center extends LaTeXEnvironment {
  constructor(parent: ParentScope, options: CenterOptions = {}) {
    super(parent, 'center', { indentLevel: options.indentLevel });
  }
}

export interface FigureOptions {
  caption?: string;
  /** Reference label, `fig:` is prepended when missing */
  label?: string;
  /** Placement specifier (default `h!`) */
  options?: string;
  indentLevel?: number;
}

/**
 * The standard `figure` environment, with caption and label written when it
 * closes
 */
export class Figure extends LaTeXEnvironment {
  readonly caption: string | undefined;
  private readonly rawLabel: string | undefined;

  constructor(parent: ParentScope, options: FigureOptions = {}) {
    super(parent, 'figure', { options: options.options ?? 'h!', indentLevel: options.indentLevel });
    this.caption = options.caption;
    this.rawLabel = options.label;
  }

  get label(): string | undefined {
    if (this.rawLabel !== undefined && !this.rawLabel.startsWith('fig:')) {
      return `fig:${this.rawLabel}`;
    }
    return this.rawLabel;
  }

  /**
   * Write `\listoffigures` straight into the document body. The body only
   * receives the figure when the figure closes, so the list lands before the
   * figure, not where this call sits inside it.
   */
  writeFigureTable(): void {
    this.document.body.writeLine('\\listoffigures');
  }

  protected override beforeClose(): void {
    this.handler.finishLine();
    if (this.caption !== undefined) {
      this.handler.writeLine(`\\caption{${this.caption}}`);
    }
    const label = this.label;
    if (label !== undefined) {
      this.handler.writeLine(`\\label{${label}}`);
    }
  }
}

export interface MathsEnvironmentOptions {
  /** Use the starred (unnumbered) variant (default true) */
  star?: boolean;
  indentLevel?: number;
}

/**
 * An amsmath display environment such as `gather*` or `align*`. Values are
 * formatted with `texMathsString` and `newline()` emits a `\\` row break.
 */
export class MathsEnvironment extends LaTeXEnvironment {
  constructor(parent: ParentScope, environmentName: string, options: MathsEnvironmentOptions = {}) {
    super(parent, `${environmentName}${options.star ?? true ? '*' : ''}`, {
      requiredPackages: ['amsmath'],
      indentLevel: options.indentLevel,
    });
  }

  override write(value: MathValue): void {
    super.write(texMathsString(value));
  }

  override writeLine(value: MathValue = ''): void {
    super.writeLine(texMathsString(value));
  }

  override newline(count: number = 1): void {
    this.lifecycle.requireOpen('newline');
    for (let i = 0; i < count; i++) {
      this.handler.writeLine(this.handler.atLineStart ? '\\\\' : ' \\\\');
    }
  }
}
