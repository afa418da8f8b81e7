/**
 * TikZ pictures and scopes
 *
 * A picture is a LaTeX environment with a namespace of named objects. Named
 * objects (colors, nodes) are registered the first time they are written or
 * needed by something that is written:
 *
 * - colors of the picture's own style are defined right before it begins
 * - objects needed by a written object are defined at the start of the
 *   picture, before any other content
 * - a named object written directly is drawn where it is written
 *
 * Registering the same object again, or another object with the same name
 * and the same definition, does nothing. Another object with the same name
 * and a different definition raises a `NameConflictError`, or is registered
 * under a fresh name when the picture was created with
 * `onDuplicateName: 'rename'`. An object written after one of its named
 * objects was renamed refers to the new name.
 *
 * ```ts
 * new TikZPicture(center).use((tikz) => {
 *   tikz.write(new TikZPath([new Point(0, 0), new Point(1, 1)]));
 * });
 * ```
 */

import { NameConflictError, NestingError, TeXHandler, LaTeXEnvironment, type ParentScope } from 'texscribe-core';
import {
  definesNamed,
  isNamed,
  namedResolver,
  type TikZDefinesNamed,
  type TikZNamed,
  type TikZWriteable,
} from './base.js';
import { TikZStyle } from './style.js';

export type DuplicateNamePolicy = 'error' | 'rename';

export interface TikZPictureOptions {
  /** Options of the picture itself */
  style?: TikZStyle;
  /** Objects already defined outside the picture, such as colors in the preamble */
  definedNamedObjects?: readonly TikZNamed[];
  onDuplicateName?: DuplicateNamePolicy;
  indentLevel?: number;
}

interface Registration {
  object: TikZNamed;
  isNew: boolean;
}

export class TikZPicture extends LaTeXEnvironment {
  readonly style: TikZStyle;
  readonly onDuplicateName: DuplicateNamePolicy;

  private readonly initialNamedObjects: readonly TikZNamed[];
  private defined = new Map<string, TikZNamed>();
  private openStyle: TikZStyle;
  private leading: TeXHandler = new TeXHandler();
  private definitions: TeXHandler = new TeXHandler();

  constructor(parent: ParentScope, options: TikZPictureOptions = {}, environmentName: string = 'tikzpicture') {
    const style = options.style ?? new TikZStyle();
    super(parent, environmentName, {
      options: style.toString(),
      requiredPackages: ['tikz'],
      indentLevel: options.indentLevel,
    });
    this.style = style;
    this.openStyle = style;
    this.onDuplicateName = options.onDuplicateName ?? 'error';
    this.initialNamedObjects = options.definedNamedObjects ?? [];
  }

  /**
   * Every object registered in this namespace, in registration order
   */
  get definedNamedObjects(): readonly TikZNamed[] {
    return [...this.defined.values()];
  }

  isDefined(name: string): boolean {
    return this.defined.has(name);
  }

  /**
   * The begin line, with the colors of the picture's style as defined when
   * it opened
   */
  override get beginText(): string {
    const options = this.openStyle.toString();
    return options === '' ? `\\begin{${this.name}}` : `\\begin{${this.name}}[${options}]`;
  }

  /**
   * Define objects at the start of the picture. Objects they depend on are
   * defined first.
   *
   * @returns the registered objects, renamed where the duplicate policy did so
   */
  defineNamedObject(...objects: TikZNamed[]): TikZNamed[] {
    this.lifecycle.requireOpen('defineNamedObject');
    return this.defineInto(this.definitions, objects);
  }

  /**
   * Write text, or an object followed by `;` on a line of its own. The
   * requirements and named dependencies of an object are registered first.
   */
  override write(value: TikZWriteable | string): void {
    if (typeof value === 'string') {
      super.write(value);
      return;
    }
    this.drawObject(value);
  }

  /**
   * Draw a named object where it is written
   *
   * @returns the object as registered, renamed where the duplicate policy did so
   */
  drawNamed(object: TikZNamed): TikZNamed {
    const drawn = this.drawObject(object);
    return isNamed(drawn) ? drawn : object;
  }

  protected override onOpen(): void {
    this.leading = new TeXHandler();
    this.definitions = new TeXHandler();
    const inherited = this.inheritedNamedObjects();
    this.defined = new Map(inherited.map((object): [string, TikZNamed] => [object.name, object]));
    const colors = this.style.colors;
    const resolve = namedResolver(colors, this.defineInto(this.leading, colors));
    this.openStyle = resolve === undefined ? this.style : this.style.withColors(resolve);
  }

  protected override leadingSections(): TeXHandler[] {
    return [this.leading];
  }

  protected override sections(): TeXHandler[] {
    return [this.definitions, this.handler];
  }

  /**
   * Objects in the namespace when the picture opens
   */
  protected inheritedNamedObjects(): readonly TikZNamed[] {
    return this.initialNamedObjects;
  }

  private drawObject(value: TikZWriteable): TikZWriteable {
    this.lifecycle.requireOpen('write');
    this.requirements.declare(value);
    const written = definesNamed(value) ? this.resolveRequired(this.definitions, value) : value;

    let text: string;
    let drawn: TikZWriteable = written;
    if (isNamed(written) && written.name !== '') {
      const { object, isNew } = this.register(written);
      drawn = object;
      if (!isNew) return drawn;
      text = object.definition;
    } else {
      text = isNamed(written) ? written.definition : written.toTikZ();
    }

    if (text !== '') {
      this.handler.finishLine();
      this.handler.writeLine(text.endsWith(';') ? text : `${text};`);
    }
    return drawn;
  }

  /**
   * Define the named objects `value` needs into `target`, and return `value`
   * referring to them as registered
   */
  private resolveRequired(target: TeXHandler, value: TikZDefinesNamed): TikZDefinesNamed {
    const required = value.requiredNamedObjects;
    const resolve = namedResolver(required, this.defineInto(target, required));
    return resolve === undefined ? value : value.withNamedObjects(resolve);
  }

  private defineInto(target: TeXHandler, objects: readonly TikZNamed[]): TikZNamed[] {
    const result: TikZNamed[] = [];
    for (const original of objects) {
      let object = original;
      if (definesNamed(original)) {
        const resolved = this.resolveRequired(target, original);
        if (isNamed(resolved)) {
          object = resolved;
        }
      }
      const { object: registered, isNew } = this.register(object);
      if (isNew) {
        this.requirements.declare(registered);
        target.writeLine(registered.definition);
      }
      result.push(registered);
    }
    return result;
  }

  private register(object: TikZNamed): Registration {
    const existing = this.defined.get(object.name);
    if (existing === undefined) {
      this.defined.set(object.name, object);
      return { object, isNew: true };
    }
    if (existing === object || existing.definition === object.definition) {
      return { object: existing, isNew: false };
    }
    if (this.onDuplicateName === 'error') {
      throw new NameConflictError(object.name, this);
    }
    for (const [name, candidate] of this.defined) {
      if (name.startsWith(`${object.name}_`) && object.renamed(name).definition === candidate.definition) {
        return { object: candidate, isNew: false };
      }
    }

    const renamed = object.renamed(this.uniqueName(object.name));
    if (process.env.DEBUG_TEX) {
      console.error(`${this.describe()}: '${object.name}' is taken, defining it as '${renamed.name}'`);
    }
    this.defined.set(renamed.name, renamed);
    return { object: renamed, isNew: true };
  }

  private uniqueName(name: string): string {
    let counter = 2;
    while (this.defined.has(`${name}_${counter}`)) {
      counter++;
    }
    return `${name}_${counter}`;
  }
}

export interface TikZScopeOptions {
  style?: TikZStyle;
  onDuplicateName?: DuplicateNamePolicy;
  indentLevel?: number;
}

/**
 * A `scope` inside a picture. The scope starts with the names its picture
 * has defined when the scope opens; names it defines stay local to it.
 */
export class TikZScope extends TikZPicture {
  readonly picture: TikZPicture;

  constructor(parent: TikZPicture, options: TikZScopeOptions = {}) {
    if (!(parent instanceof TikZPicture)) {
      throw new NestingError('A TikZScope must be nested in a TikZPicture or another TikZScope');
    }
    super(
      parent,
      {
        style: options.style,
        onDuplicateName: options.onDuplicateName ?? parent.onDuplicateName,
        indentLevel: options.indentLevel,
      },
      'scope'
    );
    this.picture = parent;
  }

  protected override inheritedNamedObjects(): readonly TikZNamed[] {
    return this.picture.definedNamedObjects;
  }
}
