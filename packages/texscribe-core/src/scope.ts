/**
 * Parent/child bookkeeping for nested scopes
 */

import { NestingError, type Describable } from './errors.js';
import type { TeXHandler } from './handler.js';
import type { Resource } from './resource.js';
import type { LaTeXDocument } from './document.js';

/**
 * A resource that environments can be nested in
 */
export interface ParentScope extends Resource {
  /** Root document of the scope chain */
  readonly document: LaTeXDocument;
  /** Handler that closing children flush their lines into */
  readonly contentHandler: TeXHandler;
  /** The child that is open right now, if any */
  readonly openChild: Resource | undefined;
  attachChild(child: Resource): void;
  detachChild(child: Resource): void;
}

/**
 * Tracks the single child a scope may have open at a time
 */
export class OpenChildTracker {
  private child: Resource | undefined;

  constructor(private readonly owner: Describable) {}

  get current(): Resource | undefined {
    return this.child;
  }

  attach(child: Resource): void {
    if (this.child) {
      throw new NestingError(
        `Cannot open ${child.describe()} while its sibling ${this.child.describe()} is still open`,
        this.owner
      );
    }
    this.child = child;
  }

  detach(child: Resource): void {
    if (this.child !== child) {
      throw new NestingError(`${child.describe()} is not the open child of this scope`, this.owner);
    }
    this.child = undefined;
  }

  /**
   * Fail if a child is still open
   */
  requireNone(operation: string): void {
    if (this.child) {
      throw new NestingError(`Cannot ${operation} while ${this.child.describe()} is still open`, this.owner);
    }
  }
}
