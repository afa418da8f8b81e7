/**
 * Resource lifecycle
 *
 * Documents, environments and pictures share one state machine:
 *
 *   VIRGIN --open--> OPEN --close--> CLOSED
 *                      ^                (reusable resources stop at USED
 *                      +----open------- USED   and may be opened again)
 *
 * Writes are only legal while OPEN. Finalized output may only be read once the
 * resource has been opened and closed at least once.
 */

import { LifecycleError, type Describable } from './errors.js';

export enum ResourceState {
  Virgin = 'virgin',
  Open = 'open',
  Used = 'used',
  Closed = 'closed',
}

/**
 * Anything with an open/close scope
 */
export interface Resource extends Describable {
  readonly lifecycle: Lifecycle;
  open(): void;
  /**
   * Close the scope. `error` is the failure that ended the scope early, if any.
   */
  close(error?: unknown): void;
}

// Lifecycles that are currently open, reported at process exit
const openLifecycles = new Set<Lifecycle>();
let exitHookInstalled = false;

function installExitHook(): void {
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.once('exit', () => {
    const unclosed = unclosedResources();
    if (unclosed.length > 0) {
      console.error(`texscribe: ${unclosed.length} resource(s) were never closed, their markup is incomplete:`);
      for (const description of unclosed) {
        console.error(`  ${description}`);
      }
    }
  });
}

/**
 * Descriptions of every resource that is open right now
 */
export function unclosedResources(): string[] {
  return [...openLifecycles].map((lifecycle) => lifecycle.owner.describe());
}

/**
 * Open/closed state machine composed into every resource
 */
export class Lifecycle {
  private _state: ResourceState = ResourceState.Virgin;
  private _openCount: number = 0;

  constructor(
    readonly owner: Describable,
    readonly reusable: boolean = false
  ) {}

  get state(): ResourceState {
    return this._state;
  }

  get openCount(): number {
    return this._openCount;
  }

  get isOpen(): boolean {
    return this._state === ResourceState.Open;
  }

  /**
   * True once the resource has been opened and closed at least once
   */
  get isFinished(): boolean {
    return this._state === ResourceState.Used || this._state === ResourceState.Closed;
  }

  enter(): void {
    switch (this._state) {
      case ResourceState.Open:
        throw new LifecycleError(`Cannot open ${this.ownerName()} while it is already open`, this.owner);
      case ResourceState.Closed:
        throw new LifecycleError(`Cannot open ${this.ownerName()} more than once`, this.owner);
      case ResourceState.Used:
      case ResourceState.Virgin:
        break;
    }
    this._state = ResourceState.Open;
    this._openCount++;
    openLifecycles.add(this);
    installExitHook();
  }

  exit(): void {
    if (this._state !== ResourceState.Open) {
      throw new LifecycleError(`Cannot close ${this.ownerName()} because it is ${this._state}`, this.owner);
    }
    this._state = this.reusable ? ResourceState.Used : ResourceState.Closed;
    openLifecycles.delete(this);
  }

  requireOpen(operation: string): void {
    if (this._state !== ResourceState.Open) {
      this.fail('be open', operation);
    }
  }

  requireNotOpen(operation: string): void {
    if (this._state === ResourceState.Open) {
      this.fail('be closed', operation);
    }
  }

  requireVirgin(operation: string): void {
    if (this._openCount > 0) {
      this.fail('not have been opened at any point', operation);
    }
  }

  requireUsed(operation: string): void {
    if (!this.isFinished) {
      this.fail('have been opened and closed at least once', operation);
    }
  }

  private fail(requirement: string, operation: string): never {
    throw new LifecycleError(
      `The ${this.ownerName()} must ${requirement} before calling '${operation}' (currently ${this._state})`,
      this.owner
    );
  }

  private ownerName(): string {
    return this.owner.constructor.name;
  }
}

/**
 * Open `resource`, run `body` and close the resource again on every exit
 * path. When `body` throws, the resource is closed with the error and the
 * error is rethrown.
 */
export function withResource<R extends Resource, T>(resource: R, body: (resource: R) => T): T {
  resource.open();
  let result: T;
  try {
    result = body(resource);
  } catch (error) {
    try {
      resource.close(error);
    } catch (closeError) {
      // rethrow the failure of the body, not this one
      console.error(`Error while closing ${resource.describe()}:`, closeError);
    }
    throw error;
  }
  resource.close();
  return result;
}
