/**
 * Shared objects and handles - single-threaded reference counting
 *
 * A SharedObject counts the handles bound to it and tears itself down when
 * the last one lets go. Deep copies only ever happen on request: through
 * copy(), or through a CloneContext while a host clones its state.
 */

import { enforce } from './contract';

// Anything a clone context has to reset once the clone is done
interface Forwarded {
  clearForward(context: CloneContext): void;
}

/**
 * Forwarding table for one clone pass. Every store reached through handles
 * that shared it is copied once, so the copies share exactly as the
 * originals did.
 */
export class CloneContext {
  private readonly forwarded: Forwarded[] = [];
  private closed = false;

  /**
   * Run `fn` with a fresh context and close it afterwards.
   */
  static run<R>(fn: (context: CloneContext) => R): R {
    const context = new CloneContext();
    try {
      return fn(context);
    } finally {
      context.close();
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of stores copied so far. */
  get size(): number {
    return this.forwarded.length;
  }

  track(object: Forwarded): void {
    enforce(!this.closed, 'CLOSED_CONTEXT', () => 'clone context is already closed');
    this.forwarded.push(object);
  }

  close(): void {
    if (this.closed) return;
    for (const object of this.forwarded) object.clearForward(this);
    this.forwarded.length = 0;
    this.closed = true;
  }
}

export abstract class SharedObject<O extends SharedObject<O>> {
  private uses = 0;
  // One entry per open clone context that has copied this object
  private fwd: Map<CloneContext, O> | undefined;

  get useCount(): number {
    return this.uses;
  }

  /** Independent deep copy with a use count of zero. */
  abstract copy(): O;

  /** Called once, when the last handle releases the object. */
  protected abstract destroy(): void;

  retain(): void {
    this.uses++;
  }

  /**
   * Drop one use. Returns true when that was the last one and the object
   * has been destroyed.
   */
  release(): boolean {
    enforce(this.uses > 0, 'USE_COUNT_UNDERFLOW', () => 'released an object nobody holds');
    if (--this.uses > 0) return false;
    this.destroy();
    return true;
  }

  /**
   * The copy of this object within `context`, made on first request.
   */
  forward(context: CloneContext): O {
    const known = this.fwd?.get(context);
    if (known !== undefined) return known;
    enforce(!context.isClosed, 'CLOSED_CONTEXT', () => 'clone context is already closed');
    const copy = this.copy();
    this.fwd ??= new Map();
    this.fwd.set(context, copy);
    context.track(this);
    return copy;
  }

  clearForward(context: CloneContext): void {
    this.fwd?.delete(context);
    if (this.fwd?.size === 0) this.fwd = undefined;
  }
}

/**
 * Base for value-like handles over a SharedObject. Holds zero or one object;
 * binding retains, unbinding releases.
 */
export abstract class SharedHandle<O extends SharedObject<O>> {
  private o: O | undefined;
  private released = false;

  get isInitialized(): boolean {
    return this.o !== undefined;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Handles currently bound to the same object; 0 when unbound. */
  get useCount(): number {
    return this.o?.useCount ?? 0;
  }

  shares(other: SharedHandle<O>): boolean {
    return this.o !== undefined && this.o === other.o;
  }

  /**
   * Share `source`'s object, letting go of the one held before.
   */
  assign(source: SharedHandle<O>): this {
    this.alive();
    source.alive();
    const o = source.o;
    if (o === undefined) {
      // Bound never goes back to uninitialized
      enforce(this.o === undefined, 'UNINITIALIZED_HANDLE', () => 'cannot assign an uninitialized handle over a bound one');
      return this;
    }
    this.bind(o);
    return this;
  }

  /**
   * Bind as part of a clone pass: share `source`'s object, or bind to its
   * copy within `context`. Only legal on an unbound handle.
   */
  update(context: CloneContext, share: boolean, source: SharedHandle<O>): this {
    this.unbound();
    source.alive();
    const o = source.o;
    if (o === undefined) return this;
    this.bind(share ? o : o.forward(context));
    return this;
  }

  /**
   * Give up this handle's use. The handle is dead afterwards.
   */
  release(): void {
    this.alive();
    const o = this.o;
    this.o = undefined;
    this.released = true;
    o?.release();
  }

  protected object(): O {
    this.alive();
    const o = this.o;
    enforce(o !== undefined, 'UNINITIALIZED_HANDLE', () => 'handle is not initialized');
    return o;
  }

  protected bind(next: O): void {
    this.alive();
    const prev = this.o;
    if (next === prev) return;
    next.retain();
    this.o = next;
    prev?.release();
  }

  protected unbound(): void {
    this.alive();
    enforce(this.o === undefined, 'ALREADY_INITIALIZED', () => 'handle is already bound');
  }

  private alive(): void {
    enforce(!this.released, 'RELEASED_HANDLE', () => 'handle has been released');
  }
}
