/**
 * @file Copy-on-write vector over borrowed or owned typed-array storage
 *
 * A `CowVector` is in one of three modes:
 * - `empty`: no storage at all
 * - `borrowed`: a read-only view into bytes owned by someone else (usually a
 *   `Region`), guarded by that owner's lease
 * - `owned`: an exclusively owned, growable array
 *
 * Readers (`size`, `at`, `data`, ...) never copy. Writers (`set`, `push`,
 * `resize`, `mutableData`, ...) first go through `promote()`, which copies a
 * borrowed view into owned storage exactly once and forgets the view.
 */
import type { ElementType, Lease, NumericArray, ReadonlyNumericArray, Scalar, VectorMode } from "../types";
import { AttachToOwnedError, ElementMismatchError, OutOfRangeError, StaleBorrowError } from "../errors";
import {
  createOwned,
  ownedCapacity,
  ownedData,
  ownedFrom,
  ownedPop,
  ownedPush,
  ownedResize,
  ownedSwap,
  type OwnedArray,
} from "../owned/array";

type State<T extends Scalar> =
  | { mode: "empty" }
  | { mode: "borrowed"; view: NumericArray<T>; lease: Lease }
  | { mode: "owned"; store: OwnedArray<T> };

/** Reported once per borrowed-to-owned transition. */
export type PromoteEvent = {
  elem: string;
  copied: number;
  lease: string;
};

export type CowVectorOptions = {
  /** Bound-check `get()` as well; off by default like an optimized build. */
  assertions?: boolean;
  onPromote?: (e: PromoteEvent) => void;
};

function checkIndex(index: number, size: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new OutOfRangeError(index, size);
  }
}

/**
 * Array-like container that attaches zero-copy to foreign bytes and promotes
 * itself to owned storage on first mutation.
 */
// eslint-disable-next-line no-restricted-syntax -- stateful container with a method surface mirroring a dynamic array
export class CowVector<T extends Scalar> implements Iterable<T> {
  readonly elem: ElementType<T>;
  private state: State<T> = { mode: "empty" };
  private readonly assertions: boolean;
  private readonly onPromote?: (e: PromoteEvent) => void;

  constructor(elem: ElementType<T>, opts: CowVectorOptions = {}) {
    this.elem = elem;
    this.assertions = opts.assertions ?? false;
    this.onPromote = opts.onPromote;
  }

  get mode(): VectorMode {
    return this.state.mode;
  }

  /** Lease label while borrowed, otherwise undefined. */
  get borrowedFrom(): string | undefined {
    return this.state.mode === "borrowed" ? this.state.lease.label : undefined;
  }

  /**
   * Attach to a foreign view. Length and capacity both become `view.length`.
   * Legal from `empty` or `borrowed`; an owned vector refuses.
   */
  attach(view: NumericArray<T>, lease: Lease): void {
    if (this.state.mode === "owned") {
      throw new AttachToOwnedError();
    }
    if (!lease.alive) {
      throw new StaleBorrowError(lease.label);
    }
    this.state = { mode: "borrowed", view, lease };
  }

  // ---- reads -------------------------------------------------------------

  get size(): number {
    const s = this.state;
    if (s.mode === "owned") {
      return s.store.length;
    }
    if (s.mode === "borrowed") {
      return s.view.length;
    }
    return 0;
  }

  get capacity(): number {
    const s = this.state;
    if (s.mode === "owned") {
      return ownedCapacity(s.store);
    }
    if (s.mode === "borrowed") {
      return s.view.length;
    }
    return 0;
  }

  get empty(): boolean {
    return this.size === 0;
  }

  /**
   * Current contiguous storage, read-only. While borrowed this is the attached
   * view itself.
   */
  data(): ReadonlyNumericArray<T> {
    return this.readable();
  }

  /** Checked read. */
  at(index: number): T {
    const view = this.readable();
    checkIndex(index, view.length);
    return view[index];
  }

  /** Unchecked read; the bound is only asserted when `assertions` is on. */
  get(index: number): T {
    const view = this.readable();
    if (this.assertions) {
      checkIndex(index, view.length);
    }
    return view[index];
  }

  front(): T {
    return this.at(0);
  }

  back(): T {
    return this.at(this.size - 1);
  }

  toArray(): T[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Iterator<T> {
    const view = this.readable();
    for (let i = 0; i < view.length; i++) {
      yield view[i];
    }
  }

  // ---- writes ------------------------------------------------------------

  /** Checked write. */
  set(index: number, value: T): void {
    checkIndex(index, this.size);
    const store = this.promote();
    store.buf[index] = value;
  }

  /** Mutable view into owned storage; promotes first. */
  mutableData(): NumericArray<T> {
    return ownedData(this.promote());
  }

  push(value: T): void {
    ownedPush(this.promote(), value);
  }

  /** Remove and return the last element, or undefined when empty. */
  pop(): T | undefined {
    return ownedPop(this.promote());
  }

  resize(n: number, fill: T = this.elem.zero): void {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`length must be a non-negative integer, got ${n}`);
    }
    ownedResize(this.promote(), n, fill);
  }

  /** Exchange contents with an externally owned array of the same kind. */
  swap(other: OwnedArray<T>): void {
    if (other.elem.name !== this.elem.name) {
      throw new ElementMismatchError(this.elem.name, other.elem.name);
    }
    ownedSwap(this.promote(), other);
  }

  /** Back to `empty`. Owned storage is dropped; a borrowed view is forgotten, never freed. */
  clear(): void {
    this.state = { mode: "empty" };
  }

  // ---- transitions -------------------------------------------------------

  private readable(): NumericArray<T> {
    const s = this.state;
    if (s.mode === "owned") {
      return ownedData(s.store);
    }
    if (s.mode === "borrowed") {
      if (!s.lease.alive) {
        throw new StaleBorrowError(s.lease.label);
      }
      return s.view;
    }
    return this.elem.alloc(0);
  }

  /** Single entry point for every mutator: returns owned storage, copying a borrowed view once. */
  private promote(): OwnedArray<T> {
    const s = this.state;
    if (s.mode === "owned") {
      return s.store;
    }
    if (s.mode === "empty") {
      const store = createOwned(this.elem);
      this.state = { mode: "owned", store };
      return store;
    }
    if (!s.lease.alive) {
      throw new StaleBorrowError(s.lease.label);
    }
    const store = ownedFrom(this.elem, s.view);
    this.state = { mode: "owned", store };
    this.onPromote?.({ elem: this.elem.name, copied: store.length, lease: s.lease.label });
    return store;
  }
}

/** Build an owned vector holding a copy of `values`. */
export function cowFrom<T extends Scalar>(
  elem: ElementType<T>,
  values: ArrayLike<T>,
  opts?: CowVectorOptions,
): CowVector<T> {
  const v = new CowVector(elem, opts);
  v.swap(ownedFrom(elem, values));
  return v;
}
