import { InvalidReleaseError, StateReleasedError } from './stateTypes.js';

// Brand symbol so a foreign object in a callable's data can't pose as a capsule.
const kCapsule = Symbol.for('enginebind.StateCapsule');

export type StateCell<T> = {
  value: T;
  strong: number;
  label: string;
};

/**
 * Owning handle to application state, reference counted.
 *
 * `clone()` adds an owner, `release()` drops one; the value is dropped when
 * the last owner releases it. Capsules borrow without owning.
 */
export class SharedState<T> {
  private released = false;

  private constructor(private readonly cell: StateCell<T>) {}

  static create<T>(value: T, opts?: { label?: string }): SharedState<T> {
    return new SharedState({ value, strong: 1, label: opts?.label ?? 'state' });
  }

  get strongCount(): number {
    return this.cell.strong;
  }

  get alive(): boolean {
    return this.cell.strong > 0;
  }

  get value(): T {
    this.assertAlive();
    return this.cell.value;
  }

  clone(): SharedState<T> {
    this.assertAlive();
    this.cell.strong++;
    return new SharedState(this.cell);
  }

  release(): void {
    if (this.released) {
      throw new InvalidReleaseError(`${this.cell.label}: handle already released`);
    }
    this.released = true;
    this.cell.strong--;
  }

  /**
   * Non-owning view for registration data. The strong count is unchanged:
   * the caller keeps an owner alive for as long as the callable is
   * registered.
   */
  capsule(): StateCapsule<T> {
    this.assertAlive();
    return new StateCapsule(this.cell);
  }

  private assertAlive() {
    if (!this.alive || this.released) {
      throw new StateReleasedError(`Use after release: ${this.cell.label}`);
    }
  }
}

export class StateCapsule<T> {
  readonly [kCapsule] = true;

  constructor(private readonly cell: StateCell<T>) {}

  get label(): string {
    return this.cell.label;
  }

  get alive(): boolean {
    return this.cell.strong > 0;
  }

  /** Borrowed access; never adjusts the strong count. */
  borrow(): T {
    if (!this.alive) {
      throw new StateReleasedError(
        `Use after release: ${this.cell.label} was dropped while a callable still borrowed it`,
      );
    }
    return this.cell.value;
  }

  static isStateCapsule(v: unknown): v is StateCapsule<unknown> {
    return v instanceof StateCapsule && v[kCapsule] === true;
  }
}
