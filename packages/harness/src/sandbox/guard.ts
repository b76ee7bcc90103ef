/**
 * Single-transaction policy.
 *
 * A TransactionGuard instruments `serialize()` on the chain library's
 * transaction classes for the duration of one execution. The first call
 * passes through; every later call throws. The violation stays recorded
 * even if the code unit catches the error.
 */

export const POLICY_VIOLATION_MESSAGE =
  'At most one transaction may be built per turn. Split the work across turns instead of serializing several transactions.';

export class PolicyViolationError extends Error {
  readonly attempt: number;

  constructor(attempt: number) {
    super(POLICY_VIOLATION_MESSAGE);
    this.name = 'PolicyViolationError';
    this.attempt = attempt;
  }
}

/** A class whose instances are serialized into wire transactions. */
export interface GuardTarget {
  name: string;
  prototype: object;
}

export class TransactionGuard {
  private attempts = 0;
  private violation: PolicyViolationError | null = null;
  private restores: Array<() => void> = [];

  install(targets: GuardTarget[]): void {
    if (this.restores.length > 0) {
      throw new Error('TransactionGuard is already installed');
    }
    for (const target of targets) {
      this.patch(target);
    }
  }

  uninstall(): void {
    // Reverse order so stacked patches unwind cleanly
    for (const restore of this.restores.reverse()) {
      restore();
    }
    this.restores = [];
  }

  get serializeCount(): number {
    return this.attempts;
  }

  get violated(): PolicyViolationError | null {
    return this.violation;
  }

  private patch(target: GuardTarget): void {
    const proto = target.prototype;
    const original: unknown = Reflect.get(proto, 'serialize');
    if (typeof original !== 'function') {
      throw new Error(`${target.name} has no serialize method to guard`);
    }
    const wasOwn = Object.prototype.hasOwnProperty.call(proto, 'serialize');
    const guard = this;

    Reflect.set(proto, 'serialize', function guardedSerialize(this: unknown, ...args: unknown[]): unknown {
      guard.attempts += 1;
      if (guard.attempts > 1) {
        const error = new PolicyViolationError(guard.attempts);
        guard.violation ??= error;
        throw error;
      }
      return Reflect.apply(original, this, args);
    });

    this.restores.push(() => {
      if (wasOwn) {
        Reflect.set(proto, 'serialize', original);
      } else {
        Reflect.deleteProperty(proto, 'serialize');
      }
    });
  }
}
