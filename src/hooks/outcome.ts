/**
 * Hook Outcome
 *
 * Holds either the result of a hook call or the error it raised. Wrappers
 * receive one in their after-phase and may replace what it carries.
 */

type OutcomeState<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: unknown };

export class HookOutcome<T = unknown> {
  private state: OutcomeState<T>;

  private constructor(state: OutcomeState<T>) {
    this.state = state;
  }

  static success<T>(value: T): HookOutcome<T> {
    return new HookOutcome<T>({ ok: true, value });
  }

  static failure<T = unknown>(error: unknown): HookOutcome<T> {
    return new HookOutcome<T>({ ok: false, error });
  }

  /**
   * Run `fn` and capture what it returns or throws.
   */
  static fromCall<T>(fn: () => T): HookOutcome<T> {
    try {
      return HookOutcome.success(fn());
    } catch (err: unknown) {
      return HookOutcome.failure<T>(err);
    }
  }

  get failed(): boolean {
    return !this.state.ok;
  }

  /** The captured error, or undefined for a successful outcome. */
  get error(): unknown {
    return this.state.ok ? undefined : this.state.error;
  }

  /**
   * Replace the outcome with `value`, discarding any captured error.
   */
  forceResult(value: T): void {
    this.state = { ok: true, value };
  }

  /**
   * Replace the outcome with `error`.
   */
  forceError(error: unknown): void {
    this.state = { ok: false, error };
  }

  /**
   * Return the result, or re-throw the captured error.
   */
  getResult(): T {
    if (this.state.ok) return this.state.value;
    throw this.state.error;
  }
}
