/**
 * # App-level error. Should be displayed to callers
 */
export abstract class AppError extends Error {
  public abstract readonly code: string;

  // eslint-disable-next-line class-methods-use-this
  public shouldBeLogged(): boolean {
    return false;
  }

  /**
   * Whether the same call may succeed later without the caller changing
   * anything (e.g. the pool was exhausted, the store was unreachable).
   */
  // eslint-disable-next-line class-methods-use-this
  public retryable(): boolean {
    return false;
  }

  public devMessage(): string {
    return this.message;
  }

  public payload(): object | undefined {
    return undefined;
  }
}
