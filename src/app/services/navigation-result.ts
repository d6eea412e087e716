export class NavigationResult {
  private constructor(
    readonly success: boolean,
    readonly error?: unknown
  ) {
    Object.freeze(this);
  }

  static succeeded(): NavigationResult {
    return new NavigationResult(true);
  }

  static failed(error: unknown): NavigationResult {
    return new NavigationResult(false, error);
  }
}
