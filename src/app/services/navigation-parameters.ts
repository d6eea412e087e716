import { NavigationDirection } from './region-navigation.interface';

export const KnownNavigationParameters = {
  NavigationDirection: '__NavigationDirection'
} as const;

/**
 * Ordered key/value bag handed to every hook of a navigation.
 * Keys keep the position of their first insertion.
 */
export class NavigationParameters {
  private readonly values = new Map<string, unknown>();

  constructor(init?: Iterable<readonly [string, unknown]> | Record<string, unknown>) {
    if (!init) return;

    const pairs = isIterable(init) ? init : Object.entries(init);
    for (const [key, value] of pairs) {
      this.values.set(key, value);
    }
  }

  get size(): number {
    return this.values.size;
  }

  set(key: string, value: unknown): this {
    this.values.set(key, value);
    return this;
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  entries(): Array<[string, unknown]> {
    return [...this.values.entries()];
  }
}

export function getNavigationDirection(parameters: NavigationParameters): NavigationDirection | undefined {
  const value = parameters.get(KnownNavigationParameters.NavigationDirection);
  return isNavigationDirection(value) ? value : undefined;
}

function isNavigationDirection(value: unknown): value is NavigationDirection {
  return Object.values<unknown>(NavigationDirection).includes(value);
}

function isIterable(value: object): value is Iterable<readonly [string, unknown]> {
  return Symbol.iterator in value && typeof value[Symbol.iterator] === 'function';
}
