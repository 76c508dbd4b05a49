import type { RequestPredicate } from './predicate';
import type {
  BuilderSnapshot,
  ExpectationOutcome,
  ExpectedMethod,
  HttpMethod,
  ResponseKind,
} from './types';

/**
 * A registered rule: which request gets which canned outcome.
 */
export interface Expectation<T = unknown> {
  /**
   * Registration sequence number, starting at 1.
   */
  readonly id: number;
  readonly method: ExpectedMethod;
  readonly kind: ResponseKind;
  readonly strategy: 'structural' | 'builder';
  /**
   * Template as the caller supplied it.
   */
  readonly template: string;
  readonly normalizedTemplate: string;
  /**
   * Present for builder-identity expectations.
   */
  readonly builder?: BuilderSnapshot;
  readonly outcome: ExpectationOutcome<T>;
  readonly predicate?: RequestPredicate;
}

export type NewExpectation<T = unknown> = Omit<Expectation<T>, 'id'>;

/**
 * Append-only multimap of expectations keyed by method and normalized
 * template. Lookups preserve registration order; the first full match wins.
 */
export class ExpectationRegistry {
  private readonly byKey = new Map<string, Expectation[]>();
  private readonly ordered: Expectation[] = [];
  private nextId = 1;
  private readonly ignoreCase: boolean;

  constructor(options?: { ignoreCase?: boolean }) {
    this.ignoreCase = options?.ignoreCase ?? true;
  }

  get size(): number {
    return this.ordered.length;
  }

  register<T>(expectation: NewExpectation<T>): Expectation<T> {
    const stored: Expectation<T> = Object.freeze({ ...expectation, id: this.nextId++ });
    const key = this.makeKey(stored.method, stored.normalizedTemplate);
    const bucket = this.byKey.get(key) ?? [];
    bucket.push(stored);
    this.byKey.set(key, bucket);
    this.ordered.push(stored);
    return stored;
  }

  /**
   * Expectations registered for `method` (or for any method) under the given
   * normalized template, in registration order.
   */
  candidatesFor(method: HttpMethod, normalizedTemplate: string): Expectation[] {
    const exact = this.byKey.get(this.makeKey(method, normalizedTemplate)) ?? [];
    const any = this.byKey.get(this.makeKey('ANY', normalizedTemplate)) ?? [];
    if (any.length === 0) {
      return [...exact];
    }
    if (exact.length === 0) {
      return [...any];
    }
    return [...exact, ...any].sort((a, b) => a.id - b.id);
  }

  all(): Expectation[] {
    return [...this.ordered];
  }

  clear(): void {
    this.byKey.clear();
    this.ordered.length = 0;
  }

  private makeKey(method: ExpectedMethod, normalizedTemplate: string): string {
    const template = this.ignoreCase ? normalizedTemplate.toLowerCase() : normalizedTemplate;
    return `${method} ${template}`;
  }
}
