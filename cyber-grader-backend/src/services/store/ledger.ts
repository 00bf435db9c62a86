/**
 * Append-only attempt history. Records are frozen on the way in and kept in
 * insertion order, both overall and per composite key.
 */
export class AttemptLedger<T extends { user_id: string }> {
  private readonly entries: Readonly<T>[] = [];
  private readonly byKey: Map<string, Readonly<T>[]> = new Map();

  constructor(private readonly keyOf: (record: T) => readonly string[]) {}

  private static encode(parts: readonly string[]): string {
    return JSON.stringify(parts);
  }

  append(record: T): Readonly<T> {
    const frozen = Object.freeze({ ...record });
    const key = AttemptLedger.encode(this.keyOf(frozen));

    this.entries.push(frozen);
    const bucket = this.byKey.get(key);
    if (bucket) {
      bucket.push(frozen);
    } else {
      this.byKey.set(key, [frozen]);
    }
    return frozen;
  }

  forKey(...parts: string[]): Readonly<T>[] {
    return [...(this.byKey.get(AttemptLedger.encode(parts)) ?? [])];
  }

  forUser(userId: string): Readonly<T>[] {
    return this.entries.filter((entry) => entry.user_id === userId);
  }

  all(): Readonly<T>[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
