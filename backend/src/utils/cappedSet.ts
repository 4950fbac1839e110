/** Insertion-ordered set that drops its oldest members past a fixed cap. */
export class CappedSet<T> {
  private readonly items = new Set<T>();

  constructor(private readonly limit: number) {}

  has(value: T): boolean {
    return this.items.has(value);
  }

  add(value: T): void {
    if (this.items.has(value)) return;
    this.items.add(value);
    while (this.items.size > this.limit) {
      const oldest = this.items.values().next();
      if (oldest.done) break;
      this.items.delete(oldest.value);
    }
  }

  clear(): void {
    this.items.clear();
  }
}
