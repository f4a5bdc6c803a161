/**
 * Authoritative map of live sessions. Insert on connect, remove on disconnect;
 * each id is present at most once.
 */
export class SessionRegistry<T> {
  private readonly entries = new Map<string, T>();

  insert(id: string, value: T): boolean {
    if (this.entries.has(id)) return false;
    this.entries.set(id, value);
    return true;
  }

  get(id: string): T | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  remove(id: string): T | undefined {
    const value = this.entries.get(id);
    if (value === undefined) return undefined;
    this.entries.delete(id);
    return value;
  }

  get size(): number {
    return this.entries.size;
  }

  ids(): string[] {
    return Array.from(this.entries.keys());
  }
}
