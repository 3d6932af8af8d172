/**
 * Feature name → features it directly enables, iterated in name order so that
 * labels, snapshots and reports come out the same on every run.
 */
export class FeatureMap {
  private readonly map = new Map<string, string[]>()

  /** Unions a plain record into this map. */
  merge(record: Readonly<Record<string, readonly string[]>>): void {
    for (const [name, subs] of Object.entries(record)) {
      this.enable(name)
      for (const sub of subs) this.append(name, sub)
    }
  }

  /** Adds `name` with no sub-features; keeps the existing list when already present. */
  enable(name: string): void {
    if (!this.map.has(name)) this.map.set(name, [])
  }

  /** Records that `name` enables `sub`. Repeated pairs are stored once. */
  append(name: string, sub: string): void {
    const subs = this.map.get(name)
    if (!subs) {
      this.map.set(name, [sub])
    } else if (!subs.includes(sub)) {
      subs.push(sub)
    }
  }

  has(name: string): boolean {
    return this.map.has(name)
  }

  get(name: string): readonly string[] | undefined {
    return this.map.get(name)
  }

  get size(): number {
    return this.map.size
  }

  entries(): [string, readonly string[]][] {
    return [...this.map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  }

  toRecord(): Record<string, string[]> {
    const record: Record<string, string[]> = {}
    for (const [name, subs] of this.entries()) record[name] = [...subs]
    return record
  }
}

/**
 * One line per feature, `name(sub,sub)` when it enables others:
 * `{ default: ['std'], std: [] }` becomes `"default(std),\nstd"`.
 */
export function formatFeatures(features: FeatureMap): string {
  return features
    .entries()
    .map(([name, subs]) => (subs.length === 0 ? name : `${name}(${subs.join(',')})`))
    .join(',\n')
}
