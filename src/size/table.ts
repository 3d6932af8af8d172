import { parseSizeReport, type SizeReport } from './report.js'

/**
 * Short-name → byte count.
 *
 * Several versions of one crate share a short-name, and the size report only
 * has one entry for all of them, so {@link SizeTable.normalize} splits an entry
 * evenly between the nodes carrying that name.
 */
export class SizeTable {
  private readonly sizes = new Map<string, number>()
  private normalized = false

  static fromReport(report: SizeReport): SizeTable {
    const table = new SizeTable()
    for (const { name, size } of report.crates) table.sizes.set(name, size)
    return table
  }

  static parse(text: string): SizeTable {
    return SizeTable.fromReport(parseSizeReport(text))
  }

  get(short: string): number | undefined {
    return this.sizes.get(short)
  }

  /** Adds `bytes` onto an entry, creating it at zero when absent. */
  add(short: string, bytes: number): void {
    this.sizes.set(short, (this.sizes.get(short) ?? 0) + bytes)
  }

  get isNormalized(): boolean {
    return this.normalized
  }

  /** Floor-divides every entry by its node count. Runs once; later calls are no-ops. */
  normalize(counts: ReadonlyMap<string, number>): void {
    if (this.normalized) return
    for (const [name, size] of this.sizes) {
      const count = counts.get(name) ?? 1
      this.sizes.set(name, Math.floor(size / Math.max(count, 1)))
    }
    this.normalized = true
  }

  entries(): [string, number][] {
    return [...this.sizes.entries()]
  }

  get size(): number {
    return this.sizes.size
  }
}
