import type { Metadata, MetadataValue } from '../types.js'

/**
 * Document and paragraph context in effect at the current sample.
 *
 * Attributes are ranked by the order in which their names first appeared, so
 * an outer marker (`newdoc id`) outranks an inner one (`newpar id`). Updating
 * an attribute drops every lower-ranked attribute the same update does not
 * set again.
 */
export class MetadataContext {
  private readonly current: Metadata = new Map()
  private readonly ranks: string[] = []

  /**
   * Entries that differ from what an output last received, in source order.
   */
  changesSince(written: ReadonlyMap<string, MetadataValue>): MetadataValue[] {
    const changes: MetadataValue[] = []
    for (const [name, value] of this.current) {
      if (written.get(name)?.lineNo !== value.lineNo) changes.push(value)
    }

    return changes.sort((a, b) => a.lineNo - b.lineNo)
  }

  snapshot(): Metadata {
    return new Map(this.current)
  }

  update(metadata: ReadonlyMap<string, MetadataValue>): void {
    if (metadata.size === 0) return

    for (const name of metadata.keys()) {
      if (!this.ranks.includes(name)) this.ranks.push(name)
    }

    const outermost = Math.min(...[...metadata.keys()].map((name) => this.ranks.indexOf(name)))
    for (const name of this.ranks.slice(outermost + 1)) {
      if (!metadata.has(name)) this.current.delete(name)
    }

    for (const [name, value] of metadata) {
      this.current.set(name, value)
    }
  }
}
