/**
 * Directive and posting annotations. Insertion order is output order.
 */
export type Metadata = ReadonlyMap<string, string>

export const EMPTY_METADATA: Metadata = new Map()

export function toMetadata(entries?: Record<string, string>): Metadata {
  return entries === undefined ? EMPTY_METADATA : new Map(Object.entries(entries))
}
