/**
 * Manifest lineage traversal
 *
 * Follows `parentManifestId` links from a record towards its oldest
 * ancestor. Records never check their parent, so any link may be dangling
 * or circular; this walker reports where and why it stopped instead of
 * failing.
 */
import { LIMITS, type RecordId } from '@provrec/kernel';
import type { ProvenanceRecord } from '@provrec/record';

/**
 * Look up a record by identity. Return undefined when it is not found.
 */
export type RecordResolver = (
  id: RecordId
) => ProvenanceRecord | undefined | Promise<ProvenanceRecord | undefined>;

export interface LineageOptions {
  /** Maximum parent hops (default: LIMITS.maxLineageDepth) */
  maxDepth?: number;
}

/**
 * Why traversal stopped:
 * - `root`: reached a record without a parent
 * - `missing`: the resolver did not find a parent
 * - `cycle`: a parent link points back into the walked chain
 * - `max_depth`: stopped at the hop limit
 */
export type LineageEnd = 'root' | 'missing' | 'cycle' | 'max_depth';

export interface LineageResult {
  /** Walked records, starting record first */
  chain: ProvenanceRecord[];
  /** Parent hops followed */
  depth: number;
  end: LineageEnd;
  /** Parent identity that could not be followed (unset when end is `root`) */
  unresolved?: RecordId;
}

/**
 * @example
 * ```typescript
 * const lineage = await walkManifestLineage(record, (id) => ledger.get(id));
 * if (lineage.end === 'missing') {
 *   console.warn(`Parent ${lineage.unresolved} is gone`);
 * }
 * ```
 */
export async function walkManifestLineage(
  start: ProvenanceRecord,
  resolve: RecordResolver,
  options: LineageOptions = {}
): Promise<LineageResult> {
  const maxDepth = options.maxDepth ?? LIMITS.maxLineageDepth;
  const chain: ProvenanceRecord[] = [start];
  const visited = new Set<RecordId>([start.id]);

  let parentId = start.parentManifestId;
  while (parentId !== undefined) {
    const depth = chain.length - 1;

    if (visited.has(parentId)) {
      return { chain, depth, end: 'cycle', unresolved: parentId };
    }
    if (depth >= maxDepth) {
      return { chain, depth, end: 'max_depth', unresolved: parentId };
    }

    const parent = await resolve(parentId);
    if (!parent) {
      return { chain, depth, end: 'missing', unresolved: parentId };
    }

    chain.push(parent);
    visited.add(parentId);
    visited.add(parent.id);
    parentId = parent.parentManifestId;
  }

  return { chain, depth: chain.length - 1, end: 'root' };
}
