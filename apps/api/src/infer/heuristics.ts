import type { EngineConfig } from '../config';
import type {
  ColumnProfile,
  Dataset,
  KeyCandidate,
  RelationshipCandidate,
  RelationshipType
} from '../types/schema';
import { nameSimilarity } from '../utils/similarity';
import { ratio, round } from '../utils/values';
import { DistinctValueCache } from './distinct-cache';
import { keyedColumns } from './keys';

export type SnapshotEntry = {
  readonly dataset: Dataset;
  readonly profiles: readonly ColumnProfile[];
  readonly keyCandidates: readonly KeyCandidate[];
};

/** Read-only view of every analysed dataset in a session. */
export type SessionSnapshot = {
  readonly entries: readonly SnapshotEntry[];
};

export const createSnapshot = (entries: SnapshotEntry[]): SessionSnapshot => ({
  entries: Object.freeze([...entries])
});

export const createDistinctCache = (snapshot: SessionSnapshot) =>
  new DistinctValueCache(new Map(snapshot.entries.map(e => [e.dataset.name, e.dataset])));

const isTextLike = (p: ColumnProfile) => p.semanticType === 'text' || p.semanticType === 'identifier';

export const typesCompatible = (a: ColumnProfile, b: ColumnProfile, config: EngineConfig) => {
  if (!a.nonMissingCount || !b.nonMissingCount) return false;
  const sa = a.semanticType;
  const sb = b.semanticType;
  if (sa === 'numeric' && sb === 'numeric') return true;
  if (sa === 'identifier' && sb === 'identifier') return true;
  if (sa === 'text' && sb === 'text') {
    const low = Math.min(a.distinctCount, b.distinctCount);
    const high = Math.max(a.distinctCount, b.distinctCount);
    return ratio(low, high) >= config.relationships.textCardinalityRatio;
  }
  // a repeated text column referencing an identifier column elsewhere
  if (isTextLike(a) && isTextLike(b)) {
    const [key, ref] = sa === 'identifier' ? [a, b] : [b, a];
    return ref.distinctCount <= key.distinctCount;
  }
  return false;
};

export const valueOverlap = (a: ReadonlySet<string>, b: ReadonlySet<string>) => {
  if (!a.size || !b.size) return { forward: 0, backward: 0, score: 0 };
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let shared = 0;
  small.forEach(v => {
    if (large.has(v)) shared++;
  });
  const forward = shared / a.size;
  const backward = shared / b.size;
  const score = forward + backward > 0 ? (2 * forward * backward) / (forward + backward) : 0;
  return { forward, backward, score };
};

const relationshipType = (keyedFrom: boolean, keyedTo: boolean): RelationshipType => {
  if (keyedFrom && keyedTo) return 'ONE_TO_ONE';
  if (keyedFrom || keyedTo) return 'ONE_TO_MANY';
  return 'MANY_TO_MANY';
};

const pairKey = (r: RelationshipCandidate) =>
  JSON.stringify(
    [JSON.stringify([r.from.dataset, ...r.from.columns]), JSON.stringify([r.to.dataset, ...r.to.columns])].sort()
  );

const pointsAtKey = (r: RelationshipCandidate) => r.oneSide !== null && r.oneSide === r.to.dataset;

const preferred = (next: RelationshipCandidate, current: RelationshipCandidate) => {
  if (next.strength !== current.strength) return next.strength > current.strength;
  return pointsAtKey(next) && !pointsAtKey(current);
};

/**
 * Scores every type-compatible column pair across distinct datasets and keeps the
 * pairs whose match strength clears the threshold, one edge per unordered column pair.
 */
export const detectRelationships = (
  snapshot: SessionSnapshot,
  config: EngineConfig,
  cache: DistinctValueCache = createDistinctCache(snapshot)
): RelationshipCandidate[] => {
  const { nameWeight, overlapWeight, minMatchStrength, nameAnchorScore } = config.relationships;
  const weightTotal = nameWeight + overlapWeight;
  const keyed = new Map(snapshot.entries.map(e => [e.dataset.name, keyedColumns(e.keyCandidates)]));
  const edges = new Map<string, RelationshipCandidate>();

  for (const source of snapshot.entries) {
    for (const target of snapshot.entries) {
      const from = source.dataset.name;
      const to = target.dataset.name;
      if (from === to) continue;

      for (const sourceCol of source.profiles) {
        for (const targetCol of target.profiles) {
          if (!typesCompatible(sourceCol, targetCol, config)) continue;

          const keyedFrom = keyed.get(from)?.has(sourceCol.name) ?? false;
          const keyedTo = keyed.get(to)?.has(targetCol.name) ?? false;
          const nameScore = nameSimilarity(sourceCol.name, targetCol.name, from, to);
          if (nameScore < nameAnchorScore && !keyedFrom && !keyedTo) continue;

          const overlap = valueOverlap(cache.get(from, sourceCol.name), cache.get(to, targetCol.name));
          const strength = weightTotal > 0 ? (nameWeight * nameScore + overlapWeight * overlap.score) / weightTotal : 0;
          if (strength <= minMatchStrength) continue;

          const type = relationshipType(keyedFrom, keyedTo);
          const candidate: RelationshipCandidate = {
            from: { dataset: from, columns: [sourceCol.name] },
            to: { dataset: to, columns: [targetCol.name] },
            type,
            strength: round(strength),
            oneSide: type === 'ONE_TO_MANY' ? (keyedTo ? to : from) : null,
            rationale: `Name similarity (${nameScore.toFixed(2)}), value overlap (${overlap.score.toFixed(2)}: ${overlap.forward.toFixed(2)} of ${from}.${sourceCol.name} in ${to}, ${overlap.backward.toFixed(2)} of ${to}.${targetCol.name} in ${from})`,
            evidence: {
              nameScore: round(nameScore),
              overlapScore: round(overlap.score),
              forwardOverlap: round(overlap.forward),
              backwardOverlap: round(overlap.backward)
            }
          };

          const key = pairKey(candidate);
          const current = edges.get(key);
          if (!current || preferred(candidate, current)) edges.set(key, candidate);
        }
      }
    }
  }

  return Array.from(edges.values()).sort((a, b) => b.strength - a.strength);
};
