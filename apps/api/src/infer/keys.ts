import type { EngineConfig } from '../config';
import type { ColumnProfile, Dataset, KeyCandidate } from '../types/schema';
import { isIdentifierName } from '../utils/similarity';
import { ratio, round } from '../utils/values';

type Ranked = { candidate: KeyCandidate; position: number };

const clamp = (value: number) => Math.min(1, Math.max(0, value));

const isHighConfidence = (profile: ColumnProfile, config: EngineConfig) =>
  profile.missingCount === 0 && profile.distinctRatio >= config.keys.highConfidenceUniqueness;

const compareRanked = (a: Ranked, b: Ranked) => {
  if (b.candidate.confidence !== a.candidate.confidence) return b.candidate.confidence - a.candidate.confidence;
  if (a.candidate.columns.length !== b.candidate.columns.length) {
    return a.candidate.columns.length - b.candidate.columns.length;
  }
  const hintA = a.candidate.columns.some(isIdentifierName) ? 1 : 0;
  const hintB = b.candidate.columns.some(isIdentifierName) ? 1 : 0;
  if (hintA !== hintB) return hintB - hintA;
  return a.position - b.position;
};

const singleColumnCandidates = (dataset: Dataset, profiles: ColumnProfile[], config: EngineConfig): Ranked[] =>
  profiles.flatMap((profile, position) => {
    if (!profile.nonMissingCount || profile.missingRatio > config.keys.maxMissingRatio) return [];
    const confidence = clamp(profile.distinctRatio - config.keys.missingPenalty * profile.missingRatio);
    if (confidence < config.keys.minConfidence) return [];
    return [
      {
        position,
        candidate: {
          dataset: dataset.name,
          columns: [profile.name],
          uniquenessRatio: round(profile.distinctRatio),
          nullRatio: round(profile.missingRatio),
          confidence: round(confidence)
        }
      }
    ];
  });

const pairCandidate = (dataset: Dataset, profiles: ColumnProfile[], config: EngineConfig): Ranked | null => {
  const rowCount = dataset.rows.length;
  const eligible = profiles
    .map((profile, position) => ({ profile, position }))
    .filter(({ profile }) => profile.nonMissingCount > 0 && profile.missingRatio <= config.keys.maxMissingRatio)
    .sort((a, b) => b.profile.distinctRatio - a.profile.distinctRatio || a.position - b.position);

  let tested = 0;
  for (let i = 0; i < eligible.length; i++) {
    for (let j = i + 1; j < eligible.length; j++) {
      if (tested >= config.keys.maxPairCombinations) return null;
      tested++;

      const first = eligible[i];
      const second = eligible[j];
      const tuples = new Set(dataset.rows.map(row => JSON.stringify([row[first.position], row[second.position]])));
      const uniqueness = ratio(tuples.size, rowCount);
      if (uniqueness < config.keys.highConfidenceUniqueness) continue;

      const nullRatio = Math.max(first.profile.missingRatio, second.profile.missingRatio);
      const confidence = clamp(uniqueness - config.keys.missingPenalty * nullRatio);
      return {
        position: Math.min(first.position, second.position),
        candidate: {
          dataset: dataset.name,
          columns: [first.profile.name, second.profile.name],
          uniquenessRatio: round(uniqueness),
          nullRatio: round(nullRatio),
          confidence: round(confidence)
        }
      };
    }
  }
  return null;
};

/**
 * Ranks columns, and column pairs when no single column is a near-certain key,
 * by suitability as a unique row identifier. Deterministic for a given dataset.
 */
export const detectKeyCandidates = (
  dataset: Dataset,
  profiles: ColumnProfile[],
  config: EngineConfig
): KeyCandidate[] => {
  if (dataset.rows.length < config.keys.minRows) return [];

  const ranked = singleColumnCandidates(dataset, profiles, config);
  if (!profiles.some(p => isHighConfidence(p, config))) {
    const pair = pairCandidate(dataset, profiles, config);
    if (pair) ranked.push(pair);
  }

  return ranked.sort(compareRanked).map(r => r.candidate);
};

export const isConfidentKey = (candidate: KeyCandidate, config: EngineConfig) =>
  candidate.confidence >= config.keys.highConfidenceUniqueness;

/** Single-column key candidate membership, used for relationship directionality. */
export const keyedColumns = (candidates: readonly KeyCandidate[]) =>
  new Set(candidates.filter(c => c.columns.length === 1).map(c => c.columns[0]));
