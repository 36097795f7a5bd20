import type { ColumnProfile, DataDictionaryEntry, KeyCandidate } from '../types/schema';
import { firstMatch, type Rule } from '../utils/rules';
import { isIdentifierName } from '../utils/similarity';
import { round } from '../utils/values';

type ColumnFacts = {
  profile: ColumnProfile;
  primaryKey: boolean;
  keyCandidate: boolean;
  compositeKey: boolean;
};

const CATEGORICAL_MAX_DISTINCT_SHARE = 0.2;

const DESCRIPTION_RULES: Rule<ColumnFacts, string>[] = [
  { name: 'empty', when: f => f.profile.nonMissingCount === 0, then: () => 'empty column (no values)' },
  { name: 'primary-key', when: f => f.primaryKey, then: () => 'likely identifier (primary key candidate)' },
  { name: 'key-candidate', when: f => f.keyCandidate, then: () => 'likely identifier (alternate key candidate)' },
  { name: 'composite-key', when: f => f.compositeKey, then: () => 'likely part of a composite key' },
  {
    name: 'identifier',
    when: f => f.profile.semanticType === 'identifier' || isIdentifierName(f.profile.name),
    then: () => 'likely identifier or foreign key'
  },
  { name: 'measure', when: f => f.profile.semanticType === 'numeric', then: () => 'likely measure' },
  { name: 'date', when: f => f.profile.semanticType === 'date', then: () => 'likely date / time attribute' },
  { name: 'flag', when: f => f.profile.semanticType === 'boolean', then: () => 'likely flag' },
  {
    name: 'categorical',
    when: f => f.profile.rowCount > 0 && f.profile.distinctCount < f.profile.rowCount * CATEGORICAL_MAX_DISTINCT_SHARE,
    then: () => 'likely categorical attribute'
  },
  { name: 'text', when: f => f.profile.semanticType === 'text', then: () => 'likely descriptive text' }
];

const uniquenessNote = (p: ColumnProfile) => {
  if (!p.nonMissingCount) return 'no values to compare';
  if (p.distinctCount === p.nonMissingCount) {
    return p.missingCount ? `unique among non-missing values (${p.missingCount} missing)` : 'unique in every row';
  }
  const share = `${round(p.distinctRatio * 100, 1)}%`;
  return `${p.distinctCount} distinct value${p.distinctCount === 1 ? '' : 's'} (${share} of non-missing)`;
};

const sampleNote = (p: ColumnProfile) =>
  p.sampleValues.length ? `e.g. ${p.sampleValues.map(v => String(v)).join(', ')}` : 'no sample values';

/**
 * One entry per column: a role guess from semantic type and key membership, plus the
 * statistics behind it. Always produces an entry.
 */
export const buildDataDictionary = (
  dataset: string,
  profiles: ColumnProfile[],
  keyCandidates: KeyCandidate[]
): DataDictionaryEntry[] => {
  const top = keyCandidates[0];
  const singles = new Set(keyCandidates.filter(k => k.columns.length === 1).map(k => k.columns[0]));
  const composite = new Set(keyCandidates.filter(k => k.columns.length > 1).flatMap(k => k.columns));

  return profiles.map(profile => {
    const facts: ColumnFacts = {
      profile,
      primaryKey: top !== undefined && top.columns.length === 1 && top.columns[0] === profile.name,
      keyCandidate: singles.has(profile.name),
      compositeKey: composite.has(profile.name)
    };

    return {
      dataset,
      column: profile.name,
      semanticType: profile.semanticType,
      description: firstMatch(DESCRIPTION_RULES, facts, () => 'attribute (no strong signal)').outcome,
      uniquenessNote: uniquenessNote(profile),
      sampleNote: sampleNote(profile),
      missingRatio: round(profile.missingRatio),
      distinctCount: profile.distinctCount,
      distinctRatio: round(profile.distinctRatio),
      isKeyCandidate: facts.keyCandidate || facts.compositeKey
    };
  });
};
