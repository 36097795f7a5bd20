import type { EngineConfig } from '../config';
import type { CellValue, ColumnProfile, Dataset, SemanticType, StorageType } from '../types/schema';
import { firstMatch, type Rule } from './rules';
import { cellKey, ratio, round } from './values';

type TypeSignals = {
  storageType: StorageType;
  distinctRatio: number;
  averageLength: number;
  nonMissingCount: number;
};

const semanticRules = (config: EngineConfig): Rule<TypeSignals, SemanticType>[] => [
  { name: 'boolean', when: s => s.storageType === 'boolean', then: () => 'boolean' },
  { name: 'numeric', when: s => s.storageType === 'numeric', then: () => 'numeric' },
  { name: 'date', when: s => s.storageType === 'date', then: () => 'date' },
  {
    name: 'identifier',
    when: s =>
      s.nonMissingCount > 0 &&
      s.distinctRatio >= config.profiling.identifierDistinctRatio &&
      s.averageLength <= config.profiling.identifierMaxLength,
    then: () => 'identifier'
  }
];

export const inferSemanticType = (signals: TypeSignals, config: EngineConfig): SemanticType =>
  firstMatch<TypeSignals, SemanticType>(semanticRules(config), signals, () => 'text').outcome;

export const profileColumn = (
  name: string,
  storageType: StorageType,
  values: CellValue[],
  config: EngineConfig
): ColumnProfile => {
  const present = values.filter((v): v is string | number | boolean => v !== null);
  const rowCount = values.length;
  const missingCount = rowCount - present.length;

  const distinct = new Map<string, string | number | boolean>();
  for (const v of present) {
    const key = cellKey(v);
    if (!distinct.has(key)) distinct.set(key, v);
  }

  const texts = present.filter((v): v is string => typeof v === 'string');
  const averageLength = ratio(
    texts.reduce((acc, t) => acc + t.length, 0),
    texts.length
  );
  const distinctRatio = ratio(distinct.size, present.length);

  const numbers = present.filter((v): v is number => typeof v === 'number');
  const numericSummary = storageType === 'numeric' && numbers.length
    ? {
        min: numbers.reduce((a, b) => Math.min(a, b)),
        max: numbers.reduce((a, b) => Math.max(a, b)),
        mean: round(numbers.reduce((acc, n) => acc + n, 0) / numbers.length)
      }
    : undefined;

  return {
    name,
    semanticType: inferSemanticType(
      { storageType, distinctRatio, averageLength, nonMissingCount: present.length },
      config
    ),
    storageType,
    rowCount,
    missingCount,
    nonMissingCount: present.length,
    missingRatio: ratio(missingCount, rowCount),
    distinctCount: distinct.size,
    distinctRatio,
    averageLength: round(averageLength, 2),
    sampleValues: Array.from(distinct.values()).slice(0, config.profiling.sampleSize),
    ...(numericSummary ? { numericSummary } : {})
  };
};

export const profileDataset = (dataset: Dataset, config: EngineConfig): ColumnProfile[] =>
  dataset.columns.map((column, c) =>
    profileColumn(
      column,
      dataset.types[column] ?? 'text',
      dataset.rows.map(row => row[c]),
      config
    )
  );
