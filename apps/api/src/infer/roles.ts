import type { EngineConfig } from '../config';
import type { ColumnProfile, KeyCandidate, RoleSignals, TableRole, TableRoleKind } from '../types/schema';
import { firstMatch, type Rule } from '../utils/rules';
import { ratio, round } from '../utils/values';
import { isConfidentKey } from './keys';

export type RoleInput = {
  dataset: string;
  rowCount: number;
  profiles: ColumnProfile[];
  keyCandidates: KeyCandidate[];
};

type RoleOutcome = { role: TableRoleKind; rationale: string };

const pct = (value: number) => `${Math.round(value * 100)}%`;

export const roleSignals = (input: RoleInput, config: EngineConfig): RoleSignals => {
  const columnCount = input.profiles.length;
  const numeric = input.profiles.filter(p => p.semanticType === 'numeric');
  const nonNumeric = input.profiles.filter(p => p.semanticType !== 'numeric');
  const confident = input.keyCandidates.find(k => isConfidentKey(k, config));
  const columns = new Set(input.profiles.map(p => p.name));

  return {
    rowCount: input.rowCount,
    columnCount,
    numericRatio: round(ratio(numeric.length, columnCount)),
    confidentKey: confident ? [...confident.columns] : null,
    keyCoversRow: input.keyCandidates.some(
      k => isConfidentKey(k, config) && columns.size > 0 && [...columns].every(c => k.columns.includes(c))
    ),
    averageNonNumericDistinctRatio: round(
      ratio(
        nonNumeric.reduce((acc, p) => acc + p.distinctRatio, 0),
        nonNumeric.length
      )
    )
  };
};

const roleRules = (config: EngineConfig): Rule<RoleSignals, RoleOutcome>[] => [
  {
    name: 'empty',
    when: s => s.rowCount === 0,
    then: () => ({ role: 'unclassified', rationale: 'No rows to analyse.' })
  },
  {
    name: 'small-unkeyed',
    when: s => s.rowCount < config.roles.referenceMaxRows && !s.confidentKey,
    then: s => ({
      role: 'reference',
      rationale: `Only ${s.rowCount} row(s) and no confident key: looks like a small lookup or reference list.`
    })
  },
  {
    name: 'numeric-heavy',
    when: s =>
      s.numericRatio > config.roles.factMinNumericRatio && s.rowCount >= config.roles.factMinRows && !s.keyCoversRow,
    then: s => ({
      role: 'fact',
      rationale: `${pct(s.numericRatio)} numeric columns across ${s.rowCount} rows: holds measurements.`
    })
  },
  {
    name: 'keyed-descriptive',
    when: s => s.confidentKey !== null && s.numericRatio <= config.roles.dimensionMaxNumericRatio,
    then: s => ({
      role: 'dimension',
      rationale: `Unique key (${(s.confidentKey ?? []).join(', ')}) with mostly descriptive columns (${pct(1 - s.numericRatio)} non-numeric).`
    })
  }
];

const inconclusive = (s: RoleSignals, config: EngineConfig): RoleOutcome => {
  const reasons: string[] = [];
  if (!s.confidentKey) reasons.push('no confident key');
  if (s.numericRatio > config.roles.dimensionMaxNumericRatio) {
    if (s.rowCount < config.roles.factMinRows) {
      reasons.push(`numeric ratio ${pct(s.numericRatio)} but only ${s.rowCount} rows`);
    } else if (s.keyCoversRow) {
      reasons.push(`numeric ratio ${pct(s.numericRatio)} but the key spans every column`);
    } else {
      reasons.push(`numeric ratio ${pct(s.numericRatio)}`);
    }
  } else {
    reasons.push(`numeric ratio ${pct(s.numericRatio)} too low for a fact table`);
  }
  reasons.push(`average non-numeric distinct ratio ${s.averageNonNumericDistinctRatio}`);
  return { role: 'unclassified', rationale: `Inconclusive signals: ${reasons.join('; ')}.` };
};

/**
 * Labels a table fact / dimension / reference / unclassified. Pure and total:
 * any well-formed profile input yields exactly one role.
 */
export const classifyTable = (input: RoleInput, config: EngineConfig): TableRole => {
  const signals = roleSignals(input, config);
  const { outcome } = firstMatch(roleRules(config), signals, s => inconclusive(s, config));
  return { dataset: input.dataset, role: outcome.role, rationale: outcome.rationale, signals };
};
