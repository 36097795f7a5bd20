import levenshtein from 'fast-levenshtein';

const ID_TOKENS = new Set(['id', 'key', 'code', 'uuid', 'guid']);
const DIRTY_SUFFIXES = new Set(['dirty', 'raw', 'staging', 'tmp', 'temp', 'sample', 'clean', 'cleaned']);

export const NAME_SCORES = {
  exact: 1,
  qualified: 0.95,
  stem: 0.9,
  substring: 0.7,
  fuzzyWeight: 0.5
} as const;

export const normalizeName = (name: string) => name.toLowerCase().replace(/[^a-z0-9]/g, '');

const tokens = (name: string) =>
  name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);

const stripIdSuffix = (normalized: string) => normalized.replace(/(ids|id)$/, '');

const singularize = (value: string) => {
  if (value.endsWith('ies')) return `${value.slice(0, -3)}y`;
  if (value.endsWith('ses')) return value.slice(0, -2);
  return value.endsWith('s') && !value.endsWith('ss') ? value.slice(0, -1) : value;
};

/** "Orders", "raw_customers.csv" -> "order", "customer" */
export const tableBase = (tableName: string) => {
  const parts = tokens(tableName.replace(/\.(csv|xlsx|xls|json)$/i, ''));
  if (parts.length > 1 && DIRTY_SUFFIXES.has(parts[parts.length - 1])) parts.pop();
  if (parts.length > 1 && DIRTY_SUFFIXES.has(parts[0])) parts.shift();
  return singularize(parts.join(''));
};

/** Last name token is id / key / code etc. */
export const isIdentifierName = (name: string) => {
  const parts = tokens(name);
  return parts.length > 0 && ID_TOKENS.has(parts[parts.length - 1]);
};

/**
 * Column-name similarity in [0,1]. Exact and containment matches always outrank
 * fuzzy edit-distance matches, which are capped at `fuzzyWeight`.
 */
export const nameSimilarity = (a: string, b: string, tableA?: string, tableB?: string) => {
  const na = normalizeName(a);
  const nb = normalizeName(b);
  if (!na || !nb) return 0;
  if (na === nb) return NAME_SCORES.exact;

  // customers.id <-> orders.customer_id
  if (tableB && nb === 'id' && na === `${tableBase(tableB)}id`) return NAME_SCORES.qualified;
  if (tableA && na === 'id' && nb === `${tableBase(tableA)}id`) return NAME_SCORES.qualified;

  const sa = stripIdSuffix(na);
  const sb = stripIdSuffix(nb);
  if (sa && sb && sa === sb) return NAME_SCORES.stem;

  if (na.includes(nb) || nb.includes(na)) return NAME_SCORES.substring;

  const dist = levenshtein.get(na, nb);
  const maxLen = Math.max(na.length, nb.length);
  return NAME_SCORES.fuzzyWeight * (1 - dist / maxLen);
};
