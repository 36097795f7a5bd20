import { ConfigError } from './utils/errors';

export type EngineConfig = {
  cleaning: {
    missingTokens: string[];
    dateParseThreshold: number;
  };
  profiling: {
    identifierDistinctRatio: number;
    identifierMaxLength: number;
    sampleSize: number;
  };
  keys: {
    minRows: number;
    maxMissingRatio: number;
    missingPenalty: number;
    minConfidence: number;
    highConfidenceUniqueness: number;
    maxPairCombinations: number;
  };
  roles: {
    referenceMaxRows: number;
    factMinRows: number;
    factMinNumericRatio: number;
    dimensionMaxNumericRatio: number;
  };
  relationships: {
    nameWeight: number;
    overlapWeight: number;
    minMatchStrength: number;
    textCardinalityRatio: number;
    nameAnchorScore: number;
  };
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  cleaning: {
    missingTokens: ['', 'na', 'n/a', 'null', 'none', 'nan'],
    dateParseThreshold: 0.9
  },
  profiling: {
    identifierDistinctRatio: 0.95,
    identifierMaxLength: 40,
    sampleSize: 5
  },
  keys: {
    minRows: 2,
    maxMissingRatio: 0.05,
    missingPenalty: 2,
    minConfidence: 0.9,
    highConfidenceUniqueness: 0.98,
    maxPairCombinations: 45
  },
  roles: {
    referenceMaxRows: 10,
    factMinRows: 100,
    factMinNumericRatio: 0.5,
    dimensionMaxNumericRatio: 0.5
  },
  relationships: {
    nameWeight: 0.25,
    overlapWeight: 0.75,
    minMatchStrength: 0.3,
    textCardinalityRatio: 0.5,
    nameAnchorScore: 0.5
  }
};

type SettingKind = 'ratio' | 'count' | 'weight';

type NumericSetting = {
  path: string;
  kind: SettingKind;
  get: (config: EngineConfig) => number;
  set: (config: EngineConfig, value: number) => void;
};

const SETTINGS: NumericSetting[] = [
  { path: 'cleaning.dateParseThreshold', kind: 'ratio', get: c => c.cleaning.dateParseThreshold, set: (c, v) => { c.cleaning.dateParseThreshold = v; } },
  { path: 'profiling.identifierDistinctRatio', kind: 'ratio', get: c => c.profiling.identifierDistinctRatio, set: (c, v) => { c.profiling.identifierDistinctRatio = v; } },
  { path: 'profiling.identifierMaxLength', kind: 'count', get: c => c.profiling.identifierMaxLength, set: (c, v) => { c.profiling.identifierMaxLength = v; } },
  { path: 'profiling.sampleSize', kind: 'count', get: c => c.profiling.sampleSize, set: (c, v) => { c.profiling.sampleSize = v; } },
  { path: 'keys.minRows', kind: 'count', get: c => c.keys.minRows, set: (c, v) => { c.keys.minRows = v; } },
  { path: 'keys.maxMissingRatio', kind: 'ratio', get: c => c.keys.maxMissingRatio, set: (c, v) => { c.keys.maxMissingRatio = v; } },
  { path: 'keys.missingPenalty', kind: 'weight', get: c => c.keys.missingPenalty, set: (c, v) => { c.keys.missingPenalty = v; } },
  { path: 'keys.minConfidence', kind: 'ratio', get: c => c.keys.minConfidence, set: (c, v) => { c.keys.minConfidence = v; } },
  { path: 'keys.highConfidenceUniqueness', kind: 'ratio', get: c => c.keys.highConfidenceUniqueness, set: (c, v) => { c.keys.highConfidenceUniqueness = v; } },
  { path: 'keys.maxPairCombinations', kind: 'count', get: c => c.keys.maxPairCombinations, set: (c, v) => { c.keys.maxPairCombinations = v; } },
  { path: 'roles.referenceMaxRows', kind: 'count', get: c => c.roles.referenceMaxRows, set: (c, v) => { c.roles.referenceMaxRows = v; } },
  { path: 'roles.factMinRows', kind: 'count', get: c => c.roles.factMinRows, set: (c, v) => { c.roles.factMinRows = v; } },
  { path: 'roles.factMinNumericRatio', kind: 'ratio', get: c => c.roles.factMinNumericRatio, set: (c, v) => { c.roles.factMinNumericRatio = v; } },
  { path: 'roles.dimensionMaxNumericRatio', kind: 'ratio', get: c => c.roles.dimensionMaxNumericRatio, set: (c, v) => { c.roles.dimensionMaxNumericRatio = v; } },
  { path: 'relationships.nameWeight', kind: 'ratio', get: c => c.relationships.nameWeight, set: (c, v) => { c.relationships.nameWeight = v; } },
  { path: 'relationships.overlapWeight', kind: 'ratio', get: c => c.relationships.overlapWeight, set: (c, v) => { c.relationships.overlapWeight = v; } },
  { path: 'relationships.minMatchStrength', kind: 'ratio', get: c => c.relationships.minMatchStrength, set: (c, v) => { c.relationships.minMatchStrength = v; } },
  { path: 'relationships.textCardinalityRatio', kind: 'ratio', get: c => c.relationships.textCardinalityRatio, set: (c, v) => { c.relationships.textCardinalityRatio = v; } },
  { path: 'relationships.nameAnchorScore', kind: 'ratio', get: c => c.relationships.nameAnchorScore, set: (c, v) => { c.relationships.nameAnchorScore = v; } }
];

// keys.maxMissingRatio -> SCOUT_KEYS_MAX_MISSING_RATIO
export const configEnvName = (path: string) =>
  `SCOUT_${path.replace(/([a-z])([A-Z])/g, '$1_$2').replace(/\./g, '_').toUpperCase()}`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const cloneConfig = (config: EngineConfig): EngineConfig => ({
  cleaning: { ...config.cleaning, missingTokens: [...config.cleaning.missingTokens] },
  profiling: { ...config.profiling },
  keys: { ...config.keys },
  roles: { ...config.roles },
  relationships: { ...config.relationships }
});

const checkSetting = (s: NumericSetting, value: number): string | null => {
  if (!Number.isFinite(value)) return `${s.path} must be a finite number`;
  if (s.kind === 'ratio' && (value < 0 || value > 1)) return `${s.path} must be between 0 and 1`;
  if (s.kind === 'count' && (!Number.isInteger(value) || value < 0)) {
    return `${s.path} must be a non-negative integer`;
  }
  if (s.kind === 'weight' && value < 0) return `${s.path} must not be negative`;
  return null;
};

export const validateConfig = (config: EngineConfig): EngineConfig => {
  const problems = SETTINGS.map(s => checkSetting(s, s.get(config))).filter((p): p is string => p !== null);

  if (problems.length) {
    throw new ConfigError(`Invalid engine configuration: ${problems.join('; ')}`, { problems });
  }
  return config;
};

/**
 * Applies loosely-typed overrides (a request body, a parsed file) on top of a base config.
 * Unknown keys are ignored; known keys with the wrong type are rejected.
 */
export const resolveConfig = (overrides: unknown = {}, base: EngineConfig = DEFAULT_ENGINE_CONFIG): EngineConfig => {
  const config = cloneConfig(base);
  if (overrides === undefined || overrides === null) return validateConfig(config);
  if (!isRecord(overrides)) throw new ConfigError('Engine options must be an object');

  for (const s of SETTINGS) {
    const [sectionName, field] = s.path.split('.');
    const section = overrides[sectionName];
    if (!isRecord(section) || section[field] === undefined) continue;
    const value = section[field];
    if (typeof value !== 'number') {
      throw new ConfigError(`${s.path} must be a number`, { value: String(value) });
    }
    s.set(config, value);
  }

  const cleaning = overrides.cleaning;
  if (isRecord(cleaning) && cleaning.missingTokens !== undefined) {
    const tokens = cleaning.missingTokens;
    if (!Array.isArray(tokens) || !tokens.every((t): t is string => typeof t === 'string')) {
      throw new ConfigError('cleaning.missingTokens must be a list of strings');
    }
    config.cleaning.missingTokens = tokens.map(t => t.trim().toLowerCase());
  }

  return validateConfig(config);
};

export const configFromEnv = (env: NodeJS.ProcessEnv = process.env): EngineConfig => {
  const config = cloneConfig(DEFAULT_ENGINE_CONFIG);

  for (const s of SETTINGS) {
    const name = configEnvName(s.path);
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    if (Number.isNaN(value)) throw new ConfigError(`${name} must be numeric, got "${raw}"`);
    s.set(config, value);
  }

  const tokens = env.SCOUT_CLEANING_MISSING_TOKENS;
  if (tokens !== undefined) {
    config.cleaning.missingTokens = tokens.split(',').map(t => t.trim().toLowerCase());
  }

  return validateConfig(config);
};
