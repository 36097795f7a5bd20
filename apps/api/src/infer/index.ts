import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config';
import { cleanDataset } from '../clean/normalize';
import type {
  AnalysisBundle,
  DatasetStatus,
  RelationshipCandidate,
  RelationshipGraph,
  SessionInput,
  TableRole
} from '../types/schema';
import { ErrorCode, toEngineError } from '../utils/errors';
import { logger } from '../utils/logger';
import { profileDataset } from '../utils/profile';
import { emptyRecord } from '../utils/values';
import { buildDataDictionary } from './dictionary';
import { createDistinctCache, createSnapshot, detectRelationships, type SnapshotEntry } from './heuristics';
import { detectKeyCandidates } from './keys';
import { classifyTable } from './roles';

export type AnalyzeOptions = {
  config?: EngineConfig;
  /** Checked between stages; returning true stops before the next stage starts. */
  shouldStop?: () => boolean;
};

const datasetWarnings = (entry: SnapshotEntry, config: EngineConfig) => {
  const { report } = entry.dataset;
  const warnings: string[] = [];
  if (report.duplicateRowsRemoved) warnings.push(`${report.duplicateRowsRemoved} duplicate row(s) removed`);
  if (report.raggedRows) warnings.push(`${report.raggedRows} row(s) did not match the header width`);
  if (report.malformedCells) warnings.push(`${report.malformedCells} malformed cell(s) treated as missing`);
  report.ambiguousColumns.forEach(column =>
    warnings.push(`column "${column}" mixes numeric and non-numeric values; left as text`)
  );
  if (entry.dataset.rows.length < config.keys.minRows) {
    warnings.push(`insufficient data: ${entry.dataset.rows.length} row(s), key detection skipped`);
  }
  return warnings;
};

export const buildRelationshipGraph = (
  entries: readonly SnapshotEntry[],
  roles: Record<string, TableRole>,
  edges: RelationshipCandidate[]
): RelationshipGraph => ({
  nodes: entries.map(e => ({
    dataset: e.dataset.name,
    role: roles[e.dataset.name]?.role ?? 'unclassified',
    rowCount: e.dataset.rows.length,
    columns: [...e.dataset.columns]
  })),
  edges
});

/**
 * Runs the whole inference pipeline over a session. Failures are local to a dataset:
 * they are recorded in `status` and the remaining datasets are still analysed.
 */
export const analyzeSession = (input: SessionInput, options: AnalyzeOptions = {}): AnalysisBundle => {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const stopped = () => options.shouldStop?.() ?? false;

  const bundle: AnalysisBundle = {
    generatedAt: new Date().toISOString(),
    datasets: emptyRecord(),
    profiles: emptyRecord(),
    keyCandidates: emptyRecord(),
    roles: emptyRecord(),
    graph: { nodes: [], edges: [] },
    dictionary: emptyRecord(),
    status: emptyRecord()
  };
  const entries: SnapshotEntry[] = [];
  const names = Object.keys(input);

  logger.info('Analysis started', { datasets: names.length });

  for (const name of names) {
    if (stopped()) {
      bundle.status[name] = {
        dataset: name,
        status: 'failed',
        error: { code: ErrorCode.GENERAL_ERROR, message: 'Analysis stopped before this dataset' },
        warnings: []
      };
      continue;
    }

    try {
      const dataset = cleanDataset(name, input[name], config);
      const profiles = profileDataset(dataset, config);
      const keyCandidates = detectKeyCandidates(dataset, profiles, config);
      const role = classifyTable({ dataset: name, rowCount: dataset.rows.length, profiles, keyCandidates }, config);
      const entry: SnapshotEntry = { dataset, profiles, keyCandidates };

      bundle.datasets[name] = dataset;
      bundle.profiles[name] = profiles;
      bundle.keyCandidates[name] = keyCandidates;
      bundle.roles[name] = role;
      bundle.status[name] = { dataset: name, status: 'ok', warnings: datasetWarnings(entry, config) };
      entries.push(entry);

      logger.debug('Dataset analysed', {
        dataset: name,
        rows: dataset.rows.length,
        columns: dataset.columns.length,
        keys: keyCandidates.length,
        role: role.role
      });
    } catch (err) {
      const error = toEngineError(err).toResponse();
      const status: DatasetStatus = { dataset: name, status: 'failed', error, warnings: [] };
      bundle.status[name] = status;
      logger.warn('Dataset analysis failed', { dataset: name, ...error });
    }
  }

  const snapshot = createSnapshot(entries);
  let edges: RelationshipCandidate[] = [];
  if (stopped()) {
    logger.info('Analysis stopped before relationship detection');
  } else {
    const cache = createDistinctCache(snapshot);
    edges = detectRelationships(snapshot, config, cache);
    logger.debug('Relationship detection complete', { edges: edges.length, distinctSets: cache.computed });
  }
  bundle.graph = buildRelationshipGraph(snapshot.entries, bundle.roles, edges);

  for (const entry of stopped() ? [] : entries) {
    const name = entry.dataset.name;
    bundle.dictionary[name] = buildDataDictionary(name, bundle.profiles[name], bundle.keyCandidates[name]);
  }

  logger.info('Analysis complete', {
    analysed: entries.length,
    failed: names.length - entries.length,
    relationships: edges.length
  });

  return bundle;
};
