import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { AnalysisBundle, Dataset, RelationshipGraph, SemanticType, StorageType } from './types/schema';
import { StateError } from './utils/errors';
import { ratio, round } from './utils/values';

export type QualityColumn = {
  column: string;
  storageType: StorageType;
  semanticType: SemanticType;
  missingCount: number;
  missingPercent: number;
  distinctCount: number;
  primaryKeyCandidate: boolean;
};

export type QualityReport = {
  dataset: string;
  rows: number;
  columns: number;
  duplicateRowsRemoved: number;
  missingCells: number;
  missingPercent: number;
  coercedColumns: string[];
  ambiguousColumns: string[];
  warnings: string[];
  columnReport: QualityColumn[];
};

export const requireDataset = (bundle: AnalysisBundle, name: string): Dataset => {
  const dataset = bundle.datasets[name];
  if (!dataset) {
    const status = bundle.status[name];
    const reason = status?.error ? `: ${status.error.message}` : '';
    throw new StateError(`Dataset "${name}" is not part of the analysis${reason}`, { dataset: name });
  }
  return dataset;
};

export const buildQualityReport = (bundle: AnalysisBundle, name: string): QualityReport => {
  const dataset = requireDataset(bundle, name);
  const profiles = bundle.profiles[name] ?? [];
  const keyed = new Set(
    (bundle.keyCandidates[name] ?? []).filter(k => k.columns.length === 1).map(k => k.columns[0])
  );
  const missingCells = profiles.reduce((acc, p) => acc + p.missingCount, 0);

  return {
    dataset: name,
    rows: dataset.rows.length,
    columns: dataset.columns.length,
    duplicateRowsRemoved: dataset.report.duplicateRowsRemoved,
    missingCells,
    missingPercent: round(ratio(missingCells, dataset.rows.length * dataset.columns.length) * 100, 2),
    coercedColumns: dataset.report.coercedColumns,
    ambiguousColumns: dataset.report.ambiguousColumns,
    warnings: bundle.status[name]?.warnings ?? [],
    columnReport: profiles.map(p => ({
      column: p.name,
      storageType: p.storageType,
      semanticType: p.semanticType,
      missingCount: p.missingCount,
      missingPercent: round(p.missingRatio * 100, 2),
      distinctCount: p.distinctCount,
      primaryKeyCandidate: keyed.has(p.name)
    }))
  };
};

export const datasetToCsv = (dataset: Dataset) =>
  Papa.unparse({ fields: dataset.columns, data: dataset.rows }, { newline: '\n' });

const sheetName = (name: string, taken: Set<string>) => {
  const base = name.replace(/[[\]:*?/\\]/g, '_').slice(0, 31) || 'Sheet';
  let candidate = base;
  for (let i = 2; taken.has(candidate); i++) {
    const suffix = `_${i}`;
    candidate = `${base.slice(0, 31 - suffix.length)}${suffix}`;
  }
  taken.add(candidate);
  return candidate;
};

export const datasetsToWorkbook = (datasets: Dataset[]): Buffer => {
  const workbook = XLSX.utils.book_new();
  const taken = new Set<string>();

  if (!datasets.length) {
    const sheet = XLSX.utils.aoa_to_sheet([['No cleaned datasets available']]);
    XLSX.utils.book_append_sheet(workbook, sheet, 'No Data');
    return XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer' });
  }

  datasets.forEach(dataset => {
    const sheet = XLSX.utils.aoa_to_sheet([dataset.columns, ...dataset.rows]);
    XLSX.utils.book_append_sheet(workbook, sheet, sheetName(dataset.name, taken));
  });

  return XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer' });
};

const dotString = (text: string) => `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`;

/** Graphviz DOT text for the model view: one box per dataset, one labelled edge per candidate. */
export const graphToDot = (graph: RelationshipGraph) => {
  const lines = ['digraph schema {', '  rankdir=LR;', '  node [shape=box];'];

  graph.nodes.forEach(node => {
    const label = `${node.dataset}\n(${node.role})\n\n${node.columns.join('\n')}`;
    lines.push(`  ${dotString(node.dataset)} [label=${dotString(label)}];`);
  });

  graph.edges.forEach(edge => {
    const columns = edge.from.columns.join(', ');
    const target = edge.to.columns.join(', ');
    const label = columns === target ? `${columns} (${edge.strength})` : `${columns} -> ${target} (${edge.strength})`;
    lines.push(`  ${dotString(edge.from.dataset)} -> ${dotString(edge.to.dataset)} [label=${dotString(label)}];`);
  });

  lines.push('}');
  return lines.join('\n');
};
