import type { ErrorResponse } from '../utils/errors';

export type CellValue = string | number | boolean | null;

export type StorageType = 'numeric' | 'boolean' | 'date' | 'text';

export type SemanticType = 'numeric' | 'text' | 'date' | 'boolean' | 'identifier';

export type RawTable = {
  columns: string[];
  rows: unknown[][];
};

export type SessionInput = Record<string, RawTable>;

export type CleaningReport = {
  inputRows: number;
  outputRows: number;
  duplicateRowsRemoved: number;
  trimmedCells: number;
  malformedCells: number;
  raggedRows: number;
  coercedColumns: string[];
  dateColumns: string[];
  ambiguousColumns: string[]; // left as text after a failed numeric coercion
};

export type Dataset = {
  name: string;
  columns: string[];
  types: Record<string, StorageType>;
  rows: CellValue[][];
  report: CleaningReport;
};

export type ColumnProfile = {
  name: string;
  semanticType: SemanticType;
  storageType: StorageType;
  rowCount: number;
  missingCount: number;
  nonMissingCount: number;
  missingRatio: number; // 0..1
  distinctCount: number;
  distinctRatio: number; // 0..1, over non-missing values
  averageLength: number;
  sampleValues: Array<string | number | boolean>;
  numericSummary?: { min: number; max: number; mean: number };
};

export type KeyCandidate = {
  dataset: string;
  columns: string[];
  uniquenessRatio: number;
  nullRatio: number;
  confidence: number;
};

export type TableRoleKind = 'fact' | 'dimension' | 'reference' | 'unclassified';

export type RoleSignals = {
  rowCount: number;
  columnCount: number;
  numericRatio: number;
  confidentKey: string[] | null;
  keyCoversRow: boolean;
  averageNonNumericDistinctRatio: number;
};

export type TableRole = {
  dataset: string;
  role: TableRoleKind;
  rationale: string;
  signals: RoleSignals;
};

export type RelationshipType = 'ONE_TO_MANY' | 'ONE_TO_ONE' | 'MANY_TO_MANY';

export type ColumnRef = { dataset: string; columns: string[] };

export type RelationshipCandidate = {
  from: ColumnRef;
  to: ColumnRef;
  type: RelationshipType;
  strength: number; // 0..1
  oneSide: string | null; // dataset holding the key side, null when undetermined
  rationale: string;
  evidence: {
    nameScore: number;
    overlapScore: number;
    forwardOverlap: number;
    backwardOverlap: number;
  };
};

export type GraphNode = {
  dataset: string;
  role: TableRoleKind;
  rowCount: number;
  columns: string[];
};

export type RelationshipGraph = {
  nodes: GraphNode[];
  edges: RelationshipCandidate[];
};

export type DataDictionaryEntry = {
  dataset: string;
  column: string;
  semanticType: SemanticType;
  description: string;
  uniquenessNote: string;
  sampleNote: string;
  missingRatio: number;
  distinctCount: number;
  distinctRatio: number;
  isKeyCandidate: boolean;
};

export type DatasetStatus = {
  dataset: string;
  status: 'ok' | 'failed';
  error?: ErrorResponse;
  warnings: string[];
};

export type AnalysisBundle = {
  generatedAt: string;
  datasets: Record<string, Dataset>;
  profiles: Record<string, ColumnProfile[]>;
  keyCandidates: Record<string, KeyCandidate[]>;
  roles: Record<string, TableRole>;
  graph: RelationshipGraph;
  dictionary: Record<string, DataDictionaryEntry[]>;
  status: Record<string, DatasetStatus>;
};
