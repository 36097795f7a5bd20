import express, { type Response } from 'express';
import cors from 'cors';
import multer from 'multer';

import { configFromEnv, resolveConfig, type EngineConfig } from './config';
import { analyzeSession } from './infer';
import { ingestFileBuffer, recordsToTable } from './ingest/csv';
import { buildQualityReport, datasetToCsv, datasetsToWorkbook, graphToDot, requireDataset } from './output';
import { loadSampleDatasets } from './samples';
import { readAnalysis, writeAnalysis } from './store';
import type { AnalysisBundle, DatasetStatus, RawTable, SessionInput } from './types/schema';
import { EngineError, ErrorCode, StateError, errorMessage, toEngineError } from './utils/errors';
import { logger } from './utils/logger';
import { emptyRecord } from './utils/values';

export type AppOptions = {
  config?: EngineConfig;
};

const CLIENT_ERRORS = new Set<string>([
  ErrorCode.CONFIG_ERROR,
  ErrorCode.INGEST_ERROR,
  ErrorCode.SHAPE_ERROR,
  ErrorCode.STATE_ERROR
]);

const sendError = (res: Response, err: unknown, fallback: string) => {
  if (err instanceof EngineError && CLIENT_ERRORS.has(err.code)) {
    res.status(400).json({ error: err.message, ...err.toResponse() });
    return;
  }
  logger.error(fallback, { error: errorMessage(err) });
  res.status(500).json({ error: errorMessage(err) || fallback });
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// { columns, rows } as-is; an array of records is converted; anything else is left for the normalizer to reject
const tableFromBody = (value: unknown): RawTable => {
  if (Array.isArray(value)) return recordsToTable(value);
  if (isRecord(value) && Array.isArray(value.columns) && Array.isArray(value.rows)) {
    return { columns: value.columns.map(c => String(c)), rows: value.rows };
  }
  return { columns: [], rows: [] };
};

const uniqueName = (name: string, taken: Set<string>) => {
  let candidate = name || 'dataset';
  for (let i = 2; taken.has(candidate); i++) candidate = `${name}_${i}`;
  taken.add(candidate);
  return candidate;
};

const loadSaved = async (): Promise<AnalysisBundle> => {
  const bundle = await readAnalysis();
  if (!bundle) throw new StateError('No saved analysis available. Run an analysis first.');
  return bundle;
};

export const createApp = (options: AppOptions = {}) => {
  const app = express();
  const upload = multer();
  const baseConfig = options.config ?? configFromEnv();

  app.use(cors());
  app.use(express.json({ limit: '25mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/analyze', async (req, res) => {
    try {
      const body: unknown = req.body;
      const datasets = isRecord(body) ? body.datasets : undefined;
      if (!isRecord(datasets) || !Object.keys(datasets).length) {
        res.status(400).json({ error: 'datasets must map dataset names to { columns, rows } tables' });
        return;
      }

      const config = resolveConfig(isRecord(body) ? body.options : undefined, baseConfig);
      const input: SessionInput = emptyRecord();
      for (const [name, table] of Object.entries(datasets)) input[name] = tableFromBody(table);

      const bundle = analyzeSession(input, { config });
      await writeAnalysis(bundle);
      res.json(bundle);
    } catch (err) {
      sendError(res, err, 'Analysis failed');
    }
  });

  app.post('/api/ingest/files', upload.array('files'), async (req, res) => {
    try {
      const files = Array.isArray(req.files) ? req.files : [];
      if (!files.length) {
        res.status(400).json({ error: 'No files uploaded.' });
        return;
      }

      const taken = new Set<string>();
      const input: SessionInput = emptyRecord();
      const unreadable: DatasetStatus[] = [];

      for (const file of files) {
        try {
          const ingested = ingestFileBuffer(file.buffer, file.originalname);
          input[uniqueName(ingested.name, taken)] = ingested.table;
        } catch (err) {
          const error = toEngineError(err, ErrorCode.INGEST_ERROR).toResponse();
          unreadable.push({ dataset: uniqueName(file.originalname, taken), status: 'failed', error, warnings: [] });
          logger.warn('Could not read uploaded file', { file: file.originalname, ...error });
        }
      }

      const bundle = analyzeSession(input, { config: baseConfig });
      unreadable.forEach(status => {
        bundle.status[status.dataset] = status;
      });
      await writeAnalysis(bundle);
      res.json(bundle);
    } catch (err) {
      sendError(res, err, 'File ingest failed');
    }
  });

  app.get('/api/samples', async (_req, res) => {
    try {
      const bundle = analyzeSession(loadSampleDatasets(), { config: baseConfig });
      await writeAnalysis(bundle);
      res.json(bundle);
    } catch (err) {
      sendError(res, err, 'Failed to load samples');
    }
  });

  app.get('/api/analysis', async (_req, res) => {
    try {
      res.json(await loadSaved());
    } catch (err) {
      sendError(res, err, 'Failed to read analysis');
    }
  });

  app.get('/api/quality/:dataset', async (req, res) => {
    try {
      const bundle = await loadSaved();
      res.json(buildQualityReport(bundle, req.params.dataset));
    } catch (err) {
      sendError(res, err, 'Failed to build quality report');
    }
  });

  app.get('/api/diagram', async (req, res) => {
    try {
      const bundle = await loadSaved();
      const format = String(req.query.format || 'json').toLowerCase();
      if (format === 'dot') {
        res.type('text/vnd.graphviz').send(graphToDot(bundle.graph));
        return;
      }
      res.json(bundle.graph);
    } catch (err) {
      sendError(res, err, 'Failed to build diagram');
    }
  });

  app.get('/api/export', async (_req, res) => {
    try {
      const bundle = await loadSaved();
      const buffer = datasetsToWorkbook(Object.values(bundle.datasets));
      res.setHeader('Content-Disposition', 'attachment; filename="cleaned-datasets.xlsx"');
      res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
      res.send(buffer);
    } catch (err) {
      sendError(res, err, 'Export failed');
    }
  });

  app.get('/api/export/:dataset', async (req, res) => {
    try {
      const bundle = await loadSaved();
      const dataset = requireDataset(bundle, req.params.dataset);
      const format = String(req.query.format || 'csv').toLowerCase();
      const filename = `cleaned_${dataset.name}`.replace(/[^\w.-]+/g, '_');

      if (format === 'xlsx') {
        res.setHeader('Content-Disposition', `attachment; filename="${filename}.xlsx"`);
        res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
        res.send(datasetsToWorkbook([dataset]));
        return;
      }
      if (format !== 'csv') {
        res.status(400).json({ error: `Unsupported export format: ${format}` });
        return;
      }

      res.setHeader('Content-Disposition', `attachment; filename="${filename}.csv"`);
      res.type('text/csv').send(datasetToCsv(dataset));
    } catch (err) {
      sendError(res, err, 'Export failed');
    }
  });

  return app;
};
