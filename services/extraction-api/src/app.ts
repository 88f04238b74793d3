/**
 * Extraction API
 *
 * POST /batches - Extracts policy fields from uploaded PDFs
 * POST /exports - Writes reviewed rows to an .xlsx report
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  exportsCounter,
  processBatch,
  isExportRequest,
  validateExportRequest,
  validateBatchResult,
  SpreadsheetUnavailableError,
  type Config,
  type PatternRegistry,
  type TextExtractor,
  type DocumentRecord,
  type ExtractionError,
  type ErrorEnvelope,
  type FieldListResponse,
} from '@policy-extractor/shared';
import {
  XLSX_CONTENT_TYPE,
  buildReportFilename,
  buildReportSheets,
  requireWriter,
  type SpreadsheetEngineStatus,
} from './lib/spreadsheet';
import { parsePdfUploads, UploadError } from './lib/upload';

export interface AppDependencies {
  config: Config;
  registry: PatternRegistry;
  spreadsheet: SpreadsheetEngineStatus;
  extractText: TextExtractor;
}

const PREFIX_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : getCorrelationId();
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(error);
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse a true/false query flag. Returns null for any other value.
 */
function parseFlag(value: string | undefined, fallback: boolean): boolean | null {
  if (value === undefined) return fallback;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return null;
}

export function createApp(deps: AppDependencies): express.Express {
  const { config, registry, spreadsheet, extractText } = deps;
  const app = express();

  // Middleware
  app.use(express.json({ limit: '5mb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const incoming = req.headers['x-correlation-id'];
    const correlationId = typeof incoming === 'string' && incoming ? incoming : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  function sendUnavailable(res: Response, error: SpreadsheetUnavailableError): void {
    exportsCounter.inc({ status: 'unavailable' });
    logger.error('Spreadsheet export unavailable', error);
    sendError(res, 503, 'spreadsheet_unavailable', `${error.message}. ${error.remediation}`);
  }

  /**
   * Write a report, or answer 503 when no spreadsheet engine is available.
   */
  function sendReport(
    res: Response,
    records: readonly DocumentRecord[],
    errors: readonly ExtractionError[],
    fieldNames: readonly string[],
    prefix: string
  ): void {
    try {
      const writer = requireWriter(spreadsheet);
      const content = writer.write(
        buildReportSheets(records, errors, fieldNames, config.reportSheetName)
      );
      const filename = buildReportFilename(prefix);

      exportsCounter.inc({ status: 'success' });
      logger.info('Report written', { filename, rows: records.length, bytes: content.length });

      res.status(200);
      res.setHeader('Content-Type', XLSX_CONTENT_TYPE);
      res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
      res.setHeader('Content-Length', content.length.toString());
      res.end(content);
    } catch (error) {
      if (error instanceof SpreadsheetUnavailableError) {
        sendUnavailable(res, error);
        return;
      }

      exportsCounter.inc({ status: 'failed' });
      logger.error('Failed to write report', error);
      sendError(res, 500, 'internal_error', 'Failed to write report');
    }
  }

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'extraction-api',
      field_set: registry.name,
      field_count: registry.size,
      spreadsheet_engine:
        spreadsheet.status === 'available' ? spreadsheet.writer.engine : 'unavailable',
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * GET /fields
   * Returns the active field set and its rules
   */
  app.get('/fields', (req: Request, res: Response) => {
    const response: FieldListResponse = {
      field_set: registry.name,
      fields: registry.fields().map((name) => ({ name, pattern: registry.ruleFor(name).source })),
    };
    res.json(response);
  });

  /**
   * POST /batches
   * Extracts the registered fields from every uploaded PDF
   */
  app.post('/batches', async (req: Request, res: Response) => {
    const uppercase = parseFlag(queryString(req, 'uppercase'), config.uppercaseText);
    const debug = parseFlag(queryString(req, 'debug'), config.debugText);
    const format = queryString(req, 'format') ?? 'json';
    const prefix = queryString(req, 'prefix') ?? config.reportPrefix;

    if (uppercase === null || debug === null) {
      sendError(res, 400, 'invalid_request', 'uppercase and debug must be true or false');
      return;
    }
    if (format !== 'json' && format !== 'xlsx') {
      sendError(res, 400, 'invalid_request', 'format must be json or xlsx');
      return;
    }
    if (!PREFIX_PATTERN.test(prefix)) {
      sendError(res, 400, 'invalid_request', 'prefix may only contain letters, digits, _ and -');
      return;
    }
    // Refuse before extracting so no results are computed and then dropped
    if (format === 'xlsx' && spreadsheet.status === 'unavailable') {
      sendUnavailable(res, new SpreadsheetUnavailableError(spreadsheet.reason));
      return;
    }

    try {
      const documents = await parsePdfUploads(req, {
        maxFileBytes: config.maxUploadBytes,
        maxFiles: config.maxFilesPerBatch,
      });

      const result = await processBatch(documents, {
        registry,
        extractText,
        uppercase,
        previewChars: debug ? config.textPreviewChars : 0,
      });

      // Validate response
      const validation = validateBatchResult(result);
      if (!validation.valid) {
        logger.warn('BatchResult validation failed', { errors: validation.errors });
      }

      if (format === 'xlsx') {
        sendReport(res, result.records, result.errors, result.field_names, prefix);
        return;
      }

      res.json(result);
    } catch (error) {
      if (error instanceof UploadError) {
        sendError(res, error.status, error.code, error.message);
        return;
      }

      logger.error('Failed to process batch', error);
      sendError(res, 500, 'internal_error', 'Failed to process batch');
    }
  });

  /**
   * POST /exports
   * Writes reviewed rows to a spreadsheet report
   */
  app.post('/exports', (req: Request, res: Response) => {
    const body: unknown = req.body;

    if (!isExportRequest(body)) {
      const { errors } = validateExportRequest(body);
      sendError(res, 400, 'invalid_request', `Invalid export request: ${(errors ?? []).join('; ')}`);
      return;
    }

    const prefix = body.prefix ?? config.reportPrefix;
    const fieldNames = body.field_names ?? [...registry.fields()];

    sendReport(res, body.records, body.errors ?? [], fieldNames, prefix);
  });

  return app;
}
