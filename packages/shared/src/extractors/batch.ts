/**
 * Batch Processing
 *
 * Runs each uploaded document through text extraction, normalization and the
 * extraction engine, one at a time and in upload order. A document that
 * cannot be read adds an error row and processing moves on to the next one.
 */

import { ulid } from 'ulid';
import {
  MISSING_VALUE,
  type BatchResult,
  type DocumentPreview,
  type DocumentRecord,
  type ExtractionError,
  type ExtractionOutcome,
  type TextExtractor,
  type UploadedDocument,
} from '../types';
import { logger } from '../logger';
import { runInChildContext } from '../context';
import {
  batchDurationHistogram,
  documentsProcessedCounter,
  fieldOutcomesCounter,
} from '../metrics';
import { extractDocument } from './engine';
import { prepareText } from './normalize';
import type { PatternRegistry } from './registry';

export interface BatchOptions {
  registry: PatternRegistry;
  extractText: TextExtractor;
  uppercase: boolean;
  /** Characters of processed text returned per document; 0 disables previews */
  previewChars?: number;
  onProgress?: (processed: number, total: number) => void;
}

/**
 * Obtain a document's text, treating a rejected extraction as empty text.
 */
async function readDocumentText(
  document: UploadedDocument,
  extractText: TextExtractor
): Promise<string> {
  try {
    return await extractText(document.content, document.filename);
  } catch (error) {
    logger.warn('Text extraction failed, treating document as empty', {
      error: error instanceof Error ? error.message : String(error),
    });
    return '';
  }
}

function recordOutcomeMetrics(outcome: ExtractionOutcome): void {
  if (!outcome.record) {
    documentsProcessedCounter.inc({ status: 'unreadable' });
    return;
  }

  documentsProcessedCounter.inc({ status: 'extracted' });

  const faulted = new Set(outcome.errors.map((error) => error.field));
  for (const [field, value] of Object.entries(outcome.record.values)) {
    const result = faulted.has(field) ? 'fault' : value === MISSING_VALUE ? 'missing' : 'matched';
    fieldOutcomesCounter.inc({ field, outcome: result });
  }
}

/**
 * Process a batch of documents into a result table and an error table.
 * Records keep the upload order of their documents.
 */
export async function processBatch(
  documents: readonly UploadedDocument[],
  options: BatchOptions
): Promise<BatchResult> {
  const batchId = ulid();
  const { registry, extractText, uppercase, previewChars = 0, onProgress } = options;
  const endTimer = batchDurationHistogram.startTimer({ field_set: registry.name });

  const records: DocumentRecord[] = [];
  const errors: ExtractionError[] = [];
  const previews: DocumentPreview[] = [];

  logger.info('Starting batch', {
    batch_id: batchId,
    document_count: documents.length,
    field_set: registry.name,
    uppercase,
  });

  for (const [index, document] of documents.entries()) {
    await runInChildContext({ batchId, documentId: document.filename }, async () => {
      const rawText = await readDocumentText(document, extractText);
      const text = prepareText(rawText, { uppercase });
      const outcome = extractDocument(document.filename, text, registry);

      if (outcome.record) {
        records.push(outcome.record);
        if (previewChars > 0) {
          previews.push({ filename: document.filename, text: text.slice(0, previewChars) });
        }
      }
      errors.push(...outcome.errors);
      recordOutcomeMetrics(outcome);

      logger.debug('Document processed', {
        extracted: outcome.record !== null,
        error_count: outcome.errors.length,
        text_chars: rawText.length,
      });
    });

    onProgress?.(index + 1, documents.length);
  }

  endTimer();

  logger.info('Batch complete', {
    batch_id: batchId,
    record_count: records.length,
    error_count: errors.length,
  });

  return {
    batch_id: batchId,
    field_set: registry.name,
    field_names: [...registry.fields()],
    uppercase,
    document_count: documents.length,
    records,
    errors,
    previews,
    completed_at: new Date().toISOString(),
  };
}
