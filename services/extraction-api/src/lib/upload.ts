/**
 * Multipart Upload Parsing
 *
 * Collects the PDF parts of a multipart/form-data request into memory,
 * keeping the order in which they were uploaded.
 */

import busboy from 'busboy';
import type { Request } from 'express';
import type { UploadedDocument } from '@policy-extractor/shared';

export const UPLOAD_FIELD_NAMES = ['files', 'file'];

export interface UploadLimits {
  maxFileBytes: number;
  maxFiles: number;
}

export class UploadError extends Error {
  readonly status: 400 | 413;
  readonly code: 'invalid_request' | 'payload_too_large';

  constructor(status: 400 | 413, message: string) {
    super(message);
    this.name = 'UploadError';
    this.status = status;
    this.code = status === 413 ? 'payload_too_large' : 'invalid_request';
    Object.setPrototypeOf(this, UploadError.prototype);
  }
}

function isPdf(filename: string, mimeType: string): boolean {
  return mimeType === 'application/pdf' || filename.toLowerCase().endsWith('.pdf');
}

function createParser(req: Request, limits: UploadLimits): busboy.Busboy | UploadError {
  try {
    return busboy({
      headers: req.headers,
      limits: { fileSize: limits.maxFileBytes, files: limits.maxFiles },
    });
  } catch (err) {
    // Thrown for a multipart content type without a boundary
    return new UploadError(400, err instanceof Error ? err.message : 'Invalid multipart request');
  }
}

export function parsePdfUploads(req: Request, limits: UploadLimits): Promise<UploadedDocument[]> {
  const contentType = req.headers['content-type'] || '';
  if (!contentType.toLowerCase().startsWith('multipart/form-data')) {
    return Promise.reject(
      new UploadError(400, 'Invalid content type. Expected multipart/form-data')
    );
  }

  const parser = createParser(req, limits);
  if (parser instanceof UploadError) {
    return Promise.reject(parser);
  }

  return new Promise<UploadedDocument[]>((resolve, reject) => {
    const pending: Array<Promise<UploadedDocument>> = [];
    let failure: UploadError | null = null;

    parser.on('file', (fieldname, file, info) => {
      if (!UPLOAD_FIELD_NAMES.includes(fieldname)) {
        file.resume();
        return;
      }

      if (!isPdf(info.filename, info.mimeType)) {
        failure = failure ?? new UploadError(400, `Only PDF files are accepted: ${info.filename}`);
        file.resume();
        return;
      }

      pending.push(
        new Promise<UploadedDocument>((resolveFile, rejectFile) => {
          const chunks: Buffer[] = [];

          file.on('data', (data: Buffer) => {
            chunks.push(data);
          });

          file.on('limit', () => {
            failure =
              failure ??
              new UploadError(413, `${info.filename} exceeds the ${limits.maxFileBytes} byte limit`);
          });

          file.on('error', rejectFile);

          file.on('end', () => {
            resolveFile({ filename: info.filename, content: Buffer.concat(chunks) });
          });
        })
      );
    });

    parser.on('filesLimit', () => {
      failure = failure ?? new UploadError(413, `At most ${limits.maxFiles} files per batch`);
    });

    parser.on('error', (err: unknown) => {
      reject(new UploadError(400, err instanceof Error ? err.message : 'Invalid multipart request'));
    });

    parser.on('close', () => {
      Promise.all(pending).then((documents) => {
        if (failure) {
          reject(failure);
        } else if (documents.length === 0) {
          reject(new UploadError(400, 'Upload at least one PDF in the "files" field'));
        } else {
          resolve(documents);
        }
      }, reject);
    });

    req.pipe(parser);
  });
}
