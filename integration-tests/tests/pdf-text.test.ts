/**
 * PDF Text Extraction Tests
 *
 * Runs real PDF bytes through pdfjs-dist. Unreadable input must come back as
 * empty text rather than a rejection.
 */

import { extractDocument, getBuiltInRegistry } from '@policy-extractor/shared';
import { extractPdfText } from '../../services/extraction-api/src/lib/pdf';

interface TextLine {
  y: number;
  text: string;
}

/**
 * Build a one-page PDF drawing each line in Helvetica with WinAnsi encoding.
 */
function buildPdf(lines: TextLine[]): Buffer {
  const content = lines
    .map((line) => `BT /F1 12 Tf 72 ${line.y} Td (${line.text}) Tj ET`)
    .join('\n');

  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 5 0 R >> >> /Contents 4 0 R >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>',
  ];

  // Every character is a single latin1 byte, so string offsets are byte offsets
  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, index) => {
    offsets.push(pdf.length);
    pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(pdf, 'latin1');
}

describe('PDF text extraction', () => {
  const schedule = buildPdf([
    { y: 720, text: 'PÓLIZA N° AB-123/45' },
    { y: 700, text: 'TASA DE VENTA DE LA PÓLIZA 3.5%' },
  ]);

  it('should rebuild the page lines from top to bottom', async () => {
    const text = await extractPdfText(schedule, 'schedule.pdf');

    expect(text).toBe('PÓLIZA N° AB-123/45\nTASA DE VENTA DE LA PÓLIZA 3.5%');
  });

  it('should yield text the policy schedule rules can read', async () => {
    const text = await extractPdfText(schedule, 'schedule.pdf');
    const { record, errors } = extractDocument('schedule.pdf', text, getBuiltInRegistry('full'));

    expect(errors).toEqual([]);
    expect(record?.values.NUM_POL).toBe('AB-123/45');
    expect(record?.values.TASA_VENTA).toBe('3.5');
  });

  it('should only write structured log lines while reading a document', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    try {
      await extractPdfText(schedule, 'schedule.pdf');

      const lines = log.mock.calls.map(([line]) => String(line));
      expect(lines.filter((line) => line.startsWith('Warning:'))).toEqual([]);
      expect(lines.map((line) => JSON.parse(line).message)).toEqual([
        'PDF text extraction complete',
      ]);
    } finally {
      log.mockRestore();
    }
  });

  it('should return empty text for an empty upload', async () => {
    await expect(extractPdfText(new Uint8Array(0), 'empty.pdf')).resolves.toBe('');
  });

  it('should return empty text for bytes that are not a PDF', async () => {
    const notPdf = Buffer.from('PÓLIZA N° RV-0001, saved as plain text', 'utf-8');

    await expect(extractPdfText(notPdf, 'renamed.pdf')).resolves.toBe('');
  });
});
