/**
 * Extraction API - process entry point
 */

import { logger, config, resolveRegistry } from '@policy-extractor/shared';
import { createApp } from './app';
import { extractPdfText } from './lib/pdf';
import { resolveSpreadsheetEngine } from './lib/spreadsheet';

async function main(): Promise<void> {
  const registry = resolveRegistry(config);
  const spreadsheet = await resolveSpreadsheetEngine(config.spreadsheetEngine);

  const app = createApp({ config, registry, spreadsheet, extractText: extractPdfText });

  const server = app.listen(config.port, () => {
    logger.info('Extraction API started', {
      port: config.port,
      field_set: registry.name,
      fields: registry.fields(),
      uppercase_default: config.uppercaseText,
      spreadsheet_engine: spreadsheet.status,
    });
  });

  // Graceful shutdown
  function shutdown(signal: string): void {
    logger.info(`${signal} received, shutting down`);
    server.close(() => process.exit(0));
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
  logger.error('Extraction API failed to start', error);
  process.exit(1);
});
