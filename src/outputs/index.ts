export { OutputWriter, INDEX_FILENAME } from './writer';
export { csvHeader, escapeCsvField, formatCsvRow, INDEX_COLUMNS, toIndexRow } from './csv';
export { formatTranscriptFile, sanitizeTitle, transcriptFilename } from './text';
