/**
 * Persist transcripts and the metadata index as outcomes arrive
 */

import { join } from 'node:path';
import type { IndexRow, TranscriptResult } from '../types';
import { appendTextFile, ensureDir, writeTextFile } from '../lib/fs';
import { createLogger } from '../lib/logger';
import { csvHeader, formatCsvRow, toIndexRow } from './csv';
import { formatTranscriptFile, transcriptFilename } from './text';

const log = createLogger('writer');

export const INDEX_FILENAME = 'index.csv';

export class OutputWriter {
  readonly outputDir: string;
  readonly indexPath: string;

  private prepared = false;
  private rows = 0;

  constructor(outputDir: string, indexFilename: string = INDEX_FILENAME) {
    this.outputDir = outputDir;
    this.indexPath = join(outputDir, indexFilename);
  }

  /** Rows written so far in this run */
  get rowCount(): number {
    return this.rows;
  }

  /**
   * Create the directory and start a fresh index. Runs once, before the first
   * write; an index left by an earlier run is replaced.
   */
  private async prepare(): Promise<void> {
    if (this.prepared) return;
    await ensureDir(this.outputDir);
    await writeTextFile(this.indexPath, csvHeader());
    this.prepared = true;
    log.debug({ outputDir: this.outputDir }, 'Output directory ready');
  }

  /**
   * Write the transcript file (when there is one) and append the index row
   */
  async record(result: TranscriptResult): Promise<IndexRow> {
    await this.prepare();
    const { video, outcome } = result;

    let transcriptPath: string | null = null;
    if (outcome.status === 'transcribed') {
      transcriptPath = transcriptFilename(video);
      await writeTextFile(
        join(this.outputDir, transcriptPath),
        formatTranscriptFile(video, outcome.transcriptText)
      );
      log.debug({ videoId: video.videoId, file: transcriptPath }, 'Wrote transcript');
    }

    const row = toIndexRow(video, outcome, transcriptPath);
    await appendTextFile(this.indexPath, formatCsvRow(row));
    this.rows++;
    return row;
  }

  /**
   * Make sure an index exists even when nothing was recorded
   */
  async finalize(): Promise<string> {
    await this.prepare();
    return this.indexPath;
  }
}
