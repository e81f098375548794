import fs from 'fs';
import path from 'path';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface MergeSource {
  id: string;
  path: string;
}

export interface MergeResult {
  outputPath?: string;
  records: number;
  filesProcessed: Array<{ id: string; records: number }>;
  filesNotFound: string[];
  invalidLines: number;
}

/**
 * Concatenates per-recording JSONL artifacts into one training file. Blank and
 * unparseable lines are skipped; nothing is written when no record was read.
 */
export function mergeCorpusFiles(sources: readonly MergeSource[], outputPath: string): MergeResult {
  const merged: string[] = [];
  const result: MergeResult = { records: 0, filesProcessed: [], filesNotFound: [], invalidLines: 0 };

  for (const source of sources) {
    if (!fs.existsSync(source.path)) {
      logger.warn('merge.file_not_found', { id: source.id, path: source.path });
      result.filesNotFound.push(source.path);
      continue;
    }

    let count = 0;
    fs.readFileSync(source.path, 'utf-8').split(/\r?\n/).forEach((rawLine, i) => {
      const line = rawLine.trim();
      if (!line) return;
      try {
        merged.push(JSON.stringify(JSON.parse(line)));
        count++;
      } catch (err) {
        result.invalidLines++;
        logger.warn('merge.invalid_json_line', { id: source.id, line: i + 1, error: errorMessage(err) });
      }
    });
    result.filesProcessed.push({ id: source.id, records: count });
    logger.info('merge.file_processed', { id: source.id, records: count });
  }

  result.records = merged.length;
  if (merged.length === 0) {
    logger.warn('merge.nothing_to_write', { sources: sources.length });
    return result;
  }

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, merged.map((l) => `${l}\n`).join(''), 'utf-8');
  result.outputPath = outputPath;
  logger.info('merge.completed', { outputPath, records: merged.length, files: result.filesProcessed.length });
  return result;
}
