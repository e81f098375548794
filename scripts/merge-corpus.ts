import { getPipelineConfig } from '../src/config/pipeline.config';
import { createCompositionRoot } from '../src/app/composition-root';
import { runMergeCommand } from '../src/app/commands';
import { logger } from '../src/utils/logger';

function main(): void {
  const root = createCompositionRoot(getPipelineConfig());
  const result = runMergeCommand(root);
  if (!result.outputPath) process.exitCode = 1;
}

try {
  main();
} catch (err) {
  logger.error('merge_corpus.fatal', err);
  process.exitCode = 1;
}
