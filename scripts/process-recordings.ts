import { getPipelineConfig } from '../src/config/pipeline.config';
import { createCompositionRoot } from '../src/app/composition-root';
import { runProcessCommand } from '../src/app/commands';
import { logger } from '../src/utils/logger';

async function main(): Promise<void> {
  const root = createCompositionRoot(getPipelineConfig());
  const summary = await runProcessCommand(root);
  if (summary.failed.length > 0) process.exitCode = 1;
}

main().catch((err) => {
  logger.error('process_recordings.fatal', err);
  process.exitCode = 1;
});
