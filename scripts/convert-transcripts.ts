import { getPipelineConfig } from '../src/config/pipeline.config';
import { createCompositionRoot } from '../src/app/composition-root';
import { runConvertCommand } from '../src/app/commands';
import { logger } from '../src/utils/logger';

async function main(): Promise<void> {
  const root = createCompositionRoot(getPipelineConfig());
  const summary = await runConvertCommand(root);
  if (summary.failed.length > 0) process.exitCode = 1;
}

main().catch((err) => {
  logger.error('convert_transcripts.fatal', err);
  process.exitCode = 1;
});
