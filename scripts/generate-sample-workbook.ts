import { writeSampleSourceWorkbook } from '../packages/data-pipeline/src/index.ts';
import { createRuntimeLogger, resolveRuntimeConfig } from '../packages/shared/src/node.ts';

/** Writes a made-up source workbook to KPI_SOURCE_PATH so the ETL can run without real data. */
async function main(): Promise<void> {
  const configResult = resolveRuntimeConfig(process.env, process.cwd());
  if (!configResult.ok) {
    console.error(configResult.error.toString());
    process.exitCode = 1;
    return;
  }
  const config = configResult.value;
  const logger = createRuntimeLogger(config, { script: 'generate-sample-workbook' });

  const result = await writeSampleSourceWorkbook(config.sourcePath);
  if (!result.ok) {
    logger.fatal('Sample workbook not written.', { error: result.error.toDTO() });
    process.exitCode = 1;
    return;
  }
  logger.info('Sample workbook written.', { sourcePath: config.sourcePath });
}

void main();
