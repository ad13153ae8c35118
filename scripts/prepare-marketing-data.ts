import { runMarketingEtl } from '../packages/data-pipeline/src/index.ts';
import { createRuntimeLogger, resolveRuntimeConfig } from '../packages/shared/src/node.ts';

async function main(): Promise<void> {
  const configResult = resolveRuntimeConfig(process.env, process.cwd());
  if (!configResult.ok) {
    console.error(configResult.error.toString());
    process.exitCode = 1;
    return;
  }
  const config = configResult.value;
  const logger = createRuntimeLogger(config, { script: 'prepare-marketing-data' });

  const result = await runMarketingEtl({
    sourcePath: config.sourcePath,
    outputPath: config.preparedPath,
    reportYear: config.reportYear,
    logger,
  });
  if (!result.ok) {
    process.exitCode = 1;
    return;
  }

  logger.info('Marketing data prepared.', {
    tables: result.value.tableSummaries.length,
    longRows: result.value.longRowCount,
    missingValues: result.value.missingCount,
  });
}

void main();
