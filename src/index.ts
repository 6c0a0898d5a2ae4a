// src/index.ts

// must run before anything reads process.env (the logger reads it at import)
import 'dotenv/config';
import { loadConfig } from './config/Config.ts';
import { createPipeline } from './pipeline/createPipeline.ts';
import { PipelineError } from './model/Errors.ts';
import { createLogger } from './utils/Logger.ts';

//central logger init
const logger = createLogger('app');

/**
 * Incremental ingest: adds new raw daily files to the hourly and 15-minute datasets.
 *
 * Usage: npm run ingest
 */
async function main() {
  const config = loadConfig();
  logger.info(
    { rawDataDir: config.storage.rawDataDir, outputDir: config.storage.outputDir, cutoverDate: config.engine.cutoverDate },
    'Price ingest starting...'
  );

  const { pipeline, close } = createPipeline(config);
  try {
    const summary = await pipeline.ingest();
    for (const skipped of summary.skipped) {
      logger.warn({ file: skipped.source, reason: skipped.reason }, `Skipped ${skipped.source}`);
    }
  } finally {
    await close();
  }
}

main().catch((err) => {
  if (err instanceof PipelineError) {
    logger.error({ err, ...err.context }, `Ingest failed: ${err.message}`);
  } else {
    logger.error({ err }, 'Ingest failed');
  }
  process.exit(1);
});
