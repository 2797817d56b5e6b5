import { app } from './app.js';
import { env } from './config/env.js';
import { metrics } from './stats/index.js';
import { logger } from './utils/logger.js';

async function main() {
  metrics.startBucketSweeper(env.BUCKET_METRICS_SWEEP_SEC * 1000, (err) =>
    logger.error({ err }, 'bucket metrics sweep failed')
  );
  app.listen(env.PORT, () => logger.info(`S3 gateway listening on http://localhost:${env.PORT}`));
}
main().catch((e) => {
  logger.error(e);
  process.exit(1);
});
