import * as dotenv from 'dotenv';
import { logger } from '../logger.js';
import { isDryRun } from '../utils.js';
import { createApp } from './app.js';

dotenv.config();

const dryRun = isDryRun();
if (!dryRun && !process.env.AI_GATEWAY_API_KEY) {
  logger.log({
    type: 'ERROR',
    content: 'Missing AI_GATEWAY_API_KEY. Set it in .env, or start with IMPOSTER_DRY_RUN=1.',
  });
  process.exit(1);
}

const port = Number(process.env.PORT || 3001);
const { app } = createApp({ dryRun });

app.listen(port, () => {
  logger.log({ type: 'SYSTEM', content: `Imposter Arena API listening on http://localhost:${port}${dryRun ? ' (dry run)' : ''}` });
});
