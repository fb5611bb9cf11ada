// must stay first: loads .env before any module reads process.env
import 'dotenv/config';

import { loadScoringConfig } from '../../lib/config';
import { createLogger } from '../../lib/logger';
import { createApp } from './app';

const log = createLogger('server');

process.on('uncaughtException', (err) => {
  log.error('uncaughtException:', err);
});
process.on('unhandledRejection', (err) => {
  log.error('unhandledRejection:', err);
});

const config = loadScoringConfig();
const app = createApp({ config });

const PORT = Number(process.env.PORT) || 3001;
app.listen(PORT, () => log.info(`Server listening on port ${PORT}`, config));
