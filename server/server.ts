import 'dotenv/config';
import './observability/instruments.js';

import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { logEnvironmentInfo } from './debug-helpers.js';
import { logger } from './observability/logger.js';

const config = loadConfig();
const { app, registry } = createApp(config);

logEnvironmentInfo(config, registry);

app.listen(config.port, () => {
  logger.info(`OAuth broker listening on port ${config.port}`, { baseUrl: config.baseUrl });
});
