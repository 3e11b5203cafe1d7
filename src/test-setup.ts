import { initLogger } from './utils/logger.js';

initLogger({ level: 'silent', jsonLogs: true });
