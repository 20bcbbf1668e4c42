import { Logger } from '@snippet-sandbox/shared/Utils/logger.js';

/** Root logger for the service; components log through children of it. */
export const logger = new Logger('code-runner');
