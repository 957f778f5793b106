/**
 * Shared CLI startup: environment, configuration and log level.
 *
 * Dependency direction: bootstrap.ts → config manager, logger
 * Used by: every CLI command
 */

import { getConfig, loadDotEnv } from '../../core/config/manager.js';
import type { AppConfig } from '../../core/config/types.js';
import { logger, parseLogLevel } from '../../utils/logger.js';

/** Load `.env`, read the configuration and apply its log level. */
export function bootstrap(options: { verbose?: boolean } = {}): AppConfig {
    loadDotEnv();
    const config = getConfig();
    logger.setLogLevel(parseLogLevel(options.verbose ? 'debug' : config.logLevel));
    return config;
}
