#!/usr/bin/env node

/**
 * CLI entry point — registers all commands with Commander.js.
 *
 * Dependency direction: cli/index.ts → commander, all command files
 * Used by: package.json bin entry ("mission-coach" binary)
 */

import { Command } from 'commander';
import { askCommand } from './commands/ask.js';
import { examplesCommand } from './commands/examples.js';
import { serviceCommand } from './commands/service.js';
import { chatCommand } from './commands/chat.js';
import { doctorCommand } from './commands/doctor.js';
import { AppError, describeError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

const program = new Command();

program
    .name('mission-coach')
    .description('Fitness coaching agents — request routing, personalization and tracing')
    .version('0.1.0');

// Register commands
program.addCommand(askCommand);
program.addCommand(examplesCommand);
program.addCommand(serviceCommand);
program.addCommand(chatCommand);
program.addCommand(doctorCommand);

program.parseAsync().catch((err: unknown) => {
    logger.error(err instanceof AppError ? `${err.code}: ${err.message}` : describeError(err));
    process.exitCode = 1;
});
