/**
 * `mission-coach doctor` — Health check for configuration and providers.
 *
 * Dependency direction: doctor.ts → commander, ora, chalk, config module, registry
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { resolveModel } from '../../core/config/manager.js';
import { validateAllProviders } from '../../providers/registry.js';
import { logger } from '../../utils/logger.js';
import { bootstrap } from '../utils/bootstrap.js';

export const doctorCommand = new Command('doctor')
    .description('Check configuration and provider health')
    .action(async () => {
        logger.header('Mission Coach — Health Check');

        const config = bootstrap();
        console.log(chalk.green('  ✔ Configuration is valid'));
        console.log(chalk.gray(`    provider=${config.llm.provider} model=${resolveModel(config)} env=${config.app.env}`));
        console.log(
            config.tracing.enabled
                ? chalk.gray(`    tracing → ${config.tracing.endpoint} (${config.tracing.project})`)
                : chalk.gray('    tracing disabled'),
        );

        console.log();
        logger.info('Checking provider connections...');

        const spinner = ora('Testing providers...').start();
        const results = await validateAllProviders(config.providers);
        spinner.stop();

        let activeHealthy = false;
        for (const [name, healthy] of Object.entries(results)) {
            if (healthy === null) {
                console.log(chalk.gray(`  - ${name} — not configured (skipped)`));
            } else if (healthy) {
                console.log(chalk.green(`  ✔ ${name} — connected`));
            } else {
                console.log(chalk.red(`  ✘ ${name} — connection failed`));
            }
            if (name === config.llm.provider && healthy) {
                activeHealthy = true;
            }
        }

        console.log();
        if (activeHealthy) {
            logger.success('All checks passed! You\'re ready to go.');
        } else {
            logger.warn(`The active provider (${config.llm.provider}) is not reachable. Review the output above.`);
            process.exitCode = 1;
        }
    });
