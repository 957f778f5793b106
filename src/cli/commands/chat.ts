/**
 * `mission-coach chat` — Interactive session against the agent system.
 *
 * Every turn is a separate request under the same user id, so the
 * personalization record carries across turns.
 *
 * Dependency direction: chat.ts → commander, prompts, workflow/runner
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import { createAgentSystem } from '../../core/workflow/runner.js';
import { shutdownTracer } from '../../core/tracing/tracer.js';
import { logger } from '../../utils/logger.js';
import { bootstrap } from '../utils/bootstrap.js';
import { printResult } from '../utils/render.js';
import { withSpinner } from '../utils/spinner.js';

const EXIT_WORDS: ReadonlySet<string> = new Set(['exit', 'quit', '/q']);

export const chatCommand = new Command('chat')
    .description('Chat with the agents interactively')
    .option('-u, --user <id>', 'User id for personalization', 'cli_user')
    .option('-v, --verbose', 'Show debug output')
    .action(async (options: { user: string; verbose?: boolean }) => {
        const config = bootstrap(options);
        const system = createAgentSystem(config);

        logger.header('Mission Coach — Chat');
        console.log(chalk.gray('  Type "exit" to leave.\n'));

        try {
            for (;;) {
                const answers = await prompts({
                    type: 'text',
                    name: 'message',
                    message: 'You',
                });
                const message: unknown = answers.message;

                // Ctrl+C resolves with no answer
                if (typeof message !== 'string' || EXIT_WORDS.has(message.trim().toLowerCase())) {
                    break;
                }

                const result = await withSpinner('Thinking...', () =>
                    system.run({ userRequest: message, userId: options.user }),
                );
                printResult(result);
                console.log();
            }
        } finally {
            await shutdownTracer();
        }
        logger.info('Bye!');
    });
