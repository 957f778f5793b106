/**
 * `mission-coach ask` — Route one request through the agent system.
 *
 * Dependency direction: ask.ts → commander, workflow/runner, personalization
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { createAgentSystem } from '../../core/workflow/runner.js';
import { personalizationPayloadSchema } from '../../core/personalization/types.js';
import { shutdownTracer } from '../../core/tracing/tracer.js';
import { readJsonFile } from '../../utils/fs.js';
import { validateInput } from '../../utils/validation.js';
import { bootstrap } from '../utils/bootstrap.js';
import { printResult } from '../utils/render.js';
import { withSpinner } from '../utils/spinner.js';

interface AskOptions {
    user?: string;
    payload?: string;
    json?: boolean;
    verbose?: boolean;
}

export const askCommand = new Command('ask')
    .description('Route a request to the planner, coach or analysis agent')
    .argument('<request>', 'The request text')
    .option('-u, --user <id>', 'User id for personalization')
    .option('-p, --payload <file>', 'JSON file with { preferences, event } for the user')
    .option('--json', 'Print the raw result as JSON')
    .option('-v, --verbose', 'Show debug output')
    .action(async (request: string, options: AskOptions) => {
        const config = bootstrap(options);
        const payload = options.payload
            ? validateInput(personalizationPayloadSchema, readJsonFile(options.payload), 'personalization payload')
            : undefined;

        const system = createAgentSystem(config);
        try {
            const result = await withSpinner('Thinking...', () =>
                system.run({
                    userRequest: request,
                    userId: options.user,
                    userPayload: payload,
                }),
            );

            if (options.json) {
                console.log(JSON.stringify(result, null, 2));
            } else {
                printResult(result);
            }
        } finally {
            await shutdownTracer();
        }
    });
