/**
 * `mission-coach service` — Call a coaching service with a JSON request file.
 *
 * Dependency direction: service.ts → commander, ora, services/coaching
 * Used by: cli/index.ts
 */

import { Argument, Command } from 'commander';
import ora from 'ora';
import { CoachingService } from '../../services/coaching.js';
import { createAgentSystem } from '../../core/workflow/runner.js';
import { shutdownTracer } from '../../core/tracing/tracer.js';
import { readJsonFile } from '../../utils/fs.js';
import { bootstrap } from '../utils/bootstrap.js';

export const SERVICE_KINDS = ['missions', 'feedback', 'weekly', 'chat-start', 'chat-reply'] as const;
export type ServiceKind = (typeof SERVICE_KINDS)[number];

/** Dispatch a raw request to the service operation for `kind`. */
export function callService(service: CoachingService, kind: ServiceKind, request: unknown): Promise<unknown> {
    switch (kind) {
        case 'missions':
            return service.recommendDailyMissions(request);
        case 'feedback':
            return service.generateDailyFeedback(request);
        case 'weekly':
            return service.analyzeWeek(request);
        case 'chat-start':
            return service.startChatSession(request);
        case 'chat-reply':
            return service.replyToChatMessage(request);
    }
}

export const serviceCommand = new Command('service')
    .description('Call a coaching service with a JSON request file')
    .addArgument(new Argument('<kind>', 'Service to call').choices(SERVICE_KINDS))
    .argument('<file>', 'Path to the JSON request')
    .option('-v, --verbose', 'Show debug output')
    .action(async (kind: ServiceKind, file: string, options: { verbose?: boolean }) => {
        const config = bootstrap(options);
        const request = readJsonFile(file);
        const service = new CoachingService(createAgentSystem(config));

        const spinner = ora(`Calling ${kind}...`).start();
        try {
            const response = await callService(service, kind, request);
            spinner.succeed(`${kind} complete`);
            console.log(JSON.stringify(response, null, 2));
        } catch (err) {
            spinner.fail(`${kind} failed`);
            throw err;
        } finally {
            await shutdownTracer();
        }
    });
