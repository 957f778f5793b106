/**
 * Terminal rendering of agent system results.
 *
 * Dependency direction: render.ts → chalk, agents/types, workflow/runner
 * Used by: ask, examples and chat commands
 */

import chalk from 'chalk';
import { AGENT_NODE_LABELS } from '../../agents/types.js';
import type { AgentSystemResult } from '../../core/workflow/runner.js';

/** Print the selected agent and its answer. */
export function printResult(result: AgentSystemResult): void {
    const agent = result.selectedAgent ? AGENT_NODE_LABELS[result.selectedAgent] : chalk.gray('none');
    console.log(chalk.gray(`  Agent: `) + chalk.bold(agent));
    if (result.context) {
        console.log(chalk.gray(`  Request: ${result.context.requestId}  Traced: ${result.context.traceEnabled}`));
    }
    console.log();
    console.log(result.taskCompleted ? result.agentResponse : chalk.yellow(result.agentResponse));
}
