/**
 * `mission-coach examples` — Run one sample request per agent.
 *
 * Dependency direction: examples.ts → commander, chalk, workflow/runner
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createAgentSystem, type AgentSystemInput } from '../../core/workflow/runner.js';
import { shutdownTracer } from '../../core/tracing/tracer.js';
import { logger } from '../../utils/logger.js';
import { bootstrap } from '../utils/bootstrap.js';
import { printResult } from '../utils/render.js';
import { withSpinner } from '../utils/spinner.js';

export const EXAMPLE_REQUESTS: readonly AgentSystemInput[] = [
    {
        userRequest: '6개월 안에 5kg 감량하는 로드맵을 만들어줘',
        userId: 'demo_user_1',
        userPayload: {
            preferences: { 운동_선호: '걷기', 최소_가능_시간: '5분' },
            event: { mission: '자기 전 스트레칭 5분', mission_result: 'success', condition: '보통', schedule: '여유 있음' },
        },
    },
    {
        userRequest: '야근이 많은 날에도 할 수 있는 운동 가이드를 단계별로 알려줘',
        userId: 'demo_user_1',
        userPayload: {
            event: { mission: '퇴근길 5분 빠르게 걷기', mission_result: 'fail', fail_reason: '야근', condition: '피곤', schedule: '야근' },
        },
    },
    {
        userRequest: '지난주 미션 기록을 보고 왜 자꾸 실패하는지 알려줘',
        userId: 'demo_user_1',
    },
];

export const examplesCommand = new Command('examples')
    .description('Run a sample request for each agent')
    .option('-v, --verbose', 'Show debug output')
    .action(async (options: { verbose?: boolean }) => {
        const config = bootstrap(options);
        const system = createAgentSystem(config);

        logger.header('Mission Coach — Examples');
        try {
            for (const [index, example] of EXAMPLE_REQUESTS.entries()) {
                console.log(chalk.bold(`\n[${index + 1}/${EXAMPLE_REQUESTS.length}] ${example.userRequest}`));
                const result = await withSpinner('Thinking...', () => system.run(example));
                printResult(result);
            }
        } finally {
            await shutdownTracer();
        }
    });
