#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'node:util';
import { createChatEnhancer } from './enhancer.js';
import { createLogger } from './logger.js';
import { runPipeline, type PipelineOptions } from './pipeline.js';
import { assertCronExpression, exitCodeFor, scheduleRuns } from './schedule.js';
import { createServer } from './server.js';

const logger = createLogger('main');

function parseCli(argv: string[]) {
    const { values } = parseArgs({
        args: argv,
        options: {
            config: { type: 'string', default: 'feeds.yaml' },
            output: { type: 'string', default: 'public/index.html' },
            json: { type: 'string' },
            'send-email': { type: 'boolean', default: false },
            schedule: { type: 'string' },
            serve: { type: 'boolean', default: false },
        },
        strict: true,
    });
    return values;
}

async function main() {
    const args = parseCli(process.argv.slice(2));
    const opts: PipelineOptions = {
        configPath: args.config ?? 'feeds.yaml',
        htmlPath: args.output ?? 'public/index.html',
        jsonPath: args.json,
        sendEmail: args['send-email'] ?? false,
        enhancer: createChatEnhancer(),
    };

    if (args.schedule) assertCronExpression(args.schedule);

    const first = await runPipeline(opts);

    if (args.serve) {
        const app = createServer({ htmlPath: opts.htmlPath, jsonPath: opts.jsonPath });
        const port = Number(process.env.PORT || 3000);
        app.listen(port, () => logger.info(`server.started http://localhost:${port}`));
    }

    if (args.schedule) scheduleRuns(args.schedule, () => runPipeline(opts));

    process.exitCode = exitCodeFor(first, { serve: args.serve ?? false, schedule: Boolean(args.schedule) });
}

main().catch((e: unknown) => {
    logger.error('fatal', { err: e instanceof Error ? e.message : String(e) });
    process.exit(1);
});
