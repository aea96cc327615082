#!/usr/bin/env node

/**
 * offerlens CLI
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { env } from './config/env.js';
import { ConfigError } from './config/errors.js';
import { HELP_TEXT, USAGE, parseArgs, validateArgs } from './commands/args.js';
import { runAnalyzeCommand } from './commands/analyze.js';

function readVersion(): string {
    const raw: unknown = JSON.parse(
        fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
    );
    const parsed = z.object({ version: z.string() }).safeParse(raw);
    return parsed.success ? parsed.data.version : 'unknown';
}

async function main(): Promise<number> {
    const args = parseArgs(process.argv.slice(2));

    if (args.help) {
        console.log(HELP_TEXT);
        return 0;
    }

    if (args.version) {
        console.log(`offerlens v${readVersion()}`);
        return 0;
    }

    const problem = validateArgs(args);
    if (problem) {
        console.error(`Error: ${problem}`);
        console.error(USAGE);
        return 1;
    }

    try {
        const report = await runAnalyzeCommand({
            configPath: args.config ?? env.OFFERLENS_CONFIG,
            inputs: args.inputs,
            contextPath: args.context,
            debug: args.debug,
        });
        console.log(JSON.stringify(report, null, 2));
        return 0;
    } catch (error) {
        const output =
            error instanceof ConfigError
                ? error.toJSON()
                : { message: error instanceof Error ? error.message : String(error) };
        console.error(JSON.stringify({ success: false, error: output }, null, 2));
        return 1;
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error('Fatal error:', error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    });
