// Run the pipeline once over a targets file and print the result as JSON.
//
// Usage:
//   node dist/scripts/analyze.js --targets ./targets.json --collection-size 500 [--mode rarity|occurrence|data] [--concurrency 20]
//
// The targets file is either an array of URLs / { url, id } objects, or a range:
//   { "baseUrl": "https://example.test/meta/", "from": 1, "to": 500, "query": { "token": "..." } }

import 'dotenv/config';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { Agent } from 'undici';
import { loadConfig } from '../config/configManager';
import { toOccurrenceMap } from '../services/occurrenceService';
import { getData, getOccurrenceData, getRarityData, partitionResults } from '../services/pipeline';
import { logger } from '../utils/logger';
import { parseTargets } from '../utils/targets';

type Mode = 'data' | 'occurrence' | 'rarity';

function parseArgs(argv: string[]): Record<string, string> {
    const args: Record<string, string> = {};
    for (let i = 2; i < argv.length; i++) {
        const a = argv[i];
        if (a.startsWith('--')) {
            const next = argv[i + 1];
            if (!next || next.startsWith('--')) {
                args[a.slice(2)] = 'true';
            } else {
                args[a.slice(2)] = next;
                i++;
            }
        }
    }
    return args;
}

function readMode(value: string | undefined): Mode {
    if (value === undefined) return 'rarity';
    if (value === 'data' || value === 'occurrence' || value === 'rarity') return value;
    throw new Error(`Unknown mode "${value}"`);
}

async function main() {
    const args = parseArgs(process.argv);
    if (!args.targets) {
        logger.error('Usage: --targets <path> [--collection-size N] [--mode rarity|occurrence|data] [--concurrency N]');
        process.exit(1);
    }

    const config = loadConfig();
    const mode = readMode(args.mode);
    const targets = parseTargets(JSON.parse(await readFile(resolve(process.cwd(), args.targets), 'utf8')));

    const agent = new Agent({ connect: { keepAlive: true }, connections: config.maxConnections });
    const options = {
        client: agent,
        concurrency: args.concurrency ? Number(args.concurrency) : config.concurrency,
        timeoutMs: config.requestTimeoutMs,
        schema: config.schema
    };

    try {
        let output: unknown;
        if (mode === 'data') {
            output = partitionResults(await getData(targets, options));
        } else if (mode === 'occurrence') {
            const { results, table } = await getOccurrenceData(targets, options);
            output = { occurrences: toOccurrenceMap(table), itemCount: table.itemCount, errors: partitionResults(results).errors };
        } else {
            const collectionSize = Number(args['collection-size'] ?? targets.length);
            const { results, records, items } = await getRarityData(targets, collectionSize, options);
            output = { records, items, errors: partitionResults(results).errors };
        }
        process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
    } finally {
        await agent.close();
    }
}

main().catch((e: unknown) => {
    logger.error('Analysis failed:', e);
    process.exit(1);
});
