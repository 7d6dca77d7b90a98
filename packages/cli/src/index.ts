#!/usr/bin/env node
/**
 * ledgerbridge CLI
 *
 * - CLI handles all file I/O and console output
 * - Core receives directives and a sink, returns nothing
 */

import { parseCliArgs, USAGE, VERSION } from './args.js';
import { convertLedger } from './commands/convert.js';
import { error } from './utils/console.js';

async function main(): Promise<void> {
    const command = parseCliArgs(process.argv.slice(2));

    switch (command.kind) {
        case 'help':
            console.log(USAGE);
            return;
        case 'version':
            console.log(`ledgerbridge v${VERSION}`);
            return;
        case 'convert':
            await convertLedger(command.options);
    }
}

main().catch((err: unknown) => {
    error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
