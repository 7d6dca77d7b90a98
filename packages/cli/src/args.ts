import { ExportFormatSchema, EXPORT_FORMAT_NAMES } from '@ledgerbridge/shared';
import type { CliCommand, ConvertOptions } from './types.js';

export const VERSION = '1.0.0';

export const USAGE = [
    `ledgerbridge v${VERSION}`,
    '',
    'Convert a ledger of directives to Ledger or hledger journal text.',
    '',
    'Usage: ledgerbridge <ledger-file> [--format <name>] [--output <file>]',
    '',
    'Options:',
    `  -f, --format <name>   Output format: ${EXPORT_FORMAT_NAMES.join(' | ')} (default: ledger)`,
    '  -o, --output <file>   Write to a file instead of stdout',
    '  -h, --help            Show this help',
    '  -v, --version         Show the version',
    '',
    'Example:',
    '  ledgerbridge books.yaml --format hledger -o books.journal',
].join('\n');

function takeValue(args: string[], index: number, flag: string): string {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('-')) {
        throw new Error(`Missing value for ${flag}`);
    }
    return value;
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws Error on unknown options, missing values or an invalid format
 */
export function parseCliArgs(args: string[]): CliCommand {
    if (args.length === 0 || args.includes('-h') || args.includes('--help')) {
        return { kind: 'help' };
    }
    if (args.includes('-v') || args.includes('--version')) {
        return { kind: 'version' };
    }

    const positional: string[] = [];
    const options: Omit<ConvertOptions, 'input'> = {};

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '-f':
            case '--format': {
                const value = takeValue(args, i, arg);
                const format = ExportFormatSchema.safeParse(value);
                if (!format.success) {
                    throw new Error(`Invalid format "${value}". Supported: ${EXPORT_FORMAT_NAMES.join(', ')}`);
                }
                options.format = format.data;
                i++;
                break;
            }
            case '-o':
            case '--output':
                options.output = takeValue(args, i, arg);
                i++;
                break;
            default:
                if (arg.startsWith('-')) {
                    throw new Error(`Unknown option: ${arg}`);
                }
                positional.push(arg);
        }
    }

    if (positional.length !== 1) {
        throw new Error(`Expected exactly one ledger file, got ${positional.length}`);
    }

    return { kind: 'convert', options: { input: positional[0], ...options } };
}
