/**
 * Command-line argument parsing
 */

export interface CliArgs {
    command?: string;
    inputs: string[];
    context?: string;
    config?: string;
    debug: boolean;
    help: boolean;
    version: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
    const parsed: CliArgs = { inputs: [], debug: false, help: false, version: false };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const next = argv[i + 1];

        if (arg === '--help' || arg === '-h') {
            parsed.help = true;
        } else if (arg === '--version' || arg === '-v') {
            parsed.version = true;
        } else if (arg === '--debug') {
            parsed.debug = true;
        } else if (arg === '--input' && next !== undefined) {
            parsed.inputs.push(next);
            i++;
        } else if (arg === '--context' && next !== undefined) {
            parsed.context = next;
            i++;
        } else if (arg === '--config' && next !== undefined) {
            parsed.config = next;
            i++;
        } else if (!arg.startsWith('--') && parsed.command === undefined) {
            parsed.command = arg;
        }
    }

    return parsed;
}

/**
 * Returns an error message when the arguments cannot start a run
 */
export function validateArgs(args: CliArgs): string | undefined {
    if (!args.command) {
        return 'No command specified. Use "offerlens analyze" or "offerlens --help"';
    }
    if (args.command !== 'analyze') {
        return `Unknown command "${args.command}". Use "offerlens --help" for usage.`;
    }
    if (args.inputs.length === 0) {
        return '--input is required';
    }
    return undefined;
}

export const USAGE = 'Usage: offerlens analyze --input <path> [--input <path> ...] [--context <path>] [--config <path>]';

export const HELP_TEXT = `
offerlens - extract prices and placement terms from offer emails with LM Studio

USAGE:
  offerlens analyze [OPTIONS]

OPTIONS:
  --input <path>    Email text file to analyze (repeatable)
  --context <path>  Text file with the surrounding thread
  --config <path>   Config file (default: $OFFERLENS_CONFIG or config/config.json)
  --debug           Enable debug logging
  --version, -v     Show version number
  --help, -h        Show this help message

EXAMPLES:
  offerlens analyze --input mail/offer-1.txt --input mail/offer-2.txt
  offerlens analyze --config config/config.json --input offer.txt --debug
`;
