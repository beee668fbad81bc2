#!/usr/bin/env node
/**
 * translator-hub command line.
 *
 *   translator-hub list
 *   translator-hub languages -trans <name> [--dict]
 *   translator-hub translate -trans <name> [-src <lang>] -tg <lang> -txt <text> [--api-key <key>]
 *   translator-hub file <path> -trans <name> [-src <lang>] -tg <lang> [-o <out>] [--api-key <key>]
 *   translator-hub detect -txt <text> [--api-key <key>]
 */

import { translateFileToPath } from '../application/FileTranslationService';
import { FactoryOptions, createTranslator, listTranslators } from '../application/TranslatorFactory';
import { isTranslatorName } from '../domain/entities/Language';
import { ConfigurationError, NotSupportedError } from '../domain/errors/TranslationErrors';
import { getLanguageTable, supportedLanguages } from '../domain/services/LanguageRegistry';
import { singleDetection } from '../infrastructure/detection/LanguageDetectionClient';

export interface CliIO {
    stdout(line: string): void;
    stderr(line: string): void;
}

const consoleIO: CliIO = {
    stdout: line => console.log(line),
    stderr: line => console.error(line),
};

const USAGE = [
    'Usage: translator-hub <command> [options]',
    '',
    'Commands:',
    '  list                          List available translators',
    '  languages -trans <name>       List a translator\'s languages (--dict for codes)',
    '  translate -trans <name> -tg <lang> -txt <text>',
    '  file <path> -trans <name> -tg <lang> [-o <out>]',
    '  detect -txt <text>            Detect the language of a text',
    '',
    'Options:',
    '  -trans, --translator <name>   Backend name',
    '  -src, --source <lang>         Source language (default: auto)',
    '  -tg, --target <lang>          Target language',
    '  -txt, --text <text>           Text to translate or detect',
    '  -o, --output <path>           Output file for the file command',
    '  --api-key <key>               Credential for the chosen backend',
    '  --dict                        Print languages as name: code',
].join('\n');

type ValueFlag = 'translator' | 'source' | 'target' | 'text' | 'output' | 'apiKey';

const VALUE_FLAGS = new Map<string, ValueFlag>([
    ['-trans', 'translator'],
    ['--translator', 'translator'],
    ['-src', 'source'],
    ['--source', 'source'],
    ['-tg', 'target'],
    ['--target', 'target'],
    ['-txt', 'text'],
    ['--text', 'text'],
    ['-o', 'output'],
    ['--output', 'output'],
    ['--api-key', 'apiKey'],
]);

export interface ParsedArgs {
    command?: string;
    positionals: string[];
    values: Partial<Record<ValueFlag, string>>;
    dict: boolean;
    help: boolean;
}

export function parseArgs(argv: string[]): ParsedArgs {
    const parsed: ParsedArgs = { positionals: [], values: {}, dict: false, help: false };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const flag = VALUE_FLAGS.get(arg);

        if (flag) {
            const value = argv[i + 1];
            if (value === undefined) {
                throw new ConfigurationError(`Option ${arg} needs a value`);
            }
            parsed.values[flag] = value;
            i++;
        } else if (arg === '--dict') {
            parsed.dict = true;
        } else if (arg === '-h' || arg === '--help') {
            parsed.help = true;
        } else if (arg.startsWith('-')) {
            throw new ConfigurationError(`Unknown option: ${arg}`);
        } else if (parsed.command === undefined) {
            parsed.command = arg;
        } else {
            parsed.positionals.push(arg);
        }
    }

    return parsed;
}

function required(args: ParsedArgs, flag: ValueFlag, option: string): string {
    const value = args.values[flag];
    if (value === undefined || value.trim().length === 0) {
        throw new ConfigurationError(`Missing required option ${option}`);
    }
    return value;
}

function translatorOptions(args: ParsedArgs): FactoryOptions {
    const options: FactoryOptions = {
        source: args.values.source ?? 'auto',
        target: required(args, 'target', '-tg/--target'),
    };
    if (args.values.apiKey !== undefined) {
        options.apiKey = args.values.apiKey;
    }
    return options;
}

async function execute(args: ParsedArgs, io: CliIO): Promise<void> {
    switch (args.command) {
        case 'list':
            listTranslators().forEach(name => io.stdout(name));
            return;

        case 'languages': {
            const name = required(args, 'translator', '-trans/--translator');
            if (!isTranslatorName(name)) {
                throw new NotSupportedError(`Unknown translator "${name}". Run "translator-hub list" to see them.`);
            }
            const table = getLanguageTable(name);
            if (args.dict) {
                Object.entries(supportedLanguages(table, true)).forEach(([language, code]) => io.stdout(`${language}: ${code}`));
            } else {
                supportedLanguages(table).forEach(language => io.stdout(language));
            }
            return;
        }

        case 'translate': {
            const translator = createTranslator(required(args, 'translator', '-trans/--translator'), translatorOptions(args));
            const result = await translator.translate(required(args, 'text', '-txt/--text'));
            io.stdout(typeof result === 'string' ? result : JSON.stringify(result));
            return;
        }

        case 'file': {
            const input = args.positionals[0];
            if (!input) {
                throw new ConfigurationError('Missing file path: translator-hub file <path> ...');
            }
            const translator = createTranslator(required(args, 'translator', '-trans/--translator'), translatorOptions(args));
            const written = await translateFileToPath(translator, input, args.values.output);
            io.stdout(`Saved translation to ${written}`);
            return;
        }

        case 'detect': {
            const language = await singleDetection(required(args, 'text', '-txt/--text'), { apiKey: args.values.apiKey });
            io.stdout(language);
            return;
        }

        default:
            throw new NotSupportedError(`Unknown command "${args.command ?? ''}"\n${USAGE}`);
    }
}

/**
 * Runs one CLI invocation.
 *
 * @returns the process exit code
 */
export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
    try {
        const args = parseArgs(argv);
        if (args.help || args.command === undefined) {
            io.stdout(USAGE);
            return 0;
        }
        await execute(args, io);
        return 0;
    } catch (error) {
        io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }
}

if (require.main === module) {
    runCli(process.argv.slice(2))
        .then(code => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error('[CLI] Unexpected failure:', error);
            process.exitCode = 1;
        });
}
