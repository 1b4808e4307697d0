import { Command, Option } from 'commander';
import * as fs from 'fs';
import { diffText, MyersAligner, NeedlemanWunschAligner, renderTextDiff, type Aligner } from './diff';

const ALIGNERS: Record<string, () => Aligner> = {
    'myers': () => new MyersAligner(),
    'needleman-wunsch': () => new NeedlemanWunschAligner(),
};

interface CliOptions {
    lang: string;
    files?: boolean;
    json?: boolean;
    color: boolean;
    faultTolerant?: boolean;
    aligner: string;
}

/** Where the CLI reads its files from and writes its output to. */
export interface CliEnvironment {
    readFile(path: string): Promise<string>;
    write(text: string): void;
}

const nodeEnvironment: CliEnvironment = {
    readFile: path => fs.promises.readFile(path, 'utf8'),
    write: text => {
        process.stdout.write(text);
    },
};

export function createProgram(env: CliEnvironment = nodeEnvironment): Command {
    const program = new Command();

    program
        .name('transcription-diff')
        .description('Show where a transcript differs in pronunciation from a reference text')
        .version('1.0.0')
        .argument('<reference>', 'reference text, or its path with --files')
        .argument('<compared>', 'text to compare, e.g. a speech recognition output, or its path with --files')
        .option('-l, --lang <tag>', 'IETF language tag of both texts', 'en-us')
        .option('-f, --files', 'read both texts from files')
        .option('--json', 'print the regions as JSON')
        .option('--no-color', 'do not color mismatches')
        .option('--fault-tolerant', 'log normalization errors instead of failing')
        .addOption(
            new Option('-a, --aligner <name>', 'word aligner').choices(Object.keys(ALIGNERS)).default('myers')
        )
        .action(async (reference: string, compared: string, options: CliOptions) => {
            const [referenceText, comparedText] = options.files
                ? await Promise.all([env.readFile(reference), env.readFile(compared)])
                : [reference, compared];

            const regions = diffText(referenceText, comparedText, options.lang, {
                aligner: ALIGNERS[options.aligner](),
                faultTolerant: options.faultTolerant,
            });

            env.write(options.json
                ? `${JSON.stringify(regions, null, 2)}\n`
                : `${renderTextDiff(regions, { colors: options.color })}\n`);
        });

    return program;
}

/** Runs the CLI. Errors are printed and reflected in the exit code. */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
    try {
        await createProgram().parseAsync([...argv]);
    } catch (error) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    }
}
