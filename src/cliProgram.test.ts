import { describe, it, expect } from 'vitest';
import { createProgram, type CliEnvironment } from './cliProgram';

function createEnvironment(files: Record<string, string> = {}) {
    const output: string[] = [];
    const env: CliEnvironment = {
        readFile: async path => {
            const text = files[path];
            if (text === undefined) {
                throw new Error(`File not found: ${path}`);
            }
            return text;
        },
        write: text => {
            output.push(text);
        },
    };
    return { env, output };
}

async function run(env: CliEnvironment, args: string[]): Promise<void> {
    await createProgram(env)
        .exitOverride()
        .configureOutput({ writeErr: () => { }, writeOut: () => { } })
        .parseAsync(args, { from: 'user' });
}

describe('transcription-diff', () => {
    it('prints the rendered diff', async () => {
        const { env, output } = createEnvironment();
        await run(env, ['the cat sat', 'the cats sat', '--no-color']);
        expect(output).toEqual(['the (cats|cat) sat\n']);
    });

    it('colors mismatches by default', async () => {
        const { env, output } = createEnvironment();
        await run(env, ['cat', 'cats']);
        expect(output).toEqual(['(\x1b[31mcats\x1b[39m|\x1b[32mcat\x1b[39m)\n']);
    });

    it('reads texts from files', async () => {
        const { env, output } = createEnvironment({ 'ref.txt': 'Hello, world!', 'asr.txt': 'hello word' });
        await run(env, ['--files', 'ref.txt', 'asr.txt', '--no-color', '-a', 'needleman-wunsch']);
        expect(output).toEqual(['Hello, (word|world!)\n']);
    });

    it('prints regions as JSON', async () => {
        const { env, output } = createEnvironment();
        await run(env, ['a b', 'a c', '--json']);
        expect(JSON.parse(output.join(''))).toEqual([
            {
                referenceText: 'a ',
                comparedText: 'a ',
                pronunciationMatch: true,
                referenceRange: { start: 0, stop: 2 },
                comparedRange: { start: 0, stop: 2 },
            },
            {
                referenceText: 'b',
                comparedText: 'c',
                pronunciationMatch: false,
                referenceRange: { start: 2, stop: 3 },
                comparedRange: { start: 2, stop: 3 },
            },
        ]);
    });

    it('uses the language option', async () => {
        const { env, output } = createEnvironment();
        await run(env, ['Dr. 5', 'doctor five', '--lang', 'en-gb', '--no-color']);
        expect(output).toEqual(['Dr. 5\n']);
    });

    it('rejects unknown aligners', async () => {
        const { env } = createEnvironment();
        await expect(run(env, ['a', 'b', '--aligner', 'fastest'])).rejects.toMatchObject({
            code: 'commander.invalidArgument',
        });
    });

    it('propagates file errors', async () => {
        const { env } = createEnvironment();
        await expect(run(env, ['-f', 'missing.txt', 'other.txt'])).rejects.toThrow('File not found: missing.txt');
    });
});
