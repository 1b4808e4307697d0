import { PositionMap, type Logger, type MappedText } from '../common';
import { ConsistencyError } from './errors';

/**
 * One normalization step. `apply` yields the new text in chunks, each with the map from the
 * slice of the input it was derived from. A stage that rewrites its input as a whole yields
 * a single chunk.
 */
export interface TextStage {
    readonly name: string;
    apply(text: string): Iterable<MappedText>;
}

export type StageResult =
    | { readonly kind: 'ok'; readonly text: string; readonly map: PositionMap }
    | { readonly kind: 'inconsistent'; readonly text: string; readonly map: PositionMap; readonly reason: string }
    | { readonly kind: 'failed'; readonly error: unknown };

export interface NormalizationOptions {
    /**
     * Log instead of throwing when a stage fails or returns a bad map. A failing stage is
     * skipped and a bad map is replaced by an even spread, so the output may be less clean
     * or less precisely mapped.
     */
    readonly faultTolerant?: boolean;
    readonly logger?: Logger;
}

export const DEFAULT_NORMALIZATION_OPTIONS: Required<NormalizationOptions> = {
    faultTolerant: false,
    logger: console,
};

/**
 * Runs a stage and joins its chunks. Never throws: errors raised by the stage are returned.
 */
export function runStage(stage: TextStage, text: string): StageResult {
    let chunks: MappedText[];
    try {
        chunks = Array.from(stage.apply(text));
    } catch (error) {
        return { kind: 'failed', error };
    }

    const output = chunks.map(chunk => chunk.text).join('');
    const map = PositionMap.concatAll(chunks.map(chunk => chunk.map));
    if (map.sourceLength !== text.length || map.targetLength !== output.length) {
        return {
            kind: 'inconsistent',
            text: output,
            map,
            reason: `expected a ${text.length}x${output.length} map, got ${map.sourceLength}x${map.targetLength}`,
        };
    }
    return { kind: 'ok', text: output, map };
}

/**
 * Applies `stages` in order and accumulates the map from `text` to the final output.
 *
 * @throws ConsistencyError when a stage returns a bad map, unless fault tolerant
 */
export function applyTextStages(
    text: string,
    stages: readonly TextStage[],
    options: NormalizationOptions = {}
): MappedText {
    const faultTolerant = options.faultTolerant ?? DEFAULT_NORMALIZATION_OPTIONS.faultTolerant;
    const logger = options.logger ?? DEFAULT_NORMALIZATION_OPTIONS.logger;

    let current = text;
    let map = PositionMap.identity(text.length);
    for (const stage of stages) {
        const result = runStage(stage, current);
        switch (result.kind) {
            case 'failed':
                if (!faultTolerant) {
                    throw result.error;
                }
                logger.error(`[Normalization] Stage "${stage.name}" failed, skipping it: ${describeError(result.error)}`);
                continue;

            case 'inconsistent':
                if (!faultTolerant) {
                    throw new ConsistencyError(stage.name, result.reason);
                }
                logger.error(`[Normalization] Stage "${stage.name}" gave an incorrect mapping (${result.reason}), spreading it evenly`);
                map = map.compose(PositionMap.lerp(current.length, result.text.length));
                current = result.text;
                break;

            case 'ok':
                map = map.compose(result.map);
                current = result.text;
                break;
        }
    }

    return { text: current, map };
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
