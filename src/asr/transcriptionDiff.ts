import { DimensionMismatchError } from '../common';
import { diffTexts, type DiffOptions, type TextDiffRegion } from '../diff';
import type { Transcriber, TranscriptionOptions } from './transcriber';

export interface TranscriptionDiffOptions<TAudio> extends DiffOptions, TranscriptionOptions {
    readonly transcriber: Transcriber<TAudio>;
}

/**
 * Transcribes each audio input and diffs the transcript against the matching reference text.
 * Texts are normalized for the requested language, or the one the transcriber detected.
 *
 * @throws DimensionMismatchError if references, audio inputs and transcripts are not as many
 */
export async function transcriptionDiff<TAudio>(
    references: readonly string[],
    audio: readonly TAudio[],
    options: TranscriptionDiffOptions<TAudio>
): Promise<TextDiffRegion[][]> {
    if (references.length !== audio.length) {
        throw new DimensionMismatchError(`Got ${references.length} reference texts but ${audio.length} audio inputs`);
    }

    const { transcriber, language, customWords, ...diffOptions } = options;
    const transcription = await transcriber.transcribe(audio, { language, customWords });
    if (transcription.texts.length !== references.length) {
        throw new DimensionMismatchError(
            `Got ${transcription.texts.length} transcripts for ${references.length} audio inputs`
        );
    }

    return diffTexts(references, transcription.texts, language ?? transcription.language, diffOptions);
}
