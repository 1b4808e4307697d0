import { findLanguageMatch } from '../language';

export interface TranscriptionOptions {
    /** Language of the audio as an IETF tag. Detected by the transcriber when omitted. */
    readonly language?: string;
    /** Words likely to be unknown to the speech model, such as names. */
    readonly customWords?: readonly string[];
}

export interface Transcription {
    /** One transcript per audio input, in order. */
    readonly texts: readonly string[];
    /** The requested language, or the one detected on the first input. */
    readonly language: string;
}

/** A speech recognition engine, transcribing a batch of audio inputs at once. */
export interface Transcriber<TAudio> {
    transcribe(audio: readonly TAudio[], options?: TranscriptionOptions): Promise<Transcription>;
}

export class UnsupportedLanguageError extends Error {
    constructor(public readonly languageTag: string) {
        super(`Language "${languageTag}" is not supported by the transcriber`);
        this.name = new.target.name;
    }
}

/**
 * Picks the language a transcriber supports for the requested tag, ignoring territories,
 * e.g. `en` for `en-us`.
 *
 * @throws UnsupportedLanguageError if none of `supported` matches
 */
export function matchSupportedLanguage(languageTag: string, supported: readonly string[]): string {
    const [match] = findLanguageMatch(languageTag, supported, false);
    if (match === undefined) {
        throw new UnsupportedLanguageError(languageTag);
    }
    return supported[match];
}
