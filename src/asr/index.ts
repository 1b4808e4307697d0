export {
    matchSupportedLanguage,
    UnsupportedLanguageError,
    type Transcriber,
    type Transcription,
    type TranscriptionOptions,
} from './transcriber';
export { TranscriberRegistry, type TranscriberRegistryOptions } from './transcriberRegistry';
export { transcriptionDiff, type TranscriptionDiffOptions } from './transcriptionDiff';
