export {
    LanguageTagError,
    resolveLanguage,
    isEnglish,
    findLanguageMatch,
    type ResolvedLanguage,
} from './languageTag';
