import type { MappedText } from '../common';
import { isEnglish } from '../language';
import { applyTextStages, type NormalizationOptions, type TextStage } from './pipeline';
import {
    collapseWhitespace,
    expandAbbreviations,
    keepPronouncedOnly,
    normalizeNumbers,
    standardizeCharacters,
} from './stages';

/**
 * The stages `normalizeText` runs for a language. Abbreviations and numbers are only
 * expanded for English.
 *
 * @throws LanguageTagError if `languageTag` is malformed
 */
export function normalizationStages(languageTag: string): TextStage[] {
    return [
        standardizeCharacters,
        collapseWhitespace,
        ...(isEnglish(languageTag) ? [expandAbbreviations, normalizeNumbers] : []),
        keepPronouncedOnly,
        collapseWhitespace,
    ];
}

/**
 * Reduces a transcript to lower-case words separated by single spaces, the way they would
 * be spoken, e.g. `"Dr. Who, 1:30pm"` becomes `"doctor who one thirty p m"`.
 * The returned map goes from `rawText` to the normalized text.
 */
export function normalizeText(rawText: string, languageTag: string, options?: NormalizationOptions): MappedText {
    return applyTextStages(rawText, normalizationStages(languageTag), options);
}
