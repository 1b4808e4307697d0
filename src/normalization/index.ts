export { normalizeText, normalizationStages } from './normalizeText';
export {
    applyTextStages,
    runStage,
    DEFAULT_NORMALIZATION_OPTIONS,
    type TextStage,
    type StageResult,
    type NormalizationOptions,
} from './pipeline';
export {
    standardizeCharacters,
    collapseWhitespace,
    expandAbbreviations,
    normalizeNumbers,
    keepPronouncedOnly,
} from './stages';
export { expandNumbers, WordSequence, NUMBER_RULES, type NumberRule, type WordExpansion } from './numbers';
export { numberToWords, ordinalToWords } from './numberWords';
export { ConsistencyError } from './errors';
