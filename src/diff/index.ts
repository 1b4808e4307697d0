export {
    MyersAligner,
    NeedlemanWunschAligner,
    type Aligner,
    type AlignedSequences,
    type NeedlemanWunschScores,
} from './aligner';
export {
    cleanTextDiff,
    projectRegions,
    diffTexts,
    diffText,
    DEFAULT_DIFF_OPTIONS,
    type TextDiffRegion,
    type DiffOptions,
    type ProjectionSide,
} from './textDiff';
export { renderTextDiff, type RenderOptions } from './render';
