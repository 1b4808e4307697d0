import { DimensionMismatchError, Span, type Logger, type PositionMap } from '../common';
import { normalizeText } from '../normalization';
import { MyersAligner, type Aligner } from './aligner';

/**
 * A stretch of the reference and compared texts that is either pronounced the same on both
 * sides or not. Ranges index into the texts the region was computed on.
 */
export interface TextDiffRegion {
    readonly referenceText: string;
    readonly comparedText: string;
    readonly pronunciationMatch: boolean;
    readonly referenceRange: Span;
    readonly comparedRange: Span;
}

export interface DiffOptions {
    readonly aligner?: Aligner;
    readonly faultTolerant?: boolean;
    readonly logger?: Logger;
}

export const DEFAULT_DIFF_OPTIONS: Required<DiffOptions> = {
    aligner: new MyersAligner(),
    faultTolerant: false,
    logger: console,
};

/** A raw text and the map from its normalized form back to it. */
export interface ProjectionSide {
    readonly raw: string;
    readonly cleanToRaw: PositionMap;
}

interface RegionDraft {
    readonly referenceText: string;
    readonly comparedText: string;
    readonly pronunciationMatch: boolean;
}

function toRegions(drafts: readonly RegionDraft[]): TextDiffRegion[] {
    let referencePosition = 0;
    let comparedPosition = 0;
    return drafts.map(draft => {
        const referenceRange = Span.ofLength(referencePosition, draft.referenceText.length);
        const comparedRange = Span.ofLength(comparedPosition, draft.comparedText.length);
        referencePosition = referenceRange.stop;
        comparedPosition = comparedRange.stop;
        return { ...draft, referenceRange, comparedRange };
    });
}

/**
 * Diffs two normalized texts word by word.
 *
 * Each aligned word pair becomes a region that matches if both words are identical, and the
 * single spaces separating words become matching regions of their own. Neighbouring regions
 * with the same flag are then merged.
 */
export function cleanTextDiff(
    reference: string,
    compared: string,
    aligner: Aligner = DEFAULT_DIFF_OPTIONS.aligner
): TextDiffRegion[] {
    const alignment = aligner.align(reference.split(' '), compared.split(' '));
    if (alignment.reference.length !== alignment.compared.length) {
        throw new DimensionMismatchError(
            `Aligner returned ${alignment.reference.length} reference and ${alignment.compared.length} compared words`
        );
    }

    const drafts: RegionDraft[] = [];
    let referenceStarted = false;
    let comparedStarted = false;
    alignment.reference.forEach((referenceWord, i) => {
        const comparedWord = alignment.compared[i];

        // A space precedes every word but the first, on each side separately.
        const referenceSpace = referenceStarted && referenceWord !== undefined ? ' ' : '';
        const comparedSpace = comparedStarted && comparedWord !== undefined ? ' ' : '';
        if (referenceSpace || comparedSpace) {
            drafts.push({ referenceText: referenceSpace, comparedText: comparedSpace, pronunciationMatch: true });
        }
        if (referenceWord !== undefined) {
            referenceStarted = true;
        }
        if (comparedWord !== undefined) {
            comparedStarted = true;
        }

        const referenceText = referenceWord ?? '';
        const comparedText = comparedWord ?? '';
        drafts.push({ referenceText, comparedText, pronunciationMatch: referenceText === comparedText });
    });

    const merged: RegionDraft[] = [];
    for (const draft of drafts) {
        const last = merged[merged.length - 1];
        if (last && last.pronunciationMatch === draft.pronunciationMatch) {
            merged[merged.length - 1] = {
                referenceText: last.referenceText + draft.referenceText,
                comparedText: last.comparedText + draft.comparedText,
                pronunciationMatch: last.pronunciationMatch,
            };
        } else {
            merged.push(draft);
        }
    }

    return toRegions(merged);
}

/**
 * Carries regions computed on normalized texts over to the raw texts they came from.
 * The raw texts of the returned regions concatenate back to the raw texts exactly: the last
 * region extends to the end, so characters the normalization dropped at the end are kept.
 */
export function projectRegions(
    regions: readonly TextDiffRegion[],
    reference: ProjectionSide,
    compared: ProjectionSide
): TextDiffRegion[] {
    let cleanReference = 0;
    let cleanCompared = 0;
    let rawReference = 0;
    let rawCompared = 0;

    const project = (side: ProjectionSide, cleanStart: number, cleanLength: number, rawStart: number, isLast: boolean) => {
        const stop = isLast
            ? side.raw.length
            : Math.max(rawStart, side.cleanToRaw.range(cleanStart, cleanStart + cleanLength).stop);
        return new Span(rawStart, stop);
    };

    return regions.map((region, index) => {
        const isLast = index === regions.length - 1;
        const referenceRange = project(reference, cleanReference, region.referenceText.length, rawReference, isLast);
        const comparedRange = project(compared, cleanCompared, region.comparedText.length, rawCompared, isLast);

        cleanReference += region.referenceText.length;
        cleanCompared += region.comparedText.length;
        rawReference = referenceRange.stop;
        rawCompared = comparedRange.stop;

        return {
            referenceText: referenceRange.substring(reference.raw),
            comparedText: comparedRange.substring(compared.raw),
            pronunciationMatch: region.pronunciationMatch,
            referenceRange,
            comparedRange,
        };
    });
}

/**
 * Diffs pairs of raw texts on their normalized, pronounced form and returns, for each pair,
 * the regions over the raw texts.
 *
 * @throws DimensionMismatchError if the lists differ in length
 */
export function diffTexts(
    references: readonly string[],
    compareds: readonly string[],
    languageTag: string,
    options: DiffOptions = {}
): TextDiffRegion[][] {
    if (references.length !== compareds.length) {
        throw new DimensionMismatchError(
            `Got ${references.length} reference texts but ${compareds.length} compared texts`
        );
    }

    const aligner = options.aligner ?? DEFAULT_DIFF_OPTIONS.aligner;
    const normalization = {
        faultTolerant: options.faultTolerant ?? DEFAULT_DIFF_OPTIONS.faultTolerant,
        logger: options.logger ?? DEFAULT_DIFF_OPTIONS.logger,
    };

    return references.map((reference, i) => {
        const compared = compareds[i];
        const cleanReference = normalizeText(reference, languageTag, normalization);
        const cleanCompared = normalizeText(compared, languageTag, normalization);

        const regions = cleanTextDiff(cleanReference.text, cleanCompared.text, aligner);
        return projectRegions(
            regions,
            { raw: reference, cleanToRaw: cleanReference.map.inverse() },
            { raw: compared, cleanToRaw: cleanCompared.map.inverse() }
        );
    });
}

export function diffText(
    reference: string,
    compared: string,
    languageTag: string,
    options?: DiffOptions
): TextDiffRegion[] {
    return diffTexts([reference], [compared], languageTag, options)[0];
}
