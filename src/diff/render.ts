import type { TextDiffRegion } from './textDiff';

// ANSI colors
const c = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    reset: '\x1b[39m',
};

export interface RenderOptions {
    /** Highlight compared text in red and reference text in green. Defaults to true. */
    readonly colors?: boolean;
}

/**
 * Renders regions as one annotated string: matching regions show the reference text,
 * mismatching ones `(compared|reference)`.
 */
export function renderTextDiff(regions: readonly TextDiffRegion[], options: RenderOptions = {}): string {
    const colors = options.colors ?? true;
    const paint = (text: string, color: string) => colors ? `${color}${text}${c.reset}` : text;

    return regions
        .map(region => region.pronunciationMatch
            ? region.referenceText
            : `(${paint(region.comparedText, c.red)}|${paint(region.referenceText, c.green)})`)
        .join('');
}
