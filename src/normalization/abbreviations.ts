import { MappedTextBuilder, PositionMap, type MappedText } from '../common';
import abbreviations from './vocabulary/abbreviations.json';

interface Abbreviation {
    readonly pattern: RegExp;
    readonly expansion: string;
}

const ABBREVIATIONS: readonly Abbreviation[] = abbreviations.map(([abbreviation, expansion]) => ({
    pattern: new RegExp(`\\b${abbreviation}\\.`, 'gi'),
    expansion,
}));

interface AbbreviationMatch {
    readonly start: number;
    readonly length: number;
    readonly expansion: string;
}

/**
 * Expands abbreviations such as `"Dr."` or `"e.g."`. Matches of all patterns are searched in
 * the input text; where two overlap, the one starting first wins, then the one listed first.
 */
export function expandAbbreviations(text: string): MappedText {
    const matches: AbbreviationMatch[] = [];
    for (const { pattern, expansion } of ABBREVIATIONS) {
        for (const match of text.matchAll(pattern)) {
            matches.push({ start: match.index ?? 0, length: match[0].length, expansion });
        }
    }
    // Stable, so ties keep table order.
    matches.sort((a, b) => a.start - b.start);

    const builder = new MappedTextBuilder();
    let position = 0;
    for (const { start, length, expansion } of matches) {
        if (start < position) {
            continue;
        }
        builder.appendUnchanged(text.slice(position, start));
        builder.append(expansion, PositionMap.lerp(length, expansion.length));
        position = start + length;
    }
    builder.appendUnchanged(text.slice(position));

    return builder.build();
}
