import { PositionMap, type MappedText } from '../common';
import { expandAbbreviations as expandAbbreviationsInText } from './abbreviations';
import { expandNumbers } from './numbers';
import type { TextStage } from './pipeline';

const WHITESPACE_RUNS = /(\s+)/;
const WHITESPACE = /\s/;
const PRONOUNCED = /^[\p{L}\p{N}' -]$/u;

/** Unicode NFKC normalization, applied per whitespace-separated chunk. */
export const standardizeCharacters: TextStage = {
    name: 'standardizeCharacters',
    *apply(text) {
        for (const part of text.split(WHITESPACE_RUNS)) {
            const normalized = part.normalize('NFKC');
            yield { text: normalized, map: PositionMap.lerp(part.length, normalized.length) };
        }
    },
};

/** Each run of whitespace becomes a single space. */
export const collapseWhitespace: TextStage = {
    name: 'collapseWhitespace',
    *apply(text) {
        for (const part of text.split(WHITESPACE_RUNS)) {
            if (WHITESPACE.test(part)) {
                yield { text: ' ', map: PositionMap.lerp(part.length, 1) };
            } else {
                yield { text: part, map: PositionMap.identity(part.length) };
            }
        }
    },
};

export const expandAbbreviations: TextStage = {
    name: 'expandAbbreviations',
    apply: text => [expandAbbreviationsInText(text)],
};

export const normalizeNumbers: TextStage = {
    name: 'normalizeNumbers',
    apply: text => [expandNumbers(text)],
};

/**
 * Drops everything but letters, digits, hyphens, apostrophes and spaces, and lower-cases the
 * rest. Characters whose lower-case form has another length keep their case.
 */
export const keepPronouncedOnly: TextStage = {
    name: 'keepPronouncedOnly',
    apply(text): MappedText[] {
        let kept = '';
        const keptPositions: number[] = [];

        let position = 0;
        for (const char of text) {
            if (PRONOUNCED.test(char)) {
                const lower = char.toLowerCase();
                kept += lower.length === char.length ? lower : char;
                for (let k = 0; k < char.length; k++) {
                    keptPositions.push(position + k);
                }
            }
            position += char.length;
        }

        return [{ text: kept, map: PositionMap.fromOneToOne(keptPositions, text.length).inverse() }];
    },
};
