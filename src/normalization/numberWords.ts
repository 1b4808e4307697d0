import numberWords from './vocabulary/numberWords.json';

const { units, tens, scales, ordinalSuffixes } = numberWords;

/** Longest digit string that is still spelled out; anything longer is left as digits. */
const MAX_SPELLED_DIGITS = 18;

function groupToWords(group: number): string[] {
    const words: string[] = [];
    if (group >= 100) {
        words.push(units[Math.floor(group / 100)], 'hundred');
    }
    const rest = group % 100;
    if (rest >= units.length) {
        words.push(tens[Math.floor(rest / 10)], units[rest % 10]);
    } else {
        words.push(units[rest]);
    }
    return words.filter(word => word !== '');
}

function standardNumberToWords(digits: string): string {
    const words: string[] = [];
    const groupCount = Math.ceil(digits.length / 3);
    for (let g = groupCount - 1; g >= 0; g--) {
        const end = digits.length - 3 * g;
        const group = Number(digits.slice(Math.max(0, end - 3), end));
        if (group > 0) {
            words.push(...groupToWords(group));
            if (scales[g]) {
                words.push(scales[g]);
            }
        }
    }
    return words.join(' ');
}

/**
 * Spells out a non-negative integer given as a digit string, e.g. `"1234"` becomes
 * `"one thousand two hundred thirty four"`. Round hundreds below 3000 read as hundreds
 * (`"1200"` is `"twelve hundred"`).
 */
export function numberToWords(digits: string): string {
    const significant = digits.replace(/^0+/, '');
    if (significant.length > MAX_SPELLED_DIGITS) {
        return significant;
    }
    if (significant === '') {
        return 'zero';
    }

    const value = Number(significant);
    if (significant.length <= 4 && value % 100 === 0 && value % 1000 !== 0 && value < 3000) {
        return `${standardNumberToWords(String(value / 100))} hundred`;
    }
    return standardNumberToWords(significant);
}

/** `"21"` becomes `"twenty first"`, `"12"` becomes `"twelfth"`. */
export function ordinalToWords(digits: string): string {
    const cardinal = numberToWords(digits);
    for (const [suffix, replacement] of ordinalSuffixes) {
        if (cardinal.endsWith(suffix)) {
            return cardinal.slice(0, cardinal.length - suffix.length) + replacement;
        }
    }
    return `${cardinal}th`;
}
