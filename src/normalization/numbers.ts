import { MappedTextBuilder, PositionMap, type MappedText } from '../common';
import { numberToWords, ordinalToWords } from './numberWords';
import vocabulary from './vocabulary/units.json';

interface Word {
    readonly text: string;
    /** Number of input characters the word was derived from. */
    readonly sourceLength: number;
}

/** Replacement produced by a rule for the words starting at a given index. */
export interface WordExpansion {
    readonly text: string;
    /** Number of consecutive words replaced, separators included. */
    readonly wordCount: number;
}

/**
 * The input split into words and the whitespace between them. Rules replace whole words;
 * a replaced word maps evenly onto its replacement.
 */
export class WordSequence {
    private _words: Word[];

    constructor(text: string) {
        this._words = text.split(/(\s+)/).map(word => ({ text: word, sourceLength: word.length }));
    }

    get texts(): string[] {
        return this._words.map(word => word.text);
    }

    /**
     * Runs a rule over every word in one pass. The rule sees the words as they were before the
     * pass; words merged into a replacement are skipped.
     */
    apply(rule: NumberRule): void {
        const texts = this.texts;
        const words: Word[] = [];

        let i = 0;
        while (i < this._words.length) {
            const expansion = rule.expand(texts, i);
            if (!expansion) {
                words.push(this._words[i]);
                i++;
                continue;
            }

            const end = Math.min(i + Math.max(expansion.wordCount, 1), this._words.length);
            let sourceLength = 0;
            for (let j = i; j < end; j++) {
                sourceLength += this._words[j].sourceLength;
            }
            words.push({ text: expansion.text, sourceLength });
            i = end;
        }

        this._words = words;
    }

    toMappedText(): MappedText {
        const builder = new MappedTextBuilder();
        for (const word of this._words) {
            builder.append(word.text, PositionMap.lerp(word.sourceLength, word.text.length));
        }
        return builder.build();
    }
}

export interface NumberRule {
    readonly name: string;
    /** Returns the replacement for the words starting at `index`, if the rule applies there. */
    expand(words: readonly string[], index: number): WordExpansion | undefined;
}

const PUNCTUATION = '([.,?!])?';

function single(text: string): WordExpansion {
    return { text, wordCount: 1 };
}

/** Rule matching one word against an anchored pattern. */
function wordRule(name: string, pattern: RegExp, expand: (match: RegExpExecArray) => string | undefined): NumberRule {
    return {
        name,
        expand(words, index) {
            const match = pattern.exec(words[index]);
            if (!match) {
                return undefined;
            }
            const text = expand(match);
            return text === undefined ? undefined : single(text);
        },
    };
}

function stripLeadingZeros(digits: string): string {
    return digits.replace(/^0+(?=\d)/, '');
}

function spellDigits(digits: string): string {
    return digits.split('').join(' ');
}

const currencies = new Map(vocabulary.currencies.map(currency => [currency.symbol, currency]));
const magnitudes = new Map(Object.entries(vocabulary.magnitudes));

function currencyPlural(symbol: string): string {
    return currencies.get(symbol)?.many ?? symbol;
}

const thousandsSeparators = wordRule(
    'thousandsSeparators',
    /^(\(?[A-Z]{2,3})?([$£¥€#(]*\d[\d,.]+\d)(\S+)?$/,
    ([, prefix = '', value, suffix = '']) =>
        value.includes(',') ? prefix + value.replace(/,/g, '') + suffix : undefined
);

const YEAR_PREPOSITION = /^([Ff]rom|[Aa]fter|[Bb]efore|[Bb]y|[Uu]ntil)$/;
const YEAR = new RegExp(`^(1[1-9]|20)(\\d{2})${PUNCTUATION}$`);

const year: NumberRule = {
    name: 'year',
    expand(words, index) {
        if (index < 2 || !YEAR_PREPOSITION.test(words[index - 2])) {
            return undefined;
        }
        const match = YEAR.exec(words[index]);
        if (!match) {
            return undefined;
        }

        const [, century, decade, punctuation = ''] = match;
        let spoken: string;
        if (decade === '00') {
            spoken = century === '20' ? numberToWords('2000') : `${numberToWords(century)} hundred`;
        } else if (decade.startsWith('0')) {
            spoken = century === '20'
                ? numberToWords(century + decade)
                : `${numberToWords(century)} oh ${numberToWords(decade)}`;
        } else {
            spoken = `${numberToWords(century)} ${numberToWords(decade)}`;
        }
        return single(spoken + punctuation);
    },
};

const CURRENCY_AMOUNT = /^\(?([$£¥€])(\d*\.?\d+)$/;
const CURRENCY_WITH_MAGNITUDE = /^\(?([$£¥€])(\d*\.?\d+)([BKMT])([.,?!)]+)?$/;
const MAGNITUDE_WORD = /^((?:[BbMm]|[Tt]r)illion)([.,?!)]+)?$/;

function speakAmount(value: string): string {
    const dot = value.indexOf('.');
    if (dot === -1) {
        return stripLeadingZeros(value);
    }
    return `${stripLeadingZeros(value.slice(0, dot) || '0')} point ${spellDigits(value.slice(dot + 1))}`;
}

/** `$5B`, or `$5 billion` across three words. */
const currencyMagnitude: NumberRule = {
    name: 'currencyMagnitude',
    expand(words, index) {
        const compact = CURRENCY_WITH_MAGNITUDE.exec(words[index]);
        if (compact) {
            const [, symbol, value, unit, punctuation = ''] = compact;
            return single(`${speakAmount(value)} ${magnitudes.get(unit) ?? unit} ${currencyPlural(symbol)}${punctuation}`);
        }

        const amount = CURRENCY_AMOUNT.exec(words[index]);
        const magnitude = index + 2 < words.length ? MAGNITUDE_WORD.exec(words[index + 2]) : null;
        if (amount && magnitude && words[index + 1] === ' ') {
            const [, symbol, value] = amount;
            const [, unit, punctuation = ''] = magnitude;
            return {
                text: `${speakAmount(value)} ${unit.toLowerCase()} ${currencyPlural(symbol)}${punctuation}`,
                wordCount: 3,
            };
        }
        return undefined;
    },
};

/** Pounds, yen and euros, with the minor unit read as a plain number. */
const otherCurrencies = wordRule(
    'otherCurrencies',
    new RegExp(`^\\(?([£¥€])(\\d+)(?:\\.(\\d+))?${PUNCTUATION}$`),
    ([, symbol, major, minor = '', punctuation = '']) => {
        const currency = currencies.get(symbol);
        if (!currency) {
            return undefined;
        }
        const integer = stripLeadingZeros(major);
        const unit = integer === '1' ? currency.one : currency.many;
        return [integer, unit, minor].filter(part => part !== '').join(' ') + punctuation;
    }
);

const measures: NumberRule[] = vocabulary.measures.map(measure =>
    wordRule(
        `unit:${measure.one}`,
        new RegExp(`^(\\d+)(?:\\.(\\d+))?(?:${measure.symbol})${PUNCTUATION}$`),
        ([, integer, decimals = '', punctuation = '']) => {
            const value = stripLeadingZeros(integer);
            if (decimals !== '') {
                return `${value} point ${spellDigits(decimals)} ${measure.many}${punctuation}`;
            }
            return `${value} ${value === '1' ? measure.one : measure.many}${punctuation}`;
        }
    )
);

const dollars = wordRule(
    'dollars',
    /^\(?\$([\d,]*\.?\d+)([.,?!)]+)?$/,
    ([, amount, punctuation = '']) => {
        const parts = amount.replace(/,/g, '').split('.');
        if (parts.length > 2) {
            return undefined;
        }
        const whole = stripLeadingZeros(parts[0] || '0');
        const cents = stripLeadingZeros(parts[1] || '0');

        const spoken: string[] = [];
        if (whole !== '0') {
            spoken.push(`${whole} ${whole === '1' ? 'dollar' : 'dollars'}`);
        }
        if (cents !== '0') {
            spoken.push(`${cents} ${cents === '1' ? 'cent' : 'cents'}`);
        }
        return (spoken.length > 0 ? spoken.join(', ') : 'zero dollars') + punctuation;
    }
);

const hash = wordRule(
    'hash',
    new RegExp(`^#(\\d+(?:\\.\\d+)?)${PUNCTUATION}$`),
    ([, value, punctuation = '']) => `number ${value}${punctuation}`
);

const decimalPoint = wordRule(
    'decimalPoint',
    new RegExp(`^(number )?(\\d+)\\.(\\d+)${PUNCTUATION}$`),
    ([, prefix = '', integer, decimals, punctuation = '']) => `${prefix}${integer} point ${decimals}${punctuation}`
);

const timeOfDay = wordRule(
    'timeOfDay',
    new RegExp(`^([0-2]?\\d):(\\d{2})(am|pm)?${PUNCTUATION}$`),
    ([, hour, minutes, meridiem = '', punctuation = '']) => {
        let spokenMinutes = minutes;
        if (minutes === '00') {
            spokenMinutes = '';
        } else if (minutes.startsWith('0')) {
            spokenMinutes = `oh ${minutes[1]}`;
        }
        const parts = [stripLeadingZeros(hour), spokenMinutes, spellDigits(meridiem)];
        return parts.filter(part => part !== '').join(' ') + punctuation;
    }
);

const ordinal = wordRule(
    'ordinal',
    new RegExp(`^(\\d+)(?:st|nd|rd|th)${PUNCTUATION}$`),
    ([, digits, punctuation = '']) => ordinalToWords(digits) + punctuation
);

const cardinal: NumberRule = {
    name: 'cardinal',
    expand(words, index) {
        const word = words[index];
        return /\d/.test(word) ? single(word.replace(/\d+/g, numberToWords)) : undefined;
    },
};

/**
 * Applied in order, each over every word. Later rules see the output of earlier ones, so the
 * currency and unit rules leave digits behind for `cardinal` to spell out.
 */
export const NUMBER_RULES: readonly NumberRule[] = [
    thousandsSeparators,
    year,
    currencyMagnitude,
    otherCurrencies,
    ...measures,
    dollars,
    hash,
    decimalPoint,
    timeOfDay,
    ordinal,
    cardinal,
];

/**
 * Spells out numbers, amounts, units, times and ordinals word by word. Words are matched by
 * their exact text, so a word that is not a number on its own (`"5x"`) only has its digit
 * runs spelled out.
 */
export function expandNumbers(text: string, rules: readonly NumberRule[] = NUMBER_RULES): MappedText {
    const sequence = new WordSequence(text);
    for (const rule of rules) {
        sequence.apply(rule);
    }
    return sequence.toMappedText();
}
