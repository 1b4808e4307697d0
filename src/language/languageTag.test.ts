import { describe, it, expect } from 'vitest';
import { findLanguageMatch, isEnglish, LanguageTagError, resolveLanguage } from './languageTag';

describe('resolveLanguage', () => {
    it('splits language and territory', () => {
        expect(resolveLanguage('en-us')).toEqual({ language: 'en', territory: 'US' });
    });

    it('accepts underscores and surrounding whitespace', () => {
        expect(resolveLanguage(' fr_CA ')).toEqual({ language: 'fr', territory: 'CA' });
    });

    it('omits a missing territory', () => {
        expect(resolveLanguage('de')).toEqual({ language: 'de' });
    });

    it('throws on malformed tags', () => {
        expect(() => resolveLanguage('')).toThrow(LanguageTagError);
        expect(() => resolveLanguage('not a tag')).toThrow('Invalid language tag: "not a tag"');
    });
});

describe('isEnglish', () => {
    it('recognizes every English variant', () => {
        expect(isEnglish('en')).toBe(true);
        expect(isEnglish('en-GB')).toBe(true);
        expect(isEnglish('fr-fr')).toBe(false);
    });
});

describe('findLanguageMatch', () => {
    const available = ['en-US', 'fr-FR', 'en-GB', 'fr', 'en'];

    it('matches on territory when requested', () => {
        expect(findLanguageMatch('en-gb', available)).toEqual([2]);
    });

    it('ignores territories when not requested', () => {
        expect(findLanguageMatch('en', available)).toEqual([0, 2, 4]);
        expect(findLanguageMatch('fr-CA', available, false)).toEqual([1, 3]);
    });

    it('returns no match for an unavailable territory', () => {
        expect(findLanguageMatch('fr-CA', available)).toEqual([]);
    });

    it('accepts resolved languages', () => {
        expect(findLanguageMatch({ language: 'fr' }, [{ language: 'fr', territory: 'BE' }])).toEqual([0]);
    });
});
