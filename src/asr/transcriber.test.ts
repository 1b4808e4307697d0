import { describe, it, expect } from 'vitest';
import { matchSupportedLanguage, UnsupportedLanguageError } from './transcriber';

describe('matchSupportedLanguage', () => {
    const supported = ['en', 'fr', 'de'];

    it('ignores territories', () => {
        expect(matchSupportedLanguage('en-us', supported)).toBe('en');
        expect(matchSupportedLanguage('fr_CA', supported)).toBe('fr');
    });

    it('rejects unsupported languages', () => {
        expect(() => matchSupportedLanguage('ja', supported)).toThrow(UnsupportedLanguageError);
        expect(() => matchSupportedLanguage('ja', supported)).toThrow('Language "ja" is not supported by the transcriber');
    });
});
