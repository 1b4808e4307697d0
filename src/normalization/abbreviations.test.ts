import { describe, it, expect } from 'vitest';
import { PositionMap } from '../common';
import { expandAbbreviations } from './abbreviations';

describe('expandAbbreviations', () => {
    it('maps the abbreviation onto its expansion', () => {
        const { text, map } = expandAbbreviations('Hi there dr. House');
        expect(text).toBe('Hi there doctor House');
        expect(map.equals(
            PositionMap.identity(9).concat(PositionMap.lerp(3, 6)).concat(PositionMap.identity(6))
        )).toBe(true);
        expect(map.range(9, 12).substring(text)).toBe('doctor');
    });

    it('expands every occurrence', () => {
        expect(expandAbbreviations('Hey, jr.! Are you coming jr.?').text).toBe('Hey, junior! Are you coming junior?');
    });

    it('handles consecutive abbreviations', () => {
        const { text, map } = expandAbbreviations('oct., nov., dec....');
        expect(text).toBe('october, november, december...');
        expect(map.sourceLength).toBe(19);
        expect(map.range(16, 19).substring(text)).toBe('...');
    });

    it('ignores case and expands dotted abbreviations', () => {
        expect(expandAbbreviations('MR. Smith, e.g. now').text).toBe('mister Smith, eg now');
    });

    it('requires a word boundary and a period', () => {
        expect(expandAbbreviations('Ydr. dr who').text).toBe('Ydr. dr who');
    });

    it('expands long texts in one pass', () => {
        const count = 1250;
        const { text, map } = expandAbbreviations(Array(count).fill('Dr. Smith met jr. Jones ').join(''));
        expect(text).toBe(Array(count).fill('doctor Smith met junior Jones ').join(''));

        const unit = PositionMap.concatAll([
            PositionMap.lerp(3, 6),
            PositionMap.identity(11),
            PositionMap.lerp(3, 6),
            PositionMap.identity(7),
        ]);
        expect(map.equals(PositionMap.concatAll(Array(count).fill(unit)))).toBe(true);
    });

    it('expands abbreviations that follow each other', () => {
        const { text, map } = expandAbbreviations('Lt. Col. Smith');
        expect(text).toBe('lieutenant colonel Smith');
        expect(map.range(4, 8).substring(text)).toBe('colonel');
    });
});
