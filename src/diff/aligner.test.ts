import { describe, it, expect } from 'vitest';
import { MyersAligner, NeedlemanWunschAligner } from './aligner';

describe.each([
    ['MyersAligner', new MyersAligner()],
    ['NeedlemanWunschAligner', new NeedlemanWunschAligner()],
])('%s', (_name, aligner) => {
    it('pairs substituted words', () => {
        expect(aligner.align(['the', 'cat', 'sat'], ['the', 'cats', 'sat'])).toEqual({
            reference: ['the', 'cat', 'sat'],
            compared: ['the', 'cats', 'sat'],
        });
    });

    it('leaves gaps for deleted words', () => {
        expect(aligner.align(['a', 'b', 'c'], ['a', 'c'])).toEqual({
            reference: ['a', 'b', 'c'],
            compared: ['a', undefined, 'c'],
        });
    });

    it('leaves gaps for inserted words', () => {
        expect(aligner.align(['a'], ['a', 'x', 'y'])).toEqual({
            reference: ['a', undefined, undefined],
            compared: ['a', 'x', 'y'],
        });
    });

    it('aligns empty sequences', () => {
        expect(aligner.align([], [])).toEqual({ reference: [], compared: [] });
    });
});

describe('MyersAligner', () => {
    it('pairs runs of changes in order', () => {
        expect(new MyersAligner().align(['a', 'b'], ['x'])).toEqual({
            reference: ['a', 'b'],
            compared: ['x', undefined],
        });
    });
});

describe('NeedlemanWunschAligner', () => {
    it('prefers gaps over costly mismatches', () => {
        const aligner = new NeedlemanWunschAligner({ mismatch: -5 });
        expect(aligner.align(['a'], ['b'])).toEqual({
            reference: [undefined, 'a'],
            compared: ['b', undefined],
        });
    });
});
