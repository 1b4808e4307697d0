import { diffArrays } from 'diff';

/**
 * Two sequences of equal length pairing up the words of the reference and compared texts.
 * `undefined` marks a gap: a word of one side that has no counterpart on the other.
 */
export interface AlignedSequences {
    readonly reference: readonly (string | undefined)[];
    readonly compared: readonly (string | undefined)[];
}

/** Global word-level aligner. */
export interface Aligner {
    align(reference: readonly string[], compared: readonly string[]): AlignedSequences;
}

/**
 * Aligns on the longest common subsequence computed by `diffArrays`. Between two common words,
 * removed and added words are paired in order, the longer run is padded with gaps.
 */
export class MyersAligner implements Aligner {
    align(reference: readonly string[], compared: readonly string[]): AlignedSequences {
        const alignedReference: (string | undefined)[] = [];
        const alignedCompared: (string | undefined)[] = [];

        let removed: string[] = [];
        let added: string[] = [];
        const flush = () => {
            const length = Math.max(removed.length, added.length);
            for (let i = 0; i < length; i++) {
                alignedReference.push(removed[i]);
                alignedCompared.push(added[i]);
            }
            removed = [];
            added = [];
        };

        for (const change of diffArrays([...reference], [...compared])) {
            if (change.removed) {
                removed.push(...change.value);
            } else if (change.added) {
                added.push(...change.value);
            } else {
                flush();
                alignedReference.push(...change.value);
                alignedCompared.push(...change.value);
            }
        }
        flush();

        return { reference: alignedReference, compared: alignedCompared };
    }
}

export interface NeedlemanWunschScores {
    readonly match: number;
    readonly mismatch: number;
    readonly gap: number;
}

/** Scored global alignment. Ties prefer pairing words over opening gaps. */
export class NeedlemanWunschAligner implements Aligner {
    private readonly _scores: NeedlemanWunschScores;

    constructor(scores: Partial<NeedlemanWunschScores> = {}) {
        this._scores = { match: 1, mismatch: -1, gap: -1, ...scores };
    }

    align(reference: readonly string[], compared: readonly string[]): AlignedSequences {
        const { match, mismatch, gap } = this._scores;
        const rows = reference.length + 1;
        const columns = compared.length + 1;
        const score = new Float64Array(rows * columns);
        const at = (i: number, j: number) => i * columns + j;
        const pairScore = (i: number, j: number) => reference[i - 1] === compared[j - 1] ? match : mismatch;

        for (let i = 1; i < rows; i++) {
            score[at(i, 0)] = i * gap;
        }
        for (let j = 1; j < columns; j++) {
            score[at(0, j)] = j * gap;
        }
        for (let i = 1; i < rows; i++) {
            for (let j = 1; j < columns; j++) {
                score[at(i, j)] = Math.max(
                    score[at(i - 1, j - 1)] + pairScore(i, j),
                    score[at(i - 1, j)] + gap,
                    score[at(i, j - 1)] + gap
                );
            }
        }

        const alignedReference: (string | undefined)[] = [];
        const alignedCompared: (string | undefined)[] = [];
        let i = reference.length;
        let j = compared.length;
        while (i > 0 || j > 0) {
            if (i > 0 && j > 0 && score[at(i, j)] === score[at(i - 1, j - 1)] + pairScore(i, j)) {
                alignedReference.push(reference[--i]);
                alignedCompared.push(compared[--j]);
            } else if (i > 0 && (j === 0 || score[at(i, j)] === score[at(i - 1, j)] + gap)) {
                alignedReference.push(reference[--i]);
                alignedCompared.push(undefined);
            } else {
                alignedReference.push(undefined);
                alignedCompared.push(compared[--j]);
            }
        }

        return { reference: alignedReference.reverse(), compared: alignedCompared.reverse() };
    }
}
