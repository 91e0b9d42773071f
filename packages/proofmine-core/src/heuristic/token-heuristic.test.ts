import { describe, it, expect } from 'vitest';
import { TokenHeuristic, countOccurrences } from './token-heuristic.js';

describe('TokenHeuristic', () => {
    const heuristic = new TokenHeuristic();

    it('returns false and zero for empty text', () => {
        expect(heuristic.containsMarker('')).toBe(false);
        expect(heuristic.score('')).toBe(0);
    });

    it('ignores plain code without markers', () => {
        const text = 'fn add(a: u32, b: u32) -> u32 {\n    a + b\n}\n';
        expect(heuristic.containsMarker(text)).toBe(false);
        expect(heuristic.score(text)).toBe(0);
    });

    it('sums occurrence counts across the vocabulary', () => {
        const text = 'fn f() requires x ensures y requires z {}';
        expect(heuristic.containsMarker(text)).toBe(true);
        expect(heuristic.score(text)).toBe(3);
    });

    it('counts markers as substrings, so overlapping vocabulary entries both score', () => {
        expect(heuristic.score('opens_invariants')).toBe(2);
    });

    it('accepts an injected vocabulary', () => {
        const custom = new TokenHeuristic(['@pre', '@post']);
        expect(custom.containsMarker('requires ensures')).toBe(false);
        expect(custom.containsMarker('// @pre x > 0')).toBe(true);
        expect(custom.score('@pre a @post b @pre c')).toBe(3);
        expect(custom.vocabulary).toEqual(['@pre', '@post']);
    });

    it('drops empty markers from the vocabulary', () => {
        const custom = new TokenHeuristic(['', 'ghost']);
        expect(custom.containsMarker('plain')).toBe(false);
        expect(custom.score('ghost')).toBe(1);
    });
});

describe('countOccurrences', () => {
    it('counts non-overlapping matches', () => {
        expect(countOccurrences('aaaa', 'aa')).toBe(2);
        expect(countOccurrences('aaa', 'aa')).toBe(1);
        expect(countOccurrences('abc', 'x')).toBe(0);
    });
});
