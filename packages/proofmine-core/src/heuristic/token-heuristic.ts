import { DEFAULT_MARKERS } from '../types/index.js';

/**
 * Cheap triage over raw file text: decides whether a file carries enough
 * verification markers to be worth isolating and verifying.
 */
export class TokenHeuristic {
    private readonly markers: readonly string[];

    constructor(markers: readonly string[] = DEFAULT_MARKERS) {
        this.markers = markers.filter(marker => marker.length > 0);
    }

    get vocabulary(): readonly string[] {
        return this.markers;
    }

    containsMarker(text: string): boolean {
        return this.markers.some(marker => text.includes(marker));
    }

    /** Sum over the vocabulary of non-overlapping occurrence counts. */
    score(text: string): number {
        let total = 0;
        for (const marker of this.markers) {
            total += countOccurrences(text, marker);
        }
        return total;
    }
}

export function countOccurrences(text: string, marker: string): number {
    if (!marker) return 0;
    let count = 0;
    let index = text.indexOf(marker);
    while (index !== -1) {
        count++;
        index = text.indexOf(marker, index + marker.length);
    }
    return count;
}
