import { PrefixTrie, TrieNode } from './prefixTrie';
import { pronunciationKey } from './pronunciationIndex';
import { entropy, normalizeCounts, surprisal, uniformEntropy } from './probability';
import { PhonemeSequence, PrefixStatistics } from './types';

export type ProgressCallback = (done: number, total: number) => void;

/** Per-prefix entropy and surprisal, read-only once computed */
export class CohortStatistics {
    constructor(private readonly byPrefix: ReadonlyMap<string, PrefixStatistics>) {}

    get(prefix: PhonemeSequence): PrefixStatistics {
        const found = this.byPrefix.get(pronunciationKey(prefix));
        if (!found) {
            throw new Error(`No statistics for prefix "${prefix.join('')}"; is it in the lexicon?`);
        }
        return found;
    }

    has(prefix: PhonemeSequence): boolean {
        return this.byPrefix.has(pronunciationKey(prefix));
    }

    /** every prefix, empty prefix first, parents before children */
    all(): Array<PrefixStatistics> {
        return [...this.byPrefix.values()];
    }

    get size(): number {
        return this.byPrefix.size;
    }
}

/**
 * Entropy over each prefix's continuations, unweighted and weighted by
 * frequency, and surprisal of each prefix given its parent.
 * Throws InvalidConditionalProbabilityError if a prefix ever covers more than
 * its parent, since that means the trie is wrong.
 */
export function computeCohortStatistics(
    trie: PrefixTrie,
    frequencyOf: (pronunciation: PhonemeSequence) => number,
    onProgress?: ProgressCallback,
): CohortStatistics {
    const byPrefix = new Map<string, PrefixStatistics>();
    const total = trie.nodes().length;

    const statsFor = (node: TrieNode, parent: PrefixStatistics | null): PrefixStatistics => {
        const frequencies = node.members.map(frequencyOf);
        const count = node.members.length;
        const frequency = frequencies.reduce((sum, f) => sum + f, 0);
        return {
            prefix: node.prefix,
            count,
            frequency,
            uniformEntropy: uniformEntropy(count),
            freqEntropy: entropy(normalizeCounts(frequencies)),
            uniformSurprisal: parent ? surprisal(count, parent.count) : null,
            freqSurprisal: parent ? surprisal(frequency, parent.frequency) : null,
        };
    };

    const visit = (node: TrieNode, parent: PrefixStatistics | null) => {
        const stats = statsFor(node, parent);
        byPrefix.set(pronunciationKey(node.prefix), stats);
        if (onProgress && byPrefix.size % 1000 === 0) {
            onProgress(byPrefix.size, total);
        }
        for (const kid of node.children.values()) {
            visit(kid, stats);
        }
    };
    visit(trie.root, null);

    return new CohortStatistics(byPrefix);
}
