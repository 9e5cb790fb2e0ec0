/**
 * Prefix index over distinct pronunciations.
 *
 * Every node is one prefix; it lists the distinct pronunciations that begin
 * with it. The root is the empty prefix and lists every pronunciation.
 *
 *   {kat, kats, in}
 *   ''   -> kat kats in
 *   k    -> kat kats
 *   ka   -> kat kats
 *   kat  -> kat kats
 *   kats -> kats
 *   i    -> in
 *   in   -> in
 */

import { InvalidPronunciationError } from './errors';
import { Phoneme, PhonemeSequence } from './types';

export type TrieNode = {
    readonly prefix: PhonemeSequence;
    readonly children: Map<Phoneme, TrieNode>;
    readonly members: Array<PhonemeSequence>;
    /** set when a pronunciation ends exactly here */
    pronunciation?: PhonemeSequence;
};

const createNode = (prefix: PhonemeSequence): TrieNode => ({ prefix, children: new Map(), members: [] });

export class PrefixTrie {
    readonly root: TrieNode = createNode([]);

    private constructor() {}

    static build(pronunciations: Iterable<PhonemeSequence>): PrefixTrie {
        const trie = new PrefixTrie();
        for (const pronunciation of pronunciations) {
            trie.insert(pronunciation);
        }
        return trie;
    }

    private insert(pronunciation: PhonemeSequence) {
        if (pronunciation.length === 0) {
            throw new InvalidPronunciationError('', 'cannot index an empty pronunciation');
        }
        const path = [this.root];
        let node = this.root;
        for (const phoneme of pronunciation) {
            let kid = node.children.get(phoneme);
            if (!kid) {
                kid = createNode(pronunciation.slice(0, path.length));
                node.children.set(phoneme, kid);
            }
            node = kid;
            path.push(node);
        }
        if (node.pronunciation) {
            // already registered; members hold distinct pronunciations only
            return;
        }
        node.pronunciation = pronunciation;
        for (const n of path) {
            n.members.push(pronunciation);
        }
    }

    /** node for this prefix, undefined if no pronunciation starts with it */
    find(prefix: PhonemeSequence): TrieNode | undefined {
        let node: TrieNode | undefined = this.root;
        for (const phoneme of prefix) {
            node = node.children.get(phoneme);
            if (!node) return undefined;
        }
        return node;
    }

    membersOf(prefix: PhonemeSequence): ReadonlyArray<PhonemeSequence> {
        return this.find(prefix)?.members ?? [];
    }

    countOf(prefix: PhonemeSequence): number {
        return this.membersOf(prefix).length;
    }

    /** Distinct pronunciations, in insertion order */
    pronunciations(): ReadonlyArray<PhonemeSequence> {
        return this.root.members;
    }

    /** Every prefix node, root first, parents before children */
    nodes(): Array<TrieNode> {
        const result: Array<TrieNode> = [];
        const stack = [this.root];
        while (stack.length > 0) {
            const node = stack.pop();
            if (!node) break;
            result.push(node);
            stack.push(...[...node.children.values()].reverse());
        }
        return result;
    }

    prefixes(): Array<PhonemeSequence> {
        return this.nodes().map((n) => n.prefix);
    }
}

/**
 * All non-empty prefixes of a pronunciation, including itself.
 * [k, a, t] -> [[k], [k, a], [k, a, t]]
 */
export function prefixesOf(pronunciation: PhonemeSequence): Array<PhonemeSequence> {
    return pronunciation.map((_p, i) => pronunciation.slice(0, i + 1));
}

/**
 * Zero-based index of the first prefix count that reaches 1.
 * If none does (homophones, or a word that is a prefix of another word),
 * the last index. -1 for no counts at all.
 * [5, 4, 3, 2, 1] -> 4
 * [2, 2, 2] -> 2
 */
export function uniquenessPoint(prefixCounts: ReadonlyArray<number>): number {
    const found = prefixCounts.indexOf(1);
    return found !== -1 ? found : prefixCounts.length - 1;
}
