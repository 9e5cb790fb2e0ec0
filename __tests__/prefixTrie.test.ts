/**
 * Tests for the prefix index
 */

import { InvalidPronunciationError } from '../errors';
import { render } from '../phonemes';
import { PrefixTrie, prefixesOf, uniquenessPoint } from '../prefixTrie';

const seq = (s: string) => s.split('');

describe('prefixTrie', () => {
  const trie = PrefixTrie.build(['kat', 'kats', 'in', 'into'].map(seq));
  const membersOf = (prefix: string) => trie.membersOf(seq(prefix)).map((s) => render(s)).sort();

  describe('prefixesOf', () => {
    it('lists every prefix including the word itself', () => {
      expect(prefixesOf(seq('cat')).map((s) => render(s))).toEqual(['c', 'ca', 'cat']);
      expect(prefixesOf(seq('a')).map((s) => render(s))).toEqual(['a']);
      expect(prefixesOf([])).toEqual([]);
    });

    it('can be called repeatedly', () => {
      const pron = seq('kats');
      expect(prefixesOf(pron)).toEqual(prefixesOf(pron));
      expect(prefixesOf(pron)).toHaveLength(4);
    });
  });

  describe('PrefixTrie', () => {
    it('lists the pronunciations under each prefix', () => {
      expect(membersOf('k')).toEqual(['kat', 'kats']);
      expect(membersOf('ka')).toEqual(['kat', 'kats']);
      expect(membersOf('kat')).toEqual(['kat', 'kats']);
      expect(membersOf('kats')).toEqual(['kats']);
      expect(membersOf('i')).toEqual(['in', 'into']);
      expect(membersOf('in')).toEqual(['in', 'into']);
      expect(membersOf('int')).toEqual(['into']);
      expect(membersOf('into')).toEqual(['into']);
    });

    it('puts every pronunciation under the empty prefix', () => {
      expect(trie.countOf([])).toBe(4);
      expect(membersOf('')).toEqual(['in', 'into', 'kat', 'kats']);
    });

    it('returns nothing for an unseen prefix', () => {
      expect(trie.membersOf(seq('x'))).toEqual([]);
      expect(trie.countOf(seq('katz'))).toBe(0);
    });

    it('counts distinct pronunciations only', () => {
      const dupes = PrefixTrie.build([seq('kat'), seq('kat'), seq('ka')]);
      expect(dupes.countOf([])).toBe(2);
      expect(dupes.countOf(seq('ka'))).toBe(2);
      expect(dupes.countOf(seq('kat'))).toBe(1);
    });

    it('compares symbols, not rendered strings', () => {
      const ipa = PrefixTrie.build([['aɪ'], ['a', 'ɪ']]);
      expect(ipa.countOf([])).toBe(2);
      expect(ipa.countOf(['a'])).toBe(1);
      expect(ipa.countOf(['aɪ'])).toBe(1);
    });

    it('lists prefixes root first, depth first', () => {
      expect(trie.prefixes().map((s) => render(s))).toEqual(['', 'k', 'ka', 'kat', 'kats', 'i', 'in', 'int', 'into']);
    });

    it('never gains members as a prefix grows', () => {
      for (const node of trie.nodes()) {
        for (const kid of node.children.values()) {
          expect(node.members.length).toBeGreaterThanOrEqual(kid.members.length);
        }
      }
    });

    it('refuses an empty pronunciation', () => {
      expect(() => PrefixTrie.build([[]])).toThrow(InvalidPronunciationError);
    });
  });

  describe('uniquenessPoint', () => {
    it('finds the first count of one', () => {
      expect(uniquenessPoint([5, 4, 3, 2, 1])).toBe(4);
      expect(uniquenessPoint([1])).toBe(0);
      expect(uniquenessPoint([1, 1, 1, 1, 1])).toBe(0);
      expect(uniquenessPoint([2, 1])).toBe(1);
    });

    it('falls back to the last index', () => {
      expect(uniquenessPoint([2, 2])).toBe(1);
      expect(uniquenessPoint([2, 2, 2])).toBe(2);
    });

    it('is -1 for no counts', () => {
      expect(uniquenessPoint([])).toBe(-1);
    });
  });
});
