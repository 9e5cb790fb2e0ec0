/**
 * Tests for the pronunciation and frequency list readers
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { inventoryFor } from '../phonemes';
import { parseFrequencies, parsePronunciations, readFrequencies, readPronunciations } from '../sources';

const elp = inventoryFor('elp');

describe('sources', () => {
  describe('parsePronunciations', () => {
    it('reads word,pronunciation rows and skips the header', () => {
      const prons = parsePronunciations('word,pron\ncat,kat\ndog,dOg\n', elp);
      expect([...prons.entries()]).toEqual([
        ['cat', ['k', 'a', 't']],
        ['dog', ['d', 'O', 'g']],
      ]);
    });

    it('skips a header that follows blank lines', () => {
      const prons = parsePronunciations('\nword,pron\ncat,kat\n', elp);
      expect(prons.has('word')).toBe(false);
      expect([...prons.keys()]).toEqual(['cat']);
    });

    it('reads a later row named "word" as an entry', () => {
      const prons = parsePronunciations('word,pron\ncat,kat\nword,w@d\n', elp);
      expect(prons.get('word')).toEqual(['w', '@', 'd']);
    });

    it('lets a later row replace an earlier one', () => {
      const prons = parsePronunciations('cat,kat\ncat,kAt\n', elp);
      expect(prons.get('cat')).toEqual(['k', 'A', 't']);
      expect(prons.size).toBe(1);
    });

    it('keeps a word with a blank pronunciation so it can be reported', () => {
      const prons = parsePronunciations('cat,kat\nblank,\n', elp);
      expect(prons.get('blank')).toEqual([]);
    });

    it('splits with the given inventory', () => {
      const prons = parsePronunciations('cat,K AE1 T\n', inventoryFor('arpabet'));
      expect(prons.get('cat')).toEqual(['K', 'AE1', 'T']);
    });
  });

  describe('parseFrequencies', () => {
    const subtlex = 'Word\tFREQcount\tFREQlow\nthe\t10\t8\ncat\t3\t2\n';

    it('reads the low-frequency count by default', () => {
      expect([...parseFrequencies(subtlex).entries()]).toEqual([
        ['the', 8],
        ['cat', 2],
      ]);
    });

    it('reads another column when asked', () => {
      expect(parseFrequencies(subtlex, { countColumn: 'FREQcount' }).get('the')).toBe(10);
    });

    it('reads other delimiters', () => {
      const freqs = parseFrequencies('word,count\nthe,4\n', { wordColumn: 'word', countColumn: 'count', delimiter: ',' });
      expect(freqs.get('the')).toBe(4);
    });

    it('names a missing column', () => {
      expect(() => parseFrequencies('Word\tcount\nthe\t1\n')).toThrow(
        '<frequencies> has no "FREQlow" column (found: Word, count)',
      );
    });

    it('names the line of a bad count', () => {
      expect(() => parseFrequencies('Word\tFREQlow\nthe\t1\ncat\tmany\n')).toThrow(
        '<frequencies>:3: "many" is not a count',
      );
    });
  });

  describe('reading files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cohort-sources-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('reads both lists from disk', async () => {
      await fs.writeFile(path.join(dir, 'prons.csv'), 'cat,kat\n');
      await fs.writeFile(path.join(dir, 'freqs.txt'), 'Word\tFREQlow\ncat\t7\n');

      const prons = await readPronunciations(path.join(dir, 'prons.csv'), elp);
      const freqs = await readFrequencies(path.join(dir, 'freqs.txt'));
      expect(prons.get('cat')).toEqual(['k', 'a', 't']);
      expect(freqs.get('cat')).toBe(7);
    });

    it('says which frequency list it could not open', async () => {
      const missing = path.join(dir, 'nope.txt');
      await expect(readFrequencies(missing)).rejects.toThrow(`Could not open frequency list at ${missing}`);
    });
  });
});
