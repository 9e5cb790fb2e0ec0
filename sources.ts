import { promises as fs } from 'fs';
import { parseDelimitedLine, splitLines } from './csv';
import { parameters } from './parameters';
import { PhonemeInventory } from './phonemes';
import { PhonemeSequence } from './types';

/**
 * Read `word,pronunciation` rows. A header row starting with "word" (the first
 * non-blank line) is skipped,
 * and a later row for the same word replaces an earlier one.
 * cat,kat -> cat => [k, a, t]
 */
export async function readPronunciations(
    path: string,
    inventory: PhonemeInventory,
): Promise<Map<string, PhonemeSequence>> {
    const content = await fs.readFile(path, 'utf-8');
    return parsePronunciations(content, inventory);
}

export function parsePronunciations(content: string, inventory: PhonemeInventory): Map<string, PhonemeSequence> {
    const prons = new Map<string, PhonemeSequence>();
    let first = true;
    for (const line of splitLines(content)) {
        if (line.trim() === '') continue;
        const [word, transcription = ''] = parseDelimitedLine(line);
        const isHeader = first && word.trim().toLowerCase() === 'word';
        first = false;
        if (isHeader) continue;
        prons.set(word, inventory.split(transcription));
    }
    return prons;
}

export type FrequencyListOptions = {
    wordColumn: string;
    countColumn: string;
    delimiter: string;
};

/** Read word counts from a delimited file with a header row (e.g. SUBTLEX) */
export async function readFrequencies(
    path: string,
    options: Partial<FrequencyListOptions> = {},
): Promise<Map<string, number>> {
    let content: string;
    try {
        content = await fs.readFile(path, 'utf-8');
    } catch (err) {
        throw new Error(`Could not open frequency list at ${path}`, { cause: err });
    }
    return parseFrequencies(content, options, path);
}

export function parseFrequencies(
    content: string,
    options: Partial<FrequencyListOptions> = {},
    source = '<frequencies>',
): Map<string, number> {
    const wordColumn = options.wordColumn ?? parameters.frequencies.wordColumn;
    const countColumn = options.countColumn ?? parameters.frequencies.countColumn;
    const delimiter = options.delimiter ?? parameters.frequencies.delimiter;
    const [header, ...rows] = splitLines(content);
    const columns = parseDelimitedLine(header ?? '', delimiter);
    const wordIndex = columns.indexOf(wordColumn);
    const countIndex = columns.indexOf(countColumn);
    if (wordIndex === -1 || countIndex === -1) {
        const missing = wordIndex === -1 ? wordColumn : countColumn;
        throw new Error(`${source} has no "${missing}" column (found: ${columns.join(', ')})`);
    }

    const freqs = new Map<string, number>();
    rows.forEach((line, i) => {
        if (line.trim() === '') return;
        const cells = parseDelimitedLine(line, delimiter);
        const count = cells[countIndex]?.trim() ?? '';
        if (!/^\d+$/.test(count)) {
            // +2: header line, and lines are 1-based
            throw new Error(`${source}:${i + 2}: "${count}" is not a count`);
        }
        freqs.set(cells[wordIndex], Number(count));
    });
    return freqs;
}
