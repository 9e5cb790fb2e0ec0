import { InvalidPronunciationError } from './errors';
import { IndexDiagnostics, PhonemeSequence, WordEntry } from './types';

export type PronunciationKey = string;

/** Symbol-wise identity for a pronunciation, usable as a Map key */
export function pronunciationKey(pronunciation: PhonemeSequence): PronunciationKey {
    return pronunciation.join('\u0001');
}

/** A positive, finite count; anything else is treated as no frequency information */
export function hasCount(rawFrequency: number | undefined): rawFrequency is number {
    return rawFrequency !== undefined && Number.isFinite(rawFrequency) && rawFrequency > 0;
}

/**
 * Add-one smoothing: listed words get count + 1, unlisted or zero-count words get 1.
 */
export function smoothFrequency(rawFrequency: number | undefined): number {
    return hasCount(rawFrequency) ? rawFrequency + 1 : 1;
}

export function createWordEntry(
    text: string,
    pronunciation: PhonemeSequence,
    rawFrequency: number | undefined,
): WordEntry {
    if (pronunciation.length === 0) {
        throw new InvalidPronunciationError(text);
    }
    return Object.freeze({
        text,
        pronunciation: Object.freeze([...pronunciation]),
        rawFrequency,
        frequency: smoothFrequency(rawFrequency),
    });
}

export class PronunciationIndex {
    private readonly byPronunciation = new Map<
        PronunciationKey,
        { pronunciation: PhonemeSequence; frequency: number; words: Array<WordEntry> }
    >();
    readonly entries: Array<WordEntry> = [];
    readonly diagnostics: IndexDiagnostics = {
        noFrequencyCount: 0,
        missingPronunciationCount: 0,
        invalidPronunciationCount: 0,
    };
    readonly invalidWords: Array<string> = [];

    add(entry: WordEntry) {
        const key = pronunciationKey(entry.pronunciation);
        let found = this.byPronunciation.get(key);
        if (!found) {
            found = { pronunciation: entry.pronunciation, frequency: 0, words: [] };
            this.byPronunciation.set(key, found);
        }
        found.frequency += entry.frequency;
        found.words.push(entry);
        this.entries.push(entry);
        if (!hasCount(entry.rawFrequency)) {
            this.diagnostics.noFrequencyCount++;
        }
    }

    /** Distinct pronunciations in first-seen order */
    pronunciations(): Array<PhonemeSequence> {
        return [...this.byPronunciation.values()].map((p) => p.pronunciation);
    }

    /** Summed smoothed frequency of every word with this pronunciation, 0 if unknown */
    frequencyOf(pronunciation: PhonemeSequence): number {
        return this.byPronunciation.get(pronunciationKey(pronunciation))?.frequency ?? 0;
    }

    wordsWith(pronunciation: PhonemeSequence): ReadonlyArray<WordEntry> {
        return this.byPronunciation.get(pronunciationKey(pronunciation))?.words ?? [];
    }
}

export function buildPronunciationIndex(
    words: Iterable<readonly [string, number | undefined]>,
    pronunciationOf: (word: string) => PhonemeSequence | undefined,
): PronunciationIndex {
    const index = new PronunciationIndex();
    for (const [text, rawFrequency] of words) {
        const pronunciation = pronunciationOf(text);
        if (pronunciation === undefined) {
            index.diagnostics.missingPronunciationCount++;
            continue;
        }
        let entry: WordEntry;
        try {
            entry = createWordEntry(text, pronunciation, rawFrequency);
        } catch (err) {
            if (!(err instanceof InvalidPronunciationError)) throw err;
            index.diagnostics.invalidPronunciationCount++;
            index.invalidWords.push(text);
            continue;
        }
        index.add(entry);
    }
    return index;
}
