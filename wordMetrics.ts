import { CohortStatistics } from './cohortStatistics';
import { MalformedPronunciationError } from './errors';
import { consonantRun, onsetOf, PhonemeInventory, render } from './phonemes';
import { prefixesOf, uniquenessPoint } from './prefixTrie';
import { PronunciationIndex, pronunciationKey } from './pronunciationIndex';
import { PhonemeSequence, PrefixStatistics, PronunciationMetrics, Summary, Weighting } from './types';

export function summarize(values: ReadonlyArray<number>): Summary {
    if (values.length === 0) {
        throw new Error('Cannot summarize an empty sequence');
    }
    return {
        mean: values.reduce((sum, v) => sum + v, 0) / values.length,
        min: Math.min(...values),
        max: Math.max(...values),
    };
}

/** Onset plus the first vowel. zIGk -> zI, ab@k@s -> a */
export function onsetNucleusOf(pronunciation: PhonemeSequence, inventory: PhonemeInventory): PhonemeSequence {
    const consonants = consonantRun(pronunciation, inventory);
    if (consonants >= pronunciation.length) {
        throw new MalformedPronunciationError(render(pronunciation));
    }
    return pronunciation.slice(0, consonants + 1);
}

const entropyOf = (stats: PrefixStatistics) => ({ uniform: stats.uniformEntropy, freq: stats.freqEntropy });

/**
 * Walk the prefix chain of one pronunciation and summarize it.
 * Throws MalformedPronunciationError if there is no vowel to serve as nucleus.
 */
export function aggregatePronunciation(
    pronunciation: PhonemeSequence,
    statistics: CohortStatistics,
    inventory: PhonemeInventory,
): PronunciationMetrics {
    const chain = prefixesOf(pronunciation).map((prefix) => statistics.get(prefix));
    const first = pronunciation.slice(0, 1);
    const onset = onsetOf(pronunciation, inventory);
    const onsetNucleus = onsetNucleusOf(pronunciation, inventory);

    const entropy = {
        uniform: chain.map((s) => s.uniformEntropy),
        freq: chain.map((s) => s.freqEntropy),
    };
    // nothing precedes the first phoneme within the word
    const surprisal = {
        uniform: chain.map((s, i) => (i === 0 ? null : s.uniformSurprisal)),
        freq: chain.map((s, i) => (i === 0 ? null : s.freqSurprisal)),
    };
    const summarizeSurprisal = (weighting: Weighting): Summary | null => {
        const values = surprisal[weighting].filter((v): v is number => v !== null);
        return values.length > 0 ? summarize(values) : null;
    };

    return {
        pronunciation,
        length: pronunciation.length,
        uniquenessPoint: uniquenessPoint(chain.map((s) => s.count)) + 1,
        first,
        onset,
        onsetNucleus,
        entropy,
        surprisal,
        entropySummary: {
            uniform: summarize(entropy.uniform),
            freq: summarize(entropy.freq),
        },
        surprisalSummary: {
            uniform: summarizeSurprisal('uniform'),
            freq: summarizeSurprisal('freq'),
        },
        entropyAt: {
            first: entropyOf(statistics.get(first)),
            onset: entropyOf(statistics.get(onset)),
            onsetNucleus: entropyOf(statistics.get(onsetNucleus)),
            final: entropyOf(statistics.get(pronunciation)),
        },
    };
}

export type AggregateResult = {
    metrics: Map<string, PronunciationMetrics>;
    /** words whose pronunciation had no nucleus */
    malformedWords: Array<string>;
};

/**
 * Metrics for every distinct pronunciation in the index, keyed by
 * pronunciationKey. A malformed pronunciation is left out without stopping the rest.
 */
export function aggregateWords(
    index: PronunciationIndex,
    statistics: CohortStatistics,
    inventory: PhonemeInventory,
    report: (message: string) => void = console.log,
): AggregateResult {
    const metrics = new Map<string, PronunciationMetrics>();
    const malformedWords: Array<string> = [];
    for (const pronunciation of index.pronunciations()) {
        try {
            metrics.set(pronunciationKey(pronunciation), aggregatePronunciation(pronunciation, statistics, inventory));
        } catch (err) {
            if (!(err instanceof MalformedPronunciationError)) throw err;
            const words = index.wordsWith(pronunciation).map((w) => w.text);
            report(`Skipping ${words.join(', ')}: ${err.message}`);
            malformedWords.push(...words);
        }
    }
    return { metrics, malformedWords };
}
