import { CohortStatistics, computeCohortStatistics } from './cohortStatistics';
import { PhonemeInventory } from './phonemes';
import { PrefixTrie } from './prefixTrie';
import { buildPronunciationIndex, PronunciationIndex } from './pronunciationIndex';
import { PhonemeSequence, PronunciationMetrics } from './types';
import { countWithPercent, progress } from './util';
import { aggregateWords } from './wordMetrics';

export type Report = (message: string) => void;

export type CohortAnalysisOptions = {
    inventory: PhonemeInventory;
    report?: Report;
    showProgress?: boolean;
};

export type CohortAnalysis = {
    index: PronunciationIndex;
    trie: PrefixTrie;
    statistics: CohortStatistics;
    /** keyed by pronunciationKey */
    metrics: Map<string, PronunciationMetrics>;
    malformedWords: Array<string>;
};

/**
 * Pair each word in the pronunciation list with its count, if the frequency list has one.
 */
export function lexiconWords(
    pronunciations: ReadonlyMap<string, PhonemeSequence>,
    frequencies: ReadonlyMap<string, number>,
): Array<[string, number | undefined]> {
    return [...pronunciations.keys()].map((word) => [word, frequencies.get(word)]);
}

export function runCohortAnalysis(
    words: Iterable<readonly [string, number | undefined]>,
    pronunciationOf: (word: string) => PhonemeSequence | undefined,
    { inventory, report = console.log, showProgress = false }: CohortAnalysisOptions,
): CohortAnalysis {
    const index = buildPronunciationIndex(words, pronunciationOf);
    const pronunciations = index.pronunciations();
    if (pronunciations.length === 0) {
        throw new Error('No words with usable pronunciations to analyze');
    }

    report('Creating prefix tree...');
    const trie = PrefixTrie.build(pronunciations);

    report('Computing entropy...');
    const statistics = computeCohortStatistics(
        trie,
        (p) => index.frequencyOf(p),
        showProgress ? (done, total) => progress(done, total, `${done} prefixes`) : undefined,
    );
    if (showProgress) {
        console.log(); // last progress bar printed `\r`
    }

    report('Computing word metrics...');
    const { metrics, malformedWords } = aggregateWords(index, statistics, inventory, report);

    return { index, trie, statistics, metrics, malformedWords };
}

/** Diagnostic totals, printed once after everything else */
export function reportDiagnostics(analysis: CohortAnalysis, report: Report = console.log) {
    const { diagnostics, entries } = analysis.index;
    const seen = entries.length + diagnostics.invalidPronunciationCount + diagnostics.missingPronunciationCount;
    report(`${countWithPercent(diagnostics.noFrequencyCount, entries.length)} words did not have frequency information`);
    if (diagnostics.missingPronunciationCount > 0) {
        report(`${countWithPercent(diagnostics.missingPronunciationCount, seen)} words had no pronunciation`);
    }
    if (diagnostics.invalidPronunciationCount > 0) {
        report(
            `${countWithPercent(diagnostics.invalidPronunciationCount, seen)} words skipped for invalid pronunciations: ` +
                analysis.index.invalidWords.slice(0, 5).join(', '),
        );
    }
    if (analysis.malformedWords.length > 0) {
        report(
            `${countWithPercent(analysis.malformedWords.length, entries.length)} words skipped for having no nucleus: ` +
                analysis.malformedWords.slice(0, 5).join(', '),
        );
    }
    report(`${analysis.statistics.size} prefixes over ${analysis.trie.pronunciations().length} distinct pronunciations`);
}
