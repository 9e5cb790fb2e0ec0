import { promises as fs } from 'fs';
import path from 'path';
import { CohortAnalysis, Report } from './cohort';
import { Cell, formatCsvRow } from './csv';
import { render, symbolSeparator } from './phonemes';
import { prefixesOf } from './prefixTrie';
import { pronunciationKey } from './pronunciationIndex';
import { PronunciationMetrics, Summary, WordEntry } from './types';

export const PREFIX_HEADER = ['prefix', 'entropy_unweighted', 'entropy_freq', 'surprisal_unweighted', 'surprisal_freq'];

export const WORD_HEADER = [
    'word',
    'frequency',
    'pronunciation',
    'length',
    'uniqueness_point',
    'first_phoneme',
    'onset',
    'onset_nucleus',
    'entropy_mean_unweighted',
    'entropy_mean_freq',
    'entropy_min_unweighted',
    'entropy_min_freq',
    'entropy_max_unweighted',
    'entropy_max_freq',
    'entropy_first_unweighted',
    'entropy_first_freq',
    'entropy_onset_unweighted',
    'entropy_onset_freq',
    'entropy_onset_nucleus_unweighted',
    'entropy_onset_nucleus_freq',
    'entropy_final_unweighted',
    'entropy_final_freq',
    'surprisal_mean_unweighted',
    'surprisal_mean_freq',
    'surprisal_min_unweighted',
    'surprisal_min_freq',
    'surprisal_max_unweighted',
    'surprisal_max_freq',
];

export const PHONEME_HEADER = [
    'word',
    'pronunciation',
    'prefix',
    'position',
    'entropy_unweighted',
    'entropy_freq',
    'surprisal_unweighted',
    'surprisal_freq',
];

const byCodeUnit = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** case-insensitive, ties broken by exact spelling so the order is stable */
export function compareWords(a: string, b: string): number {
    return byCodeUnit(a.toLowerCase(), b.toLowerCase()) || byCodeUnit(a, b);
}

/** one separator per analysis, so every table renders a sequence the same way */
const separatorFor = (analysis: CohortAnalysis) => symbolSeparator(analysis.trie.pronunciations());

export function prefixRows(analysis: CohortAnalysis): Array<Array<Cell>> {
    const separator = separatorFor(analysis);
    return analysis.statistics
        .all()
        .map((s) => ({ rendered: render(s.prefix, separator), s }))
        .sort((a, b) => byCodeUnit(a.rendered, b.rendered))
        .map(({ rendered, s }) => [rendered, s.uniformEntropy, s.freqEntropy, s.uniformSurprisal, s.freqSurprisal]);
}

/** words that made it through aggregation, with their metrics, in output order */
function wordsWithMetrics(analysis: CohortAnalysis): Array<[WordEntry, PronunciationMetrics]> {
    const result: Array<[WordEntry, PronunciationMetrics]> = [];
    for (const entry of analysis.index.entries) {
        const metrics = analysis.metrics.get(pronunciationKey(entry.pronunciation));
        if (metrics) {
            result.push([entry, metrics]);
        }
    }
    return result.sort(([a], [b]) => compareWords(a.text, b.text));
}

const summaryCells = (uniform: Summary | null, freq: Summary | null): Array<Cell> => [
    uniform?.mean ?? null,
    freq?.mean ?? null,
    uniform?.min ?? null,
    freq?.min ?? null,
    uniform?.max ?? null,
    freq?.max ?? null,
];

export function wordRows(analysis: CohortAnalysis): Array<Array<Cell>> {
    const separator = separatorFor(analysis);
    return wordsWithMetrics(analysis).map(([entry, m]) => [
        entry.text,
        entry.rawFrequency ?? 0,
        render(m.pronunciation, separator),
        m.length,
        m.uniquenessPoint,
        render(m.first, separator),
        render(m.onset, separator),
        render(m.onsetNucleus, separator),
        ...summaryCells(m.entropySummary.uniform, m.entropySummary.freq),
        m.entropyAt.first.uniform,
        m.entropyAt.first.freq,
        m.entropyAt.onset.uniform,
        m.entropyAt.onset.freq,
        m.entropyAt.onsetNucleus.uniform,
        m.entropyAt.onsetNucleus.freq,
        m.entropyAt.final.uniform,
        m.entropyAt.final.freq,
        ...summaryCells(m.surprisalSummary.uniform, m.surprisalSummary.freq),
    ]);
}

/**
 * Long format: one row per word and position. Unlike the word summaries, the
 * first position reports its surprisal against the empty prefix.
 */
export function phonemeRows(analysis: CohortAnalysis): Array<Array<Cell>> {
    const separator = separatorFor(analysis);
    const rows: Array<Array<Cell>> = [];
    for (const [entry] of wordsWithMetrics(analysis)) {
        const pron = render(entry.pronunciation, separator);
        prefixesOf(entry.pronunciation).forEach((prefix, i) => {
            const s = analysis.statistics.get(prefix);
            rows.push([entry.text, pron, render(prefix, separator), i + 1, s.uniformEntropy, s.freqEntropy, s.uniformSurprisal, s.freqSurprisal]);
        });
    }
    return rows;
}

const CHUNK_ROWS = 5000;

export async function writeCsv(file: string, header: ReadonlyArray<string>, rows: ReadonlyArray<ReadonlyArray<Cell>>) {
    const handle = await fs.open(file, 'w');
    try {
        await handle.write(formatCsvRow(header));
        for (let i = 0; i < rows.length; i += CHUNK_ROWS) {
            await handle.write(
                rows
                    .slice(i, i + CHUNK_ROWS)
                    .map((row) => formatCsvRow(row))
                    .join(''),
            );
        }
    } finally {
        await handle.close();
    }
}

export type CohortTablePaths = { prefix: string; word: string; phoneme: string };

export function tablePaths(outputBase: string): CohortTablePaths {
    return {
        prefix: `${outputBase}_prefix.csv`,
        word: `${outputBase}_word.csv`,
        phoneme: `${outputBase}_phoneme.csv`,
    };
}

export async function writeCohortTables(
    analysis: CohortAnalysis,
    outputBase: string,
    report: Report = console.log,
): Promise<CohortTablePaths> {
    const paths = tablePaths(outputBase);
    await fs.mkdir(path.dirname(outputBase), { recursive: true });
    report(`Writing prefix table to ${paths.prefix}`);
    await writeCsv(paths.prefix, PREFIX_HEADER, prefixRows(analysis));
    const words = wordRows(analysis);
    report(`Writing word table to ${paths.word}`);
    await writeCsv(paths.word, WORD_HEADER, words);
    report(`Writing phoneme table to ${paths.phoneme}`);
    await writeCsv(paths.phoneme, PHONEME_HEADER, phonemeRows(analysis));
    report(`Entropy and surprisal information written for ${words.length} words`);
    return paths;
}
