export type Phoneme = string;

/**
 * Ordered phoneme symbols of one pronunciation.
 * cats -> ['k', 'a', 't', 's']
 * */
export type PhonemeSequence = ReadonlyArray<Phoneme>;

export type WordEntry = {
    readonly text: string;
    readonly pronunciation: PhonemeSequence;
    /** count from the frequency source, undefined if the word wasn't listed */
    readonly rawFrequency: number | undefined;
    /** Laplace-smoothed count */
    readonly frequency: number;
};

export type Weighting = 'uniform' | 'freq';

export type PrefixStatistics = {
    readonly prefix: PhonemeSequence;
    /** distinct pronunciations sharing this prefix */
    readonly count: number;
    /** sum of smoothed frequencies of those pronunciations */
    readonly frequency: number;
    readonly uniformEntropy: number;
    readonly freqEntropy: number;
    // null only for the empty prefix
    readonly uniformSurprisal: number | null;
    readonly freqSurprisal: number | null;
};

export type Summary = {
    mean: number;
    min: number;
    max: number;
};

export type PronunciationMetrics = {
    pronunciation: PhonemeSequence;
    length: number;
    /** 1-based */
    uniquenessPoint: number;
    first: PhonemeSequence;
    onset: PhonemeSequence;
    onsetNucleus: PhonemeSequence;
    entropy: { [key in Weighting]: Array<number> };
    surprisal: { [key in Weighting]: Array<number | null> };
    entropySummary: { [key in Weighting]: Summary };
    surprisalSummary: { [key in Weighting]: Summary | null };
    entropyAt: {
        [position in 'first' | 'onset' | 'onsetNucleus' | 'final']: { [key in Weighting]: number };
    };
};

export type IndexDiagnostics = {
    noFrequencyCount: number;
    missingPronunciationCount: number;
    invalidPronunciationCount: number;
};
