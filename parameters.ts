import { Phoneme } from './types';

export const parameters = {
    probability: {
        // allowed drift when checking that a distribution sums to 1
        tolerance: 0.000001,
        logBase: 2,
    },
    frequencies: {
        wordColumn: 'Word',
        // FREQlow tracks behavioral measures better than FREQcount, at the cost of coverage
        countColumn: 'FREQlow',
        delimiter: '\t',
    },
    filePaths: {
        pronunciations: 'inputs/prons.csv',
        frequencies: 'inputs/SUBTLEXus74286wordstextversion.txt',
        outputBase: 'outputs/cohort',
    },
    inventories: {
        // one-character codes, as in ELP/CELEX DISC style transcriptions.
        // Check against your stimuli; this list was assembled by hand.
        elp: {
            vowels: new Set<Phoneme>([
                '8',
                '@',
                'o',
                'O',
                'Y',
                'W',
                'a',
                'A',
                'e',
                'E',
                'i',
                'I',
                'V',
                'u',
                'U',
                'R',
            ]),
            multiCharacterSymbols: [] as Phoneme[],
        },
        ipa: {
            vowels: new Set<Phoneme>([
                'a',
                'ɑ', // ɑ or ɒ
                'æ',
                'ʌ',
                'ɔ',
                'aʊ',
                'ɚ',
                'ə',
                'aɪ',
                'ɛ',
                'ɝ',
                'eɪ',
                'ɪ',
                'ɨ',
                'i',
                'oʊ',
                'ɔɪ',
                'ʊ',
                'u',
                'ʉ',
            ]),
            // affricates, diphthongs and syllabic consonants that must not be split
            multiCharacterSymbols: [
                'aʊ',
                'aɪ',
                'eɪ',
                'oʊ',
                'ɔɪ',
                'tʃ',
                'dʒ',
                'l̩',
                'm̩',
                'n̩',
                'ɾ̃',
            ] as Phoneme[],
        },
        arpabet: {
            vowels: new Set<Phoneme>([
                'AA',
                'AE',
                'AH',
                'AO',
                'AW',
                'AX',
                'AXR',
                'AY',
                'EH',
                'ER',
                'EY',
                'IH',
                'IX',
                'IY',
                'OW',
                'OY',
                'UH',
                'UW',
                'UX',
            ]),
            // ARPABET is always written space separated
            multiCharacterSymbols: [] as Phoneme[],
        },
    },
};

export type InventoryName = keyof typeof parameters.inventories;
