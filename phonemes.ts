import { InventoryName, parameters } from './parameters';
import { Phoneme, PhonemeSequence } from './types';

/**
 * The symbols of a transcription system that matter for cohort analysis:
 * which ones are vowels (to find onsets), and how to split a transcription
 * string into symbols.
 */
export type PhonemeInventory = {
    name: string;
    isVowel: (phoneme: Phoneme) => boolean;
    split: (transcription: string) => Array<Phoneme>;
};

export function createInventory(
    name: string,
    vowels: ReadonlySet<Phoneme>,
    multiCharacterSymbols: ReadonlyArray<Phoneme> = [],
): PhonemeInventory {
    // try longest symbols first so [aɪ] wins over [a]
    const groups = [...multiCharacterSymbols].sort((a, b) => b.length - a.length);
    return {
        name,
        // ARPABET vowels carry a stress digit: AE1
        isVowel: (phoneme) => vowels.has(phoneme) || vowels.has(phoneme.replace(/\d+$/, '')),
        split: (transcription) => groupSymbols(transcription, groups),
    };
}

export function inventoryFor(name: InventoryName): PhonemeInventory {
    const { vowels, multiCharacterSymbols } = parameters.inventories[name];
    return createInventory(name, vowels, multiCharacterSymbols);
}

export function isInventoryName(name: string): name is InventoryName {
    return Object.keys(parameters.inventories).includes(name);
}

/** split this string into symbols, keeping known multi-letter symbols together,
 * like [dʒ] or [eɪ]. Whitespace-separated input is split on the whitespace instead.
 */
export function groupSymbols(s: string, groups: ReadonlyArray<string>): Array<Phoneme> {
    const trimmed = s.trim();
    if (/\s/.test(trimmed)) {
        return trimmed.split(/\s+/);
    }
    const parts: Array<Phoneme> = [];
    let i = 0;
    while (i < trimmed.length) {
        const found = groups.find((check) => trimmed.startsWith(check, i));
        if (found) {
            parts.push(found);
            i += found.length;
            continue;
        }
        // not a known group, just take one char
        parts.push(trimmed[i]);
        i++;
    }
    return parts;
}

export function render(sequence: PhonemeSequence, separator = ''): string {
    return sequence.join(separator);
}

/**
 * Separator that keeps rendered sequences distinct: once any symbol spans more
 * than one character, ['aɪ'] and ['a', 'ɪ'] would both concatenate to "aɪ".
 */
export function symbolSeparator(pronunciations: Iterable<PhonemeSequence>): string {
    for (const pron of pronunciations) {
        if (pron.some((symbol) => symbol.length > 1)) {
            return ' ';
        }
    }
    return '';
}

/** Consonants up to the first vowel, or the first symbol if the word starts with a vowel.
 *  klasp -> kl, ab@k@s -> a
 */
export function onsetOf(pronunciation: PhonemeSequence, inventory: PhonemeInventory): PhonemeSequence {
    const consonants = consonantRun(pronunciation, inventory);
    return consonants > 0 ? pronunciation.slice(0, consonants) : pronunciation.slice(0, 1);
}

/** Length of the run of non-vowels at the start of the pronunciation */
export function consonantRun(pronunciation: PhonemeSequence, inventory: PhonemeInventory): number {
    const firstVowel = pronunciation.findIndex((p) => inventory.isVowel(p));
    return firstVowel === -1 ? pronunciation.length : firstVowel;
}
