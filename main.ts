#!/usr/bin/env node
import { parse } from 'ts-command-line-args';
import { lexiconWords, reportDiagnostics, runCohortAnalysis } from './cohort';
import { writeCohortTables } from './exporter';
import { parameters } from './parameters';
import { inventoryFor, isInventoryName } from './phonemes';
import { readFrequencies, readPronunciations } from './sources';

interface ICohortArgs {
    words: string;
    freqs: string;
    output: string;
    inventory?: string; // `string` rather than `InventoryName` so that `parse` can compute over it.
    'word-column'?: string;
    'count-column'?: string;
    delimiter?: string;
    progress?: boolean;
    help?: boolean;
}

const availableInventories = Object.keys(parameters.inventories).join(', ');

/** `argv` defaults to the process's own arguments */
export function parseArgs(argv?: string[]): ICohortArgs {
    return parse<ICohortArgs>(
        {
            words: { type: String, alias: 'w', defaultValue: parameters.filePaths.pronunciations, description: 'CSV of word,pronunciation rows' },
            freqs: { type: String, alias: 'f', defaultValue: parameters.filePaths.frequencies, description: 'Delimited word frequency list with a header row (e.g. SUBTLEX)' },
            output: { type: String, alias: 'o', defaultValue: parameters.filePaths.outputBase, description: 'Output path prefix; writes <output>_prefix.csv, _word.csv and _phoneme.csv' },
            inventory: { type: String, optional: true, description: `Phoneme inventory of the transcriptions. Available: ${availableInventories} (default: elp)` },
            'word-column': { type: String, optional: true, description: `Frequency list word column (default: ${parameters.frequencies.wordColumn})` },
            'count-column': { type: String, optional: true, description: `Frequency list count column (default: ${parameters.frequencies.countColumn})` },
            delimiter: { type: String, optional: true, description: 'Frequency list delimiter (default: tab)' },
            progress: { type: Boolean, optional: true, description: 'Show a progress bar while computing entropy' },
            help: { type: Boolean, optional: true, alias: 'h' },
        },
        {
            argv,
            helpArg: 'help',
            headerContentSections: [{ header: 'cohort-info', content: 'Write prefix cohort entropy and surprisal for a pronunciation lexicon.' }],
        },
    );
}

async function main() {
    const args = parseArgs();
    const inventoryName = args.inventory ?? 'elp';
    if (!isInventoryName(inventoryName)) {
        throw new Error(`Unknown inventory: "${inventoryName}". Available inventories: ${availableInventories}`);
    }
    const inventory = inventoryFor(inventoryName);

    console.log('Reading frequencies...');
    const frequencies = await readFrequencies(args.freqs, {
        wordColumn: args['word-column'],
        countColumn: args['count-column'],
        // a literal \t typed on the command line means tab
        delimiter: args.delimiter?.replace(/^\\t$/, '\t'),
    });
    console.log('Reading pronunciations...');
    const pronunciations = await readPronunciations(args.words, inventory);

    const analysis = runCohortAnalysis(lexiconWords(pronunciations, frequencies), (word) => pronunciations.get(word), {
        inventory,
        showProgress: args.progress ?? false,
    });
    await writeCohortTables(analysis, args.output);
    reportDiagnostics(analysis);
}

if (require.main === module) {
    main().catch((err: unknown) => {
        console.error(err instanceof Error ? err.message : err);
        process.exitCode = 1;
    });
}
