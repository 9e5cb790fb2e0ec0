export type CohortErrorKind =
    | 'InvalidPronunciation'
    | 'MalformedPronunciation'
    | 'InvalidConditionalProbability'
    | 'InvalidProbabilityDistribution';

export class CohortError extends Error {
    constructor(readonly kind: CohortErrorKind, message: string) {
        super(message);
        this.name = kind;
    }
}

/** Zero-length transcription. Only the offending word is skipped. */
export class InvalidPronunciationError extends CohortError {
    constructor(readonly word: string, detail = 'pronunciation is empty') {
        super('InvalidPronunciation', `Invalid pronunciation for "${word}": ${detail}`);
    }
}

/** No nucleus could be found after the onset. */
export class MalformedPronunciationError extends CohortError {
    constructor(readonly pronunciation: string) {
        super('MalformedPronunciation', `Could not find a nucleus after the onset in "${pronunciation}"`);
    }
}

/**
 * Raised when an event is more likely than its context. For prefix counts this
 * means the prefix index is broken, so every surprisal is suspect.
 */
export class InvalidConditionalProbabilityError extends CohortError {
    constructor(readonly event: number, readonly context: number) {
        super(
            'InvalidConditionalProbability',
            `Improper conditional probability (event ${event} > context ${context})`,
        );
    }
}

export class InvalidProbabilityDistributionError extends CohortError {
    constructor(readonly total: number) {
        super('InvalidProbabilityDistribution', `Sum of probabilities is not 1.0 (got ${total})`);
    }
}
