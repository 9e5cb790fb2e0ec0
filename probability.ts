import { InvalidConditionalProbabilityError, InvalidProbabilityDistributionError } from './errors';
import { parameters } from './parameters';

const log = (x: number, base: number) => Math.log(x) / Math.log(base);

/**
 * Shannon entropy over outcome probabilities.
 * entropy([0.5, 0.5]) -> 1
 * entropy([0.5, 0.5], 4) -> 0.5
 */
export function entropy(probs: ReadonlyArray<number>, base: number = parameters.probability.logBase): number {
    const total = probs.reduce((sum, p) => sum + p, 0);
    const { tolerance } = parameters.probability;
    if (!(total > 1 - tolerance && total <= 1 + tolerance)) {
        throw new InvalidProbabilityDistributionError(total);
    }
    if (probs.length === 1) {
        // -1 * log(1) would give -0
        return 0;
    }
    let sum = 0;
    for (const p of probs) {
        sum += p * log(p, base);
    }
    return -sum;
}

/**
 * Surprisal of an event given the probability (or count) of its context.
 * Counts work as well as probabilities since only their ratio matters.
 */
export function surprisal(
    eventProb: number,
    contextProb: number,
    base: number = parameters.probability.logBase,
): number {
    if (eventProb === contextProb) {
        return 0;
    }
    if (eventProb > contextProb) {
        throw new InvalidConditionalProbabilityError(eventProb, contextProb);
    }
    return -(log(eventProb, base) - log(contextProb, base));
}

export function normalizeCounts(counts: ReadonlyArray<number>): Array<number> {
    const total = counts.reduce((sum, c) => sum + c, 0);
    return counts.map((c) => c / total);
}

/**
 * Entropy of n equally likely outcomes, log(n) in closed form.
 * uniformEntropy(8) -> 3
 */
export function uniformEntropy(n: number, base: number = parameters.probability.logBase): number {
    if (!(n >= 1)) {
        // no outcomes: the probabilities sum to 0
        throw new InvalidProbabilityDistributionError(0);
    }
    if (n === 1) {
        return 0;
    }
    return base === 2 ? Math.log2(n) : log(n, base);
}
