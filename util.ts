export function oneSigFig(n: number): string {
    return String(Math.floor(10 * n) / 10);
}

/** "12 / 80 (15%)" */
export function countWithPercent(count: number, total: number): string {
    return `${count} / ${total} (${oneSigFig(total === 0 ? 0 : (100 * count) / total)}%)`;
}

export function progress(done: number, outof: number, extraInfo: string) {
    const width = 20;
    const pct = outof === 0 ? 1 : Math.min(done / outof, 1);
    const FILLED_CHAR = '█';
    const EMPTY_CHAR = ' ';
    const SUBPIXEL_CHARS = '▏▎▍▌▋▊▉█';
    let progressBar = '▐';

    const fillTill = Math.floor(pct * width);
    let filled = fillTill;
    progressBar += FILLED_CHAR.repeat(fillTill);

    if (fillTill != width) {
        const subpixelFillLevel = pct * width - fillTill;
        progressBar += SUBPIXEL_CHARS[Math.floor(subpixelFillLevel * SUBPIXEL_CHARS.length)];
        filled += 1;
    }

    progressBar += EMPTY_CHAR.repeat(width - filled);
    progressBar += '▌ ';
    process.stdout.write(progressBar + extraInfo + '\r');
}
