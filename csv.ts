export type Cell = string | number | null;

/** null -> empty cell; quote anything containing the delimiter, a quote or a newline */
export function formatCsvRow(cells: ReadonlyArray<Cell>, delimiter = ','): string {
    return (
        cells
            .map((cell) => {
                if (cell === null) return '';
                const s = String(cell);
                if (s.includes(delimiter) || /["\r\n]/.test(s)) {
                    return `"${s.replace(/"/g, '""')}"`;
                }
                return s;
            })
            .join(delimiter) + '\n'
    );
}

/** Split one line of delimited text, honoring double-quoted fields */
export function parseDelimitedLine(line: string, delimiter = ','): Array<string> {
    const cells: Array<string> = [];
    let current = '';
    let quoted = false;
    for (let i = 0; i < line.length; i++) {
        const c = line[i];
        if (quoted) {
            if (c === '"' && line[i + 1] === '"') {
                current += '"';
                i++;
            } else if (c === '"') {
                quoted = false;
            } else {
                current += c;
            }
        } else if (c === '"' && current === '') {
            quoted = true;
        } else if (line.startsWith(delimiter, i)) {
            cells.push(current);
            current = '';
            i += delimiter.length - 1;
        } else {
            current += c;
        }
    }
    cells.push(current);
    return cells;
}

export function splitLines(content: string): Array<string> {
    return content.split(/\r?\n/);
}
