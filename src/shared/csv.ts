/**
 * Small CSV codec for the state and log stores.
 * Handles quoted fields and multiline values; quoting follows RFC 4180.
 */

export interface CSVTable {
    headers: string[];
    rows: Record<string, string>[];
}

/**
 * Split CSV content into rows of raw cells.
 */
export function parseCSVRows(content: string): string[][] {
    const lines: string[][] = [];
    let currentRow: string[] = [];
    let currentCell = '';
    let inQuotes = false;

    // Normalize line endings
    const text = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

    for (let i = 0; i < text.length; i++) {
        const char = text[i];
        const nextChar = text[i + 1];

        if (inQuotes) {
            if (char === '"') {
                if (nextChar === '"') {
                    // Escaped quote
                    currentCell += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                currentCell += char;
            }
        } else if (char === '"') {
            inQuotes = true;
        } else if (char === ',') {
            currentRow.push(currentCell);
            currentCell = '';
        } else if (char === '\n') {
            currentRow.push(currentCell);
            lines.push(currentRow);
            currentRow = [];
            currentCell = '';
        } else {
            currentCell += char;
        }
    }

    // Last row without a trailing newline
    if (currentRow.length > 0 || currentCell.length > 0) {
        currentRow.push(currentCell);
        lines.push(currentRow);
    }

    return lines;
}

/**
 * Parse CSV content into its header and one object per data row, keyed by header.
 */
export function parseCSV(content: string): CSVTable {
    const lines = parseCSVRows(content);
    if (lines.length === 0) return { headers: [], rows: [] };

    const headers = lines[0].map(h => h.trim());
    const rows: Record<string, string>[] = [];

    for (let i = 1; i < lines.length; i++) {
        const row = lines[i];
        // Skip empty rows
        if (row.length === 1 && row[0].trim() === '') continue;

        const obj: Record<string, string> = {};
        for (let j = 0; j < headers.length; j++) {
            obj[headers[j]] = (row[j] ?? '').trim();
        }
        rows.push(obj);
    }

    return { headers, rows };
}

function escapeCell(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

/**
 * Format one CSV line (with trailing newline).
 */
export function formatCSVRow(values: readonly string[]): string {
    return values.map(escapeCell).join(',') + '\n';
}
