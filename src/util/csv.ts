import { parse } from 'csv-parse/sync';

export type CsvRow = readonly string[];

const isStringRow = (value: unknown): value is string[] => {
    return Array.isArray(value) && value.every((cell) => typeof cell === 'string');
};

/**
 * Rows as trimmed string cells. Ragged rows are kept so callers can reject
 * them one by one; rows made only of empty cells are dropped.
 * Throws on unbalanced quotes.
 */
export const parseCsv = (text: string): CsvRow[] => {
    const records: unknown = parse(text, {
        relax_column_count: true,
        skip_empty_lines: true,
        trim: true,
    });

    if (!Array.isArray(records)) {
        return [];
    }

    return records.filter(isStringRow).filter((row) => row.some((cell) => cell.length > 0));
};

export type CsvLine =
    | { readonly line: number; readonly row: CsvRow }
    | { readonly line: number; readonly error: string };

/**
 * Parses every physical line on its own, reporting the ones that fail with
 * their 1-based line number. Quoted cells cannot span lines here.
 */
export const parseCsvLines = (text: string): CsvLine[] => {
    const lines: CsvLine[] = [];
    text.split(/\r?\n/).forEach((raw, index) => {
        if (raw.trim().length === 0) {
            return;
        }
        try {
            const [row] = parseCsv(raw);
            if (row) {
                lines.push({ line: index + 1, row });
            }
        } catch (error) {
            lines.push({ line: index + 1, error: error instanceof Error ? error.message : String(error) });
        }
    });
    return lines;
};

const needsQuoting = (cell: string): boolean => /[",\n\r]/.test(cell);

export const formatCsvCell = (value: string | number): string => {
    const text = typeof value === 'number' ? String(value) : value;
    if (!needsQuoting(text)) {
        return text;
    }
    return `"${text.replace(/"/g, '""')}"`;
};

export const formatCsvRow = (cells: readonly (string | number)[]): string => {
    return cells.map(formatCsvCell).join(',');
};
