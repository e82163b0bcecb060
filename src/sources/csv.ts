/**
 * Minimal RFC 4180 reader: quoted fields, doubled quotes, CRLF or LF line
 * endings and newlines inside quotes. The delimiter is detected from the
 * header line when not given.
 */

export type CsvDelimiter = ',' | ';' | '\t';

export interface CsvTable {
    columns: string[];
    rows: Array<Record<string, string>>;
}

const CANDIDATE_DELIMITERS: readonly CsvDelimiter[] = [',', ';', '\t'];

/**
 * Pick the candidate delimiter occurring most often (outside quotes) in
 * the first line. Ties resolve in candidate order.
 */
export function detectDelimiter(text: string): CsvDelimiter {
    const firstLine = firstRecordLine(text);
    let best: CsvDelimiter = ',';
    let bestCount = 0;

    for (const candidate of CANDIDATE_DELIMITERS) {
        let count = 0;
        let inQuotes = false;
        for (const ch of firstLine) {
            if (ch === '"') inQuotes = !inQuotes;
            else if (!inQuotes && ch === candidate) count++;
        }
        if (count > bestCount) {
            best = candidate;
            bestCount = count;
        }
    }

    return best;
}

/**
 * Split CSV text into records of raw fields.
 */
export function parseCsvRecords(text: string, delimiter: CsvDelimiter): string[][] {
    const records: string[][] = [];
    let record: string[] = [];
    let field = '';
    let inQuotes = false;

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];

        if (inQuotes) {
            if (ch === '"') {
                if (text[i + 1] === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                field += ch;
            }
            continue;
        }

        if (ch === '"' && field === '') {
            inQuotes = true;
        } else if (ch === delimiter) {
            record.push(field);
            field = '';
        } else if (ch === '\n' || ch === '\r') {
            if (ch === '\r' && text[i + 1] === '\n') i++;
            record.push(field);
            records.push(record);
            record = [];
            field = '';
        } else {
            field += ch;
        }
    }

    if (field !== '' || record.length > 0) {
        record.push(field);
        records.push(record);
    }

    // Blank lines carry no data
    return records.filter((r) => !(r.length === 1 && r[0] === ''));
}

/**
 * Parse a CSV document with a header row into column-keyed rows.
 * A leading BOM is dropped; short rows are padded with ''.
 */
export function parseCsv(text: string, delimiter?: CsvDelimiter): CsvTable {
    const body = text.startsWith('\uFEFF') ? text.slice(1) : text;
    const records = parseCsvRecords(body, delimiter ?? detectDelimiter(body));

    const [header, ...data] = records;
    if (!header) return { columns: [], rows: [] };

    const rows = data.map((values) => {
        const row: Record<string, string> = {};
        header.forEach((column, index) => {
            row[column] = values[index] ?? '';
        });
        return row;
    });

    return { columns: header, rows };
}

function firstRecordLine(text: string): string {
    const end = text.search(/\r?\n/);
    return end === -1 ? text : text.slice(0, end);
}
