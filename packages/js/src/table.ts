/**
 * Tabular Reader
 *
 * Reads delimited files with a header row into header-keyed rows.
 */

import { readFile } from 'fs/promises';
import { Table, TableRow } from './types.js';

const normalizeBom = (text: string) =>
    text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

/**
 * RFC 4180 style parser: quoted fields may contain delimiters, newlines
 * and doubled quotes. Blank lines are skipped. Fields past the last
 * header are dropped; a short row has no entry for its missing columns.
 */
export function parseTable(text: string, delimiter: string = ','): Table {
    const normalized = normalizeBom(text).replace(/\r\n/g, '\n').replace(/\r/g, '\n');

    const records: Array<{ line: number; fields: string[] }> = [];
    let fields: string[] = [];
    let field = '';
    let inQuotes = false;
    let line = 1;
    let recordLine = 1;

    const pushField = () => {
        fields.push(field);
        field = '';
    };

    const pushRecord = () => {
        if (!(fields.length === 1 && fields[0] === '')) {
            records.push({ line: recordLine, fields });
        }
        fields = [];
    };

    for (let i = 0; i < normalized.length; i += 1) {
        const ch = normalized[i];

        if (ch === '"') {
            if (inQuotes && normalized[i + 1] === '"') {
                field += '"';
                i += 1;
            } else {
                inQuotes = !inQuotes;
            }
            continue;
        }

        if (ch === '\n') {
            line += 1;
            if (!inQuotes) {
                pushField();
                pushRecord();
                recordLine = line;
                continue;
            }
        } else if (ch === delimiter && !inQuotes) {
            pushField();
            continue;
        }

        field += ch;
    }

    // Final record, unless the text ended with a newline
    if (field.length > 0 || fields.length > 0) {
        pushField();
        pushRecord();
    }

    const header = records.shift();
    const headers = (header?.fields ?? []).map((h) => h.trim());

    const rows: TableRow[] = records.map(({ line: rowLine, fields: rowFields }) => {
        const values: Record<string, string> = {};
        headers.forEach((name, column) => {
            if (column < rowFields.length) {
                values[name] = rowFields[column];
            }
        });
        return { line: rowLine, values };
    });

    return { headers, rows };
}

export async function readTable(path: string, delimiter: string = ','): Promise<Table> {
    const text = await readFile(path, 'utf-8');
    return parseTable(text, delimiter);
}
