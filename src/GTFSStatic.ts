import { Readable } from 'stream';
import AdmZip from 'adm-zip';
import csv from 'csv-parser';
import { describeError } from './Errors';
import { CSVRow, Failure, ParsedStaticTables, STATIC_TABLE_NAMES, StaticTable, StaticTableName } from './types';

// Decoding of GTFS static archives, entirely in memory.
// Documentation for the tables is at https://gtfs.org/schedule/reference/

export type StaticParseResult =
    | { ok: true; tables: ParsedStaticTables; ignoredFiles: string[] }
    | { ok: false; failure: Failure };

function tableNameFor(fileName: string): StaticTableName | undefined {
    return STATIC_TABLE_NAMES.find((name) => `${name}.txt` === fileName);
}

// Some publishers wrap the tables in a single top-level folder
function locateTables(zip: AdmZip): { entries: Map<StaticTableName, AdmZip.IZipEntry>; ignored: string[] } {
    const entries = new Map<StaticTableName, AdmZip.IZipEntry>();
    const depths = new Map<StaticTableName, number>();
    const ignored: string[] = [];

    for (const entry of zip.getEntries()) {
        if (entry.isDirectory) continue;

        const segments = entry.entryName.split('/');
        const fileName = segments[segments.length - 1];
        const name = segments.length <= 2 ? tableNameFor(fileName) : undefined;
        if (!name) {
            ignored.push(entry.entryName);
            continue;
        }

        const depth = segments.length;
        const known = depths.get(name);
        if (known === undefined || depth < known) {
            entries.set(name, entry);
            depths.set(name, depth);
        }
    }
    return { entries, ignored };
}

export function parseCSV(data: Buffer): Promise<StaticTable> {
    return new Promise<StaticTable>((resolve, reject) => {
        const rows: CSVRow[] = [];
        let columns: string[] = [];

        Readable.from(data)
            .pipe(csv({ mapHeaders: ({ header }) => header.replace(/\uFEFF/g, '').trim() }))
            .on('headers', (headers: string[]) => {
                columns = headers;
            })
            .on('data', (row: CSVRow) => {
                rows.push(row);
            })
            .on('end', () => resolve({ columns, rows }))
            .on('error', (error: Error) => reject(error));
    });
}

/**
 * Opens a GTFS ZIP and parses each known table it contains. Tables missing from the
 * archive are left out of the result; an empty file still produces a table.
 */
export async function parseStatic(zipBytes: Buffer): Promise<StaticParseResult> {
    let located: { entries: Map<StaticTableName, AdmZip.IZipEntry>; ignored: string[] };
    try {
        located = locateTables(new AdmZip(zipBytes));
    } catch (error) {
        return { ok: false, failure: { kind: 'decode', message: `Unreadable GTFS archive: ${describeError(error)}` } };
    }

    const tables: ParsedStaticTables = {};
    try {
        for (const [name, entry] of located.entries) {
            tables[name] = await parseCSV(entry.getData());
        }
    } catch (error) {
        return { ok: false, failure: { kind: 'decode', message: `Unreadable GTFS table: ${describeError(error)}` } };
    }

    return { ok: true, tables, ignoredFiles: located.ignored };
}

export function countRows(tables: ParsedStaticTables): number {
    return Object.values(tables).reduce((total, table) => total + (table?.rows.length ?? 0), 0);
}
