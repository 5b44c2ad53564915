import { type FileHandle, open, readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { createInterface } from 'node:readline';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { SourceDecodeError } from '../errors';
import { type Outcome, type TripColumnMap, type TripOutcome, type TripRecord, failure, success } from '../types';

// Yellow cab exports first, then green cab and generic names
const COLUMN_CANDIDATES: Record<keyof TripColumnMap, string[]> = {
  pickupTime: ['tpep_pickup_datetime', 'lpep_pickup_datetime', 'pickup_datetime'],
  dropoffTime: ['tpep_dropoff_datetime', 'lpep_dropoff_datetime', 'dropoff_datetime'],
  pickupZone: ['pulocationid', 'pickup_location_id'],
  dropoffZone: ['dolocationid', 'dropoff_location_id'],
};

const WORKBOOK_EXTENSIONS = ['.xlsx', '.xlsm', '.xls', '.xlsb', '.ods'];

const DATE_TIME_FORMAT = 'yyyy-mm-dd hh:mm:ss';

const zoneId = z.coerce.number().int().nonnegative();

const TripRowSchema = z.object({
  pickupTime: z.string().min(1),
  dropoffTime: z.string().min(1),
  pickupZone: zoneId,
  dropoffZone: zoneId,
});

export type RawTripRow = Record<keyof TripColumnMap, string | undefined>;

const TRIP_FIELDS: readonly (keyof TripColumnMap)[] = ['pickupTime', 'dropoffTime', 'pickupZone', 'dropoffZone'];

const readFailure = (path: string, error: unknown) => {
  const reason = error instanceof Error ? error.message : String(error);
  return failure(new SourceDecodeError(`Failed to read ${path}: ${reason}`));
};

export const isWorkbookPath = (path: string): boolean => WORKBOOK_EXTENSIONS.includes(extname(path).toLowerCase());

export const readTripSheet = async (path: string): Promise<Outcome<XLSX.WorkSheet, SourceDecodeError>> => {
  try {
    const buffer = await readFile(path);
    // raw: keep text cells as typed; cellDates/cellNF: keep date cells recognisable
    const workbook = XLSX.read(buffer, { type: 'buffer', raw: true, cellDates: true, cellNF: true });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet || !sheet['!ref']) {
      return failure(new SourceDecodeError(`No rows found in ${path}`));
    }
    return success(sheet);
  } catch (error) {
    return readFailure(path, error);
  }
};

const findColumnKey = (headers: string[], candidates: string[]): number | undefined => {
  const normalized = headers.map(h => h.toLowerCase().trim());
  for (const candidate of candidates) {
    const exact = normalized.indexOf(candidate);
    if (exact !== -1) return exact;
  }
  for (const candidate of candidates) {
    const partial = normalized.findIndex(h => h !== '' && h.includes(candidate));
    if (partial !== -1) return partial;
  }
  return undefined;
};

export const mapTripColumns = (headers: string[]): Outcome<TripColumnMap, SourceDecodeError> => {
  const found: Record<keyof TripColumnMap, number | undefined> = {
    pickupTime: findColumnKey(headers, COLUMN_CANDIDATES.pickupTime),
    dropoffTime: findColumnKey(headers, COLUMN_CANDIDATES.dropoffTime),
    pickupZone: findColumnKey(headers, COLUMN_CANDIDATES.pickupZone),
    dropoffZone: findColumnKey(headers, COLUMN_CANDIDATES.dropoffZone),
  };

  const { pickupTime, dropoffTime, pickupZone, dropoffZone } = found;
  if (pickupTime === undefined || dropoffTime === undefined || pickupZone === undefined || dropoffZone === undefined) {
    const missing = TRIP_FIELDS
      .filter(field => found[field] === undefined)
      .map(field => COLUMN_CANDIDATES[field][0]);
    return failure(new SourceDecodeError(`Missing required column(s): ${missing.join(', ')}`));
  }

  return success({ pickupTime, dropoffTime, pickupZone, dropoffZone });
};

const pad = (n: number) => n.toString().padStart(2, '0');

const formatCellDate = (date: Date): string => {
  // Serial dates come back a few milliseconds off
  const d = new Date(Math.round(date.getTime() / 1000) * 1000);
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

const presentText = (text: string | undefined): string | undefined =>
  text === undefined || text.trim() === '' ? undefined : text;

const cellText = (sheet: XLSX.WorkSheet, r: number, c: number): string | undefined => {
  const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r, c })];
  if (!cell || cell.v === undefined) return undefined;
  if (cell.v instanceof Date) return formatCellDate(cell.v);
  if (typeof cell.v === 'number' && typeof cell.z === 'string' && XLSX.SSF.is_date(cell.z)) {
    return XLSX.SSF.format(DATE_TIME_FORMAT, cell.v);
  }
  return presentText(typeof cell.v === 'string' ? cell.v : (cell.w ?? String(cell.v)));
};

const tripFields = (columns: TripColumnMap, read: (index: number) => string | undefined): RawTripRow => ({
  pickupTime: read(columns.pickupTime),
  dropoffTime: read(columns.dropoffTime),
  pickupZone: read(columns.pickupZone),
  dropoffZone: read(columns.dropoffZone),
});

const isBlankRow = (fields: RawTripRow) => Object.values(fields).every(value => value === undefined);

export const decodeTripRow = (row: number, fields: RawTripRow): Outcome<TripRecord, SourceDecodeError> => {
  const parsed = TripRowSchema.safeParse(fields);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return failure(new SourceDecodeError(details, row));
  }
  return success(Object.freeze({ row, ...parsed.data }));
};

/**
 * Lazily decodes the data rows of a trip sheet, one record per step.
 * The first row holds the column names; fully blank rows are passed over.
 */
export function* decodeTripRecords(sheet: XLSX.WorkSheet): Generator<TripOutcome> {
  const ref = sheet['!ref'];
  if (!ref) return;
  const range = XLSX.utils.decode_range(ref);

  const headers: string[] = [];
  for (let c = range.s.c; c <= range.e.c; c++) {
    headers.push(cellText(sheet, range.s.r, c) ?? '');
  }

  const columns = mapTripColumns(headers);
  if (columns.type === 'ERROR') {
    yield columns;
    return;
  }

  for (let r = range.s.r + 1; r <= range.e.r; r++) {
    const fields = tripFields(columns.value, offset => cellText(sheet, r, range.s.c + offset));
    if (isBlankRow(fields)) continue;

    yield decodeTripRow(r - range.s.r, fields);
  }
}

/** Splits one CSV line; double-quoted cells may hold commas and `""` escapes. */
export const splitCsvLine = (line: string): string[] => {
  const cells: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch !== '"') current += ch;
      else if (line[i + 1] === '"') {
        current += '"';
        i++;
      } else quoted = false;
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      cells.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current);
  return cells;
};

/**
 * Streams a CSV file line by line. Only the current line is held; the
 * file handle is released when the consumer stops early.
 */
export async function* streamCsvTripRecords(path: string): AsyncGenerator<TripOutcome> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    yield readFailure(path, error);
    return;
  }

  const input = handle.createReadStream({ encoding: 'utf8' });
  const lines = createInterface({ input, crlfDelay: Infinity });

  let columns: TripColumnMap | undefined;
  let headerLine = 0;
  let lineNumber = 0;
  try {
    for await (const raw of lines) {
      lineNumber++;
      const line = lineNumber === 1 ? raw.replace(/^\uFEFF/, '') : raw;
      if (line.trim() === '') continue;
      const cells = splitCsvLine(line);

      if (columns === undefined) {
        const mapped = mapTripColumns(cells);
        if (mapped.type === 'ERROR') {
          yield mapped;
          return;
        }
        columns = mapped.value;
        headerLine = lineNumber;
        continue;
      }

      const fields = tripFields(columns, index => presentText(cells[index]));
      if (isBlankRow(fields)) continue;

      yield decodeTripRow(lineNumber - headerLine, fields);
    }
  } catch (error) {
    yield readFailure(path, error);
    return;
  } finally {
    lines.close();
    input.destroy();
  }

  if (columns === undefined) {
    yield failure(new SourceDecodeError(`No rows found in ${path}`));
  }
}

async function* readWorkbookRecords(path: string): AsyncGenerator<TripOutcome> {
  const sheet = await readTripSheet(path);
  if (sheet.type === 'ERROR') {
    yield sheet;
    return;
  }
  yield* decodeTripRecords(sheet.value);
}

/** Workbooks are loaded whole by `xlsx`; anything else streams as CSV. */
export const openTripSource = (path: string): AsyncGenerator<TripOutcome> =>
  isWorkbookPath(path) ? readWorkbookRecords(path) : streamCsvTripRecords(path);
