import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';
import * as XLSX from 'xlsx';
import { SourceDecodeError } from '../errors';
import type { TripOutcome } from '../types';
import {
  decodeTripRecords,
  decodeTripRow,
  isWorkbookPath,
  mapTripColumns,
  openTripSource,
  readTripSheet,
  splitCsvLine,
  streamCsvTripRecords,
} from './csvProcessor';

const HEADER = ['VendorID', 'tpep_pickup_datetime', 'tpep_dropoff_datetime', 'passenger_count', 'PULocationID', 'DOLocationID'];

const MONDAY_TRIP = {
  row: 1,
  pickupTime: '2021-06-07 09:15:00',
  dropoffTime: '2021-06-07 09:45:00',
  pickupZone: 161,
  dropoffZone: 132,
};

const collect = async (source: AsyncIterable<TripOutcome>): Promise<TripOutcome[]> => {
  const outcomes: TripOutcome[] = [];
  for await (const outcome of source) outcomes.push(outcome);
  return outcomes;
};

describe('mapTripColumns', () => {
  it('finds the yellow cab columns', () => {
    expect(mapTripColumns(HEADER)).toEqual({
      type: 'SUCCESS',
      value: { pickupTime: 1, dropoffTime: 2, pickupZone: 4, dropoffZone: 5 },
    });
  });

  it('matches green cab and mixed-case names', () => {
    const result = mapTripColumns(['lpep_pickup_datetime', ' LPEP_DROPOFF_DATETIME ', 'pulocationid', 'DOLocationId']);
    expect(result).toEqual({
      type: 'SUCCESS',
      value: { pickupTime: 0, dropoffTime: 1, pickupZone: 2, dropoffZone: 3 },
    });
  });

  it('names every missing column', () => {
    const result = mapTripColumns(['tpep_pickup_datetime', 'PULocationID']);
    expect(result.type).toBe('ERROR');
    if (result.type !== 'ERROR') return;
    expect(result.error).toBeInstanceOf(SourceDecodeError);
    expect(result.error.message).toBe('Missing required column(s): tpep_dropoff_datetime, dolocationid');
  });
});

describe('decodeTripRow', () => {
  it('coerces zone text to integers', () => {
    const result = decodeTripRow(3, {
      pickupTime: '2021-06-07 09:15:00',
      dropoffTime: '2021-06-07 09:45:00',
      pickupZone: '161',
      dropoffZone: '132',
    });
    expect(result).toEqual({
      type: 'SUCCESS',
      value: { row: 3, pickupTime: '2021-06-07 09:15:00', dropoffTime: '2021-06-07 09:45:00', pickupZone: 161, dropoffZone: 132 },
    });
    expect(result.type === 'SUCCESS' && Object.isFrozen(result.value)).toBe(true);
  });

  it.each([
    ['abc', 'pickupZone'],
    ['-5', 'pickupZone'],
    ['1.5', 'pickupZone'],
    [undefined, 'pickupZone'],
  ])('rejects pickup zone %s', (pickupZone, field) => {
    const result = decodeTripRow(2, {
      pickupTime: '2021-06-07 09:15:00',
      dropoffTime: '2021-06-07 09:45:00',
      pickupZone,
      dropoffZone: '132',
    });
    expect(result.type).toBe('ERROR');
    if (result.type !== 'ERROR') return;
    expect(result.error.row).toBe(2);
    expect(result.error.message.startsWith(`Row 2: ${field}: `)).toBe(true);
  });

  it('rejects a missing timestamp', () => {
    const result = decodeTripRow(5, { pickupTime: undefined, dropoffTime: '2021-06-07 09:45:00', pickupZone: '161', dropoffZone: '132' });
    expect(result.type === 'ERROR' && result.error.message).toBe('Row 5: pickupTime: Required');
  });
});

describe('decodeTripRecords', () => {
  it('yields one outcome per data row and passes over blank rows', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      HEADER,
      [1, '2021-06-07 09:15:00', '2021-06-07 09:45:00', 1, 161, 132],
      [2, '2021-06-05 10:00:00', '2021-06-05 10:30:00', 1, '48', '132'],
      [],
      [1, '2021-06-07 11:00:00', '2021-06-07 11:40:00', 2, 'x', 132],
    ]);

    const outcomes = [...decodeTripRecords(sheet)];
    expect(outcomes).toHaveLength(3);
    expect(outcomes[0]).toEqual({
      type: 'SUCCESS',
      value: { row: 1, pickupTime: '2021-06-07 09:15:00', dropoffTime: '2021-06-07 09:45:00', pickupZone: 161, dropoffZone: 132 },
    });
    expect(outcomes[1]).toEqual({
      type: 'SUCCESS',
      value: { row: 2, pickupTime: '2021-06-05 10:00:00', dropoffTime: '2021-06-05 10:30:00', pickupZone: 48, dropoffZone: 132 },
    });
    const bad = outcomes[2];
    expect(bad.type).toBe('ERROR');
    expect(bad.type === 'ERROR' && bad.error.row).toBe(4);
  });

  it('yields a single error when a column is missing', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['tpep_pickup_datetime', 'tpep_dropoff_datetime', 'PULocationID'],
      ['2021-06-07 09:15:00', '2021-06-07 09:45:00', 161],
    ]);
    const outcomes = [...decodeTripRecords(sheet)];
    expect(outcomes).toHaveLength(1);
    const [only] = outcomes;
    expect(only.type === 'ERROR' && only.error.message).toBe('Missing required column(s): dolocationid');
  });

  it('formats numeric date cells as timestamps', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['tpep_pickup_datetime', 'tpep_dropoff_datetime', 'PULocationID', 'DOLocationID'],
      [0, 0, 161, 132],
    ]);
    // 2021-06-07 is serial day 44354
    sheet['A2'] = { t: 'n', v: 44354 + 33300 / 86400, z: 'm/d/yy h:mm' };
    sheet['B2'] = { t: 'n', v: 44354 + 35100 / 86400, z: 'm/d/yy h:mm' };

    expect([...decodeTripRecords(sheet)]).toEqual([{ type: 'SUCCESS', value: MONDAY_TRIP }]);
  });

  it('formats Date cells as timestamps', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['tpep_pickup_datetime', 'tpep_dropoff_datetime', 'PULocationID', 'DOLocationID'],
      [new Date(2021, 5, 7, 9, 15, 0), new Date(2021, 5, 7, 9, 45, 0), 161, 132],
    ], { cellDates: true });

    expect([...decodeTripRecords(sheet)]).toEqual([{ type: 'SUCCESS', value: MONDAY_TRIP }]);
  });
});

describe('splitCsvLine', () => {
  it('splits on commas outside quotes', () => {
    expect(splitCsvLine('1,"Midtown, East","say ""hi""",,132')).toEqual(['1', 'Midtown, East', 'say "hi"', '', '132']);
  });

  it('keeps a trailing empty cell', () => {
    expect(splitCsvLine('a,b,')).toEqual(['a', 'b', '']);
  });
});

describe('readTripSheet', () => {
  const dir = mkdtempSync(join(tmpdir(), 'trip-sheet-'));
  afterAll(() => rmSync(dir, { recursive: true, force: true }));

  it('keeps date cells of a saved workbook as dates', async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([
      ['tpep_pickup_datetime', 'tpep_dropoff_datetime', 'PULocationID', 'DOLocationID'],
      [new Date(2021, 5, 7, 9, 15, 0), new Date(2021, 5, 7, 9, 45, 0), 161, 132],
    ]), 'trips');
    const path = join(dir, 'trips.xlsx');
    writeFileSync(path, XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));

    const sheet = await readTripSheet(path);
    expect(sheet.type).toBe('SUCCESS');
    if (sheet.type !== 'SUCCESS') return;
    expect([...decodeTripRecords(sheet.value)]).toEqual([{ type: 'SUCCESS', value: MONDAY_TRIP }]);
  });

  it('reads CSV text without reinterpreting it', async () => {
    const path = join(dir, 'trips.csv');
    writeFileSync(path, [
      'tpep_pickup_datetime,tpep_dropoff_datetime,PULocationID,DOLocationID',
      '2021-06-07 09:15:00,2021-06-07 09:45:00,161,132',
    ].join('\n'));

    const sheet = await readTripSheet(path);
    expect(sheet.type).toBe('SUCCESS');
    if (sheet.type !== 'SUCCESS') return;
    expect([...decodeTripRecords(sheet.value)]).toEqual([{
      type: 'SUCCESS',
      value: { row: 1, pickupTime: '2021-06-07 09:15:00', dropoffTime: '2021-06-07 09:45:00', pickupZone: 161, dropoffZone: 132 },
    }]);
  });

  it('reports a missing file as a decode error', async () => {
    const path = join(dir, 'missing.csv');
    const result = await readTripSheet(path);
    expect(result.type).toBe('ERROR');
    if (result.type !== 'ERROR') return;
    expect(result.error).toBeInstanceOf(SourceDecodeError);
    expect(result.error.message.startsWith(`Failed to read ${path}: `)).toBe(true);
  });
});

describe('streamCsvTripRecords', () => {
  const dir = mkdtempSync(join(tmpdir(), 'trip-stream-'));
  afterAll(() => rmSync(dir, { recursive: true, force: true }));

  const csvFile = (name: string, lines: string[], eol = '\n') => {
    const path = join(dir, name);
    writeFileSync(path, lines.join(eol));
    return path;
  };

  it('yields records in file order, numbering rows from the header', async () => {
    const path = csvFile('yellow.csv', [
      '\uFEFFVendorID,"zone, name",tpep_pickup_datetime,tpep_dropoff_datetime,PULocationID,DOLocationID',
      '1,"Murray Hill, Manhattan",2021-06-07 09:15:00,2021-06-07 09:45:00,161,132',
      '',
      '2,Kips Bay,2021-06-05 10:00:00,2021-06-05 10:30:00,90,132',
    ], '\r\n');

    expect(await collect(streamCsvTripRecords(path))).toEqual([
      { type: 'SUCCESS', value: MONDAY_TRIP },
      {
        type: 'SUCCESS',
        value: { row: 3, pickupTime: '2021-06-05 10:00:00', dropoffTime: '2021-06-05 10:30:00', pickupZone: 90, dropoffZone: 132 },
      },
    ]);
  });

  it('treats blank cells as missing', async () => {
    const path = csvFile('gaps.csv', [
      'tpep_pickup_datetime,tpep_dropoff_datetime,PULocationID,DOLocationID',
      '2021-06-07 09:15:00, ,161,132',
    ]);

    const [only] = await collect(streamCsvTripRecords(path));
    expect(only.type === 'ERROR' && only.error.message).toBe('Row 1: dropoffTime: Required');
  });

  it('stops after a header without the trip columns', async () => {
    const path = csvFile('headerless.csv', [
      'tpep_pickup_datetime,tpep_dropoff_datetime,PULocationID',
      '2021-06-07 09:15:00,2021-06-07 09:45:00,161',
    ]);

    const outcomes = await collect(streamCsvTripRecords(path));
    expect(outcomes).toHaveLength(1);
    const [only] = outcomes;
    expect(only.type === 'ERROR' && only.error.message).toBe('Missing required column(s): dolocationid');
  });

  it('reports a file without a header', async () => {
    const path = csvFile('empty.csv', ['', '']);
    const [only] = await collect(streamCsvTripRecords(path));
    expect(only.type === 'ERROR' && only.error.message).toBe(`No rows found in ${path}`);
  });

  it('reports a missing file as a decode error', async () => {
    const path = join(dir, 'missing.csv');
    const outcomes = await collect(streamCsvTripRecords(path));
    expect(outcomes).toHaveLength(1);
    const [only] = outcomes;
    expect(only.type).toBe('ERROR');
    if (only.type !== 'ERROR') return;
    expect(only.error).toBeInstanceOf(SourceDecodeError);
    expect(only.error.message.startsWith(`Failed to read ${path}: `)).toBe(true);
  });

  it('can be abandoned after the first record', async () => {
    const path = csvFile('long.csv', [
      'tpep_pickup_datetime,tpep_dropoff_datetime,PULocationID,DOLocationID',
      '2021-06-07 09:15:00,2021-06-07 09:45:00,161,132',
      '2021-06-07 10:15:00,2021-06-07 10:45:00,161,132',
    ]);

    const records = streamCsvTripRecords(path);
    expect(await records.next()).toEqual({ done: false, value: { type: 'SUCCESS', value: MONDAY_TRIP } });
    expect(await records.return(undefined)).toEqual({ done: true, value: undefined });
    expect(await records.next()).toEqual({ done: true, value: undefined });
  });
});

describe('openTripSource', () => {
  it.each([
    ['trips.xlsx', true],
    ['TRIPS.XLS', true],
    ['trips.ods', true],
    ['trips.csv', false],
    ['trips', false],
  ])('treats %s as a workbook: %s', (path, expected) => {
    expect(isWorkbookPath(path)).toBe(expected);
  });

  it('reads a missing workbook as a decode error', async () => {
    const path = join(tmpdir(), 'no-such-trips.xlsx');
    const [only] = await collect(openTripSource(path));
    expect(only.type === 'ERROR' && only.error.message.startsWith(`Failed to read ${path}: `)).toBe(true);
  });
});
