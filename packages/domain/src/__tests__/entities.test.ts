/**
 * Domain entity type contracts.
 *
 * The domain package is mostly interfaces; these tests build each entity from
 * valid data and check the few runtime constants it exports.
 */

import { describe, it, expect } from '@jest/globals';

import {
  UNKNOWN_TRIP_ID,
  KPI_REQUIRED_FIELDS,
  type TripRow,
  type TripRecord,
  type DailyKpi,
  type LogBatch,
  type AppendReceipt,
  type ObjectNotificationEvent,
} from '../index.js';

function expectType<T>(_val: T): void {
  /* compile-time assertion */
}

// ─── Factory helpers ──────────────────────────────────────────────────────────

function makeRow(overrides: Partial<TripRow> = {}): TripRow {
  return {
    trip_id: 't-1',
    pickup_datetime: '2025-04-22 08:30:00',
    fare_amount: '20.5',
    estimated_fare_amount: '19.0',
    ...overrides,
  };
}

function makeKpi(overrides: Partial<DailyKpi> = {}): DailyKpi {
  return {
    pickup_datetime: '2025-04-22T08:30:00.000Z',
    total_fare: 30,
    count_trips: 2,
    average_fare: 15,
    max_fare: 20,
    min_fare: 10,
    ...overrides,
  };
}

// ─── TripRow ──────────────────────────────────────────────────────────────────

describe('TripRow entity', () => {
  it('carries the known trip columns', () => {
    const row = makeRow();
    expect(row.trip_id).toBe('t-1');
    expect(row.fare_amount).toBe('20.5');
  });

  it('passes unknown columns through', () => {
    const row = makeRow({ vendor_id: 'V2', passenger_count: '3' });
    expect(row['vendor_id']).toBe('V2');
    expect(row['passenger_count']).toBe('3');
  });

  it('allows a row without trip_id', () => {
    const row: TripRow = { fare_amount: '7' };
    expect(row.trip_id).toBeUndefined();
  });

  it('names the fallback partition key', () => {
    expect(UNKNOWN_TRIP_ID).toBe('unknown');
  });
});

// ─── TripRecord ───────────────────────────────────────────────────────────────

describe('TripRecord entity', () => {
  it('requires an id and accepts arbitrary fields', () => {
    const record: TripRecord = { id: 't-1', fare_amount: '20.5', tip: 2 };
    expect(record.id).toBe('t-1');
    expect(record['tip']).toBe(2);
  });

  it('lists the fields fare statistics depend on', () => {
    expect(KPI_REQUIRED_FIELDS).toEqual(['fare_amount', 'estimated_fare_amount']);
  });
});

// ─── DailyKpi ─────────────────────────────────────────────────────────────────

describe('DailyKpi entity', () => {
  it('holds numeric statistics', () => {
    const kpi = makeKpi();
    expect(kpi.total_fare).toBe(30);
    expect(kpi.average_fare).toBe(15);
  });

  it('allows null statistics for a group without numeric fares', () => {
    const kpi = makeKpi({ total_fare: 0, count_trips: 0, average_fare: null, max_fare: null, min_fare: null });
    expect(kpi.count_trips).toBe(0);
    expect(kpi.max_fare).toBeNull();
    expectType<number | null>(kpi.min_fare);
  });
});

// ─── Log records ──────────────────────────────────────────────────────────────

describe('Log records', () => {
  it('acknowledges an append with its sequence number', () => {
    const receipt: AppendReceipt = { sequenceNumber: '42' };
    expect(receipt.sequenceNumber).toBe('42');
  });

  it('delivers batch payloads base64-encoded', () => {
    const batch: LogBatch = {
      Records: [
        {
          kinesis: {
            data: Buffer.from('{"trip_id":"t-1"}').toString('base64'),
            partitionKey: 't-1',
            sequenceNumber: '1',
          },
        },
      ],
    };
    const item = batch.Records[0];
    expect(item?.kinesis.data).toBe('eyJ0cmlwX2lkIjoidC0xIn0=');
  });
});

// ─── Notifications ────────────────────────────────────────────────────────────

describe('ObjectNotificationEvent', () => {
  it('names a bucket and key per record', () => {
    const event: ObjectNotificationEvent = {
      Records: [{ s3: { bucket: { name: 'trip-uploads' }, object: { key: 'uploads/rides.csv', size: 42 } } }],
    };
    expect(event.Records[0]?.s3.object.key).toBe('uploads/rides.csv');
  });
});
