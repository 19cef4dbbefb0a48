/**
 * Shaper
 * Flattens raw character records into fixed-column rows
 */
import { CharacterRow, Dataset, RawRecord } from './types/data';
import { MalformedRecordError } from './errors';
import { isNonNegativeInteger, isRecord } from './utils/type-guards';

/**
 * Output columns, in order
 */
export const CHARACTER_COLUMNS = [
  'id',
  'name',
  'description',
  'comics',
  'series',
  'stories',
  'events'
] as const;

/**
 * Counter groups reduced to their `available` count
 */
export const COUNTER_FIELDS = ['comics', 'series', 'stories', 'events'] as const;

type CounterField = typeof COUNTER_FIELDS[number];

/**
 * @param index position in the input, reported in errors
 * @throws MalformedRecordError naming the first offending field
 */
export function shapeRecord(record: RawRecord, index?: number): CharacterRow {
  if (!isRecord(record)) {
    throw new MalformedRecordError('record', index);
  }

  const { id, name, description } = record;
  if (typeof id !== 'number' || !Number.isInteger(id)) {
    throw new MalformedRecordError('id', index);
  }
  if (typeof name !== 'string') {
    throw new MalformedRecordError('name', index);
  }
  // upstream sends null for characters without a description
  const text = description ?? '';
  if (typeof text !== 'string') {
    throw new MalformedRecordError('description', index);
  }

  return Object.freeze({
    id,
    name,
    description: text,
    comics: readCounter(record, 'comics', index),
    series: readCounter(record, 'series', index),
    stories: readCounter(record, 'stories', index),
    events: readCounter(record, 'events', index)
  });
}

/**
 * Shapes every record, 1:1 and order preserving
 * @returns frozen dataset of frozen rows
 */
export function shapeRecords(records: readonly RawRecord[]): Dataset {
  return Object.freeze(records.map((record, index) => shapeRecord(record, index)));
}

function readCounter(record: RawRecord, field: CounterField, index?: number): number {
  const group = record[field];
  if (!isRecord(group) || !isNonNegativeInteger(group.available)) {
    throw new MalformedRecordError(field, index);
  }
  return group.available;
}
