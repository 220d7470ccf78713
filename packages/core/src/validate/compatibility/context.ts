import {
  diffEntries,
  type ChangedEvent,
  type ChangedObject,
  type ChangedSchema,
} from '../../compare/model.js';
import { ElementType, type Schema } from '../../schema/model.js';

/** What compatibility rules look at: the diff and both schemas it came from. */
export interface CompatibilityContext {
  change: ChangedSchema;
  before: Schema;
  after: Schema;
}

export type RecordRoot = typeof ElementType.EVENT | typeof ElementType.OBJECT;

export interface ChangedRecord {
  name: string;
  root: RecordRoot;
  record: ChangedEvent | ChangedObject;
}

export function changedEvents(change: ChangedSchema): ChangedRecord[] {
  const records: ChangedRecord[] = [];
  for (const [name, diff] of diffEntries(change.classes)) {
    if (diff.kind === 'changed') records.push({ name, root: ElementType.EVENT, record: diff });
  }
  return records;
}

export function changedObjects(change: ChangedSchema): ChangedRecord[] {
  const records: ChangedRecord[] = [];
  for (const [name, diff] of diffEntries(change.objects)) {
    if (diff.kind === 'changed') records.push({ name, root: ElementType.OBJECT, record: diff });
  }
  return records;
}

/** Changed events, then changed objects. */
export function changedRecords(change: ChangedSchema): ChangedRecord[] {
  return [...changedEvents(change), ...changedObjects(change)];
}
