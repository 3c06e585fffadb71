export * from './errors.js';
export {
  loadRecords,
  locateRecord,
  listRecords,
  extractInstruction,
  type LocatedRecord,
  type RecordSummary,
  type LocateOptions,
} from './records.js';
