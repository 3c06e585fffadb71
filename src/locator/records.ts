import { readFileSync, statSync } from 'node:fs';
import {
  InstructionInfoSchema,
  RecordKeySchema,
  TrajectorySchema,
  type Turn,
} from '../types/index.js';
import {
  EmptyTrajectoryError,
  FileNotFoundError,
  JsonParseError,
  NotFoundError,
  StructuralError,
} from './errors.js';

export interface LocatedRecord {
  taskId: number;
  trial: number;
  /** Position of the record in the top-level array */
  index: number;
  turns: Turn[];
  instruction?: string;
}

export interface RecordSummary {
  taskId: number;
  trial: number;
  turnCount: number;
  instruction?: string;
}

export interface LocateOptions {
  onDebug?: (message: string) => void;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecordList(data: unknown): unknown[] {
  if (!Array.isArray(data)) {
    throw new StructuralError('Expected a list at JSON top level.');
  }
  return data;
}

/**
 * Read and decode a results file
 */
export function loadRecords(filePath: string, options: LocateOptions = {}): unknown {
  const debug = options.onDebug ?? (() => {});
  const stat = statSync(filePath, { throwIfNoEntry: false });
  if (!stat?.isFile()) {
    throw new FileNotFoundError(filePath);
  }

  debug(`[Load] Reading ${filePath} (${stat.size} bytes)`);
  const content = readFileSync(filePath, 'utf-8');

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new JsonParseError((err as Error).message);
  }
}

/**
 * Pull `info.task.instruction` out of a record, if it is a non-empty string
 */
export function extractInstruction(record: JsonObject): string | undefined {
  const result = InstructionInfoSchema.safeParse(record.info);
  if (!result.success || result.data.task.instruction === '') {
    return undefined;
  }
  return result.data.task.instruction;
}

/**
 * Find the first record matching (taskId, trial) and validate its trajectory
 */
export function locateRecord(
  data: unknown,
  taskId: number,
  trial: number,
  options: LocateOptions = {}
): LocatedRecord {
  const debug = options.onDebug ?? (() => {});
  const records = expectRecordList(data);

  const index = records.findIndex(
    (entry) => isJsonObject(entry) && entry.task_id === taskId && entry.trial === trial
  );
  const match = records[index];
  if (index === -1 || !isJsonObject(match)) {
    throw new NotFoundError(taskId, trial);
  }
  debug(`[Locate] task_id=${taskId}, trial=${trial} is record #${index} of ${records.length}`);

  const traj = match.traj;
  if (!Array.isArray(traj) || traj.length === 0) {
    throw new EmptyTrajectoryError();
  }

  const result = TrajectorySchema.safeParse(traj);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `traj.${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new StructuralError(
      `Invalid trajectory in record task_id=${taskId}, trial=${trial}: ${errors}`
    );
  }

  return {
    taskId,
    trial,
    index,
    turns: result.data,
    instruction: extractInstruction(match),
  };
}

/**
 * Summarize every record in the collection, in document order
 */
export function listRecords(data: unknown): RecordSummary[] {
  const summaries: RecordSummary[] = [];

  for (const entry of expectRecordList(data)) {
    const key = RecordKeySchema.safeParse(entry);
    if (!key.success) {
      continue;
    }
    const traj = key.data.traj;
    summaries.push({
      taskId: key.data.task_id,
      trial: key.data.trial,
      turnCount: Array.isArray(traj) ? traj.length : 0,
      instruction: extractInstruction(key.data),
    });
  }

  return summaries;
}
