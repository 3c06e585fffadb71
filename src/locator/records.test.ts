import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  EmptyTrajectoryError,
  FileNotFoundError,
  JsonParseError,
  NotFoundError,
  StructuralError,
  TrajviewError,
} from './errors.js';
import { extractInstruction, listRecords, loadRecords, locateRecord } from './records.js';

const records = [
  'not a record',
  {
    task_id: 1,
    trial: 0,
    info: { task: { instruction: 'Change my reservation' } },
    traj: [
      { role: 'system', content: 'policy' },
      { role: 'user', content: 'hi' },
    ],
  },
  { task_id: 1, trial: 1, traj: [{ role: 'user', content: 'second trial' }] },
  { task_id: 1, trial: 1, traj: [{ role: 'user', content: 'duplicate' }] },
  { task_id: 2, trial: 0, traj: [] },
  { task_id: 3, trial: 0 },
  { task_id: 4, trial: 0, traj: [{ role: 7 }] },
];

describe('locateRecord', () => {
  it('finds the matching record with its turns and instruction', () => {
    const located = locateRecord(records, 1, 0);
    expect(located.taskId).toBe(1);
    expect(located.trial).toBe(0);
    expect(located.index).toBe(1);
    expect(located.turns).toHaveLength(2);
    expect(located.turns[1].content).toBe('hi');
    expect(located.instruction).toBe('Change my reservation');
  });

  it('returns the first match when keys repeat', () => {
    const located = locateRecord(records, 1, 1);
    expect(located.index).toBe(2);
    expect(located.turns[0].content).toBe('second trial');
    expect(located.instruction).toBeUndefined();
  });

  it('keeps unknown turn fields', () => {
    const located = locateRecord(
      [{ task_id: 5, trial: 0, traj: [{ role: 'user', content: 'x', ts: 12 }] }],
      5,
      0
    );
    expect(located.turns[0].ts).toBe(12);
  });

  it('throws NotFoundError when no record matches', () => {
    expect(() => locateRecord(records, 9, 0)).toThrow(NotFoundError);
    expect(() => locateRecord(records, 9, 0)).toThrow('No record found for task_id=9, trial=0.');
  });

  it('throws EmptyTrajectoryError for an empty or missing traj', () => {
    expect(() => locateRecord(records, 2, 0)).toThrow(EmptyTrajectoryError);
    expect(() => locateRecord(records, 3, 0)).toThrow("No 'traj' found in the selected record.");
  });

  it('throws StructuralError when the top level is not a list', () => {
    expect(() => locateRecord({ task_id: 1 }, 1, 0)).toThrow(StructuralError);
    expect(() => locateRecord({ task_id: 1 }, 1, 0)).toThrow('Expected a list at JSON top level.');
  });

  it('throws StructuralError naming the bad turn field', () => {
    expect(() => locateRecord(records, 4, 0)).toThrow(/traj\.0\.role: Expected string/);
  });

  it('does not match on stringly-typed keys', () => {
    expect(() => locateRecord([{ task_id: '1', trial: 0, traj: [{ role: 'user' }] }], 1, 0)).toThrow(
      NotFoundError
    );
  });

  it('reports the match through the debug callback', () => {
    const messages: string[] = [];
    locateRecord(records, 1, 0, { onDebug: (m) => messages.push(m) });
    expect(messages).toEqual(['[Locate] task_id=1, trial=0 is record #1 of 7']);
  });
});

describe('extractInstruction', () => {
  it('returns undefined when any part of the path is missing', () => {
    expect(extractInstruction({})).toBeUndefined();
    expect(extractInstruction({ info: null })).toBeUndefined();
    expect(extractInstruction({ info: { task: {} } })).toBeUndefined();
  });

  it('ignores non-string and empty instructions', () => {
    expect(extractInstruction({ info: { task: { instruction: 42 } } })).toBeUndefined();
    expect(extractInstruction({ info: { task: { instruction: '' } } })).toBeUndefined();
  });
});

describe('listRecords', () => {
  it('summarizes record-shaped entries in order', () => {
    expect(listRecords(records)).toEqual([
      { taskId: 1, trial: 0, turnCount: 2, instruction: 'Change my reservation' },
      { taskId: 1, trial: 1, turnCount: 1, instruction: undefined },
      { taskId: 1, trial: 1, turnCount: 1, instruction: undefined },
      { taskId: 2, trial: 0, turnCount: 0, instruction: undefined },
      { taskId: 3, trial: 0, turnCount: 0, instruction: undefined },
      { taskId: 4, trial: 0, turnCount: 1, instruction: undefined },
    ]);
  });

  it('throws StructuralError when the top level is not a list', () => {
    expect(() => listRecords('nope')).toThrow(StructuralError);
  });
});

describe('loadRecords', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'trajview-records-'));
    writeFileSync(join(dir, 'results.json'), JSON.stringify([{ task_id: 1, trial: 0, traj: [] }]));
    writeFileSync(join(dir, 'broken.json'), '[{"task_id": 1,');
    mkdirSync(join(dir, 'folder.json'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('decodes the file contents', () => {
    expect(loadRecords(join(dir, 'results.json'))).toEqual([{ task_id: 1, trial: 0, traj: [] }]);
  });

  it('throws FileNotFoundError for a missing path', () => {
    const missing = join(dir, 'missing.json');
    expect(() => loadRecords(missing)).toThrow(FileNotFoundError);
    expect(() => loadRecords(missing)).toThrow(`File not found: ${missing}`);
  });

  it('treats a directory as not found', () => {
    expect(() => loadRecords(join(dir, 'folder.json'))).toThrow(FileNotFoundError);
  });

  it('throws JsonParseError for invalid JSON', () => {
    expect(() => loadRecords(join(dir, 'broken.json'))).toThrow(JsonParseError);
    expect(() => loadRecords(join(dir, 'broken.json'))).toThrow(/^Failed to parse JSON: /);
  });

  it('tags every error with its kind', () => {
    try {
      loadRecords(join(dir, 'missing.json'));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TrajviewError);
      expect((err as TrajviewError).kind).toBe('FileNotFound');
    }
  });
});
