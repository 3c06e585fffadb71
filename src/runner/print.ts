import {
  isTrajviewError,
  listRecords,
  loadRecords,
  locateRecord,
  type LocatedRecord,
  type RecordSummary,
} from "../locator/index.js";
import {
  createStyler,
  renderConversation,
  truncate,
  type CompactOptions,
  type Styler,
} from "../render/index.js";

const PREVIEW_LENGTH = 60;

export type OutputSink = (text: string) => void;

export interface PrintOptions {
  filePath: string;
  color?: boolean;
  /** Receives one line group at a time; defaults to stdout */
  out?: OutputSink;
  onDebug?: (message: string) => void;
}

export interface PrintConversationOptions extends PrintOptions {
  taskId: number;
  trial: number;
  width?: number;
  compact?: CompactOptions;
}

const stdoutSink: OutputSink = (text) => {
  process.stdout.write(`${text}\n`);
};

/**
 * Run `load` and report a TrajviewError as a single error line.
 * Returns undefined when an error was reported.
 */
function guard<T>(load: () => T, out: OutputSink, style: Styler): T | undefined {
  try {
    return load();
  } catch (err) {
    if (!isTrajviewError(err)) {
      throw err;
    }
    out(style(`[error] ${err.message}`, "error"));
    return undefined;
  }
}

/**
 * Load a results file, select one record and print it as a transcript.
 * Data problems are printed, not thrown; the return value says whether
 * the transcript was printed.
 */
export function printConversation(options: PrintConversationOptions): boolean {
  const out = options.out ?? stdoutSink;
  const color = options.color ?? false;
  const style = createStyler(color);

  const located = guard<LocatedRecord>(() => {
    const data = loadRecords(options.filePath, { onDebug: options.onDebug });
    return locateRecord(data, options.taskId, options.trial, { onDebug: options.onDebug });
  }, out, style);
  if (!located) {
    return false;
  }

  for (const group of renderConversation(located, {
    width: options.width,
    color,
    compact: options.compact,
    onDebug: options.onDebug,
  })) {
    out(group);
  }
  return true;
}

/**
 * One line per record: key, turn count and an instruction preview
 */
export function formatRecordSummary(summary: RecordSummary, style: Styler): string {
  const line = `task_id=${summary.taskId} trial=${summary.trial} turns=${summary.turnCount}`;
  if (!summary.instruction) {
    return line;
  }
  const preview = truncate(summary.instruction.split("\n")[0], PREVIEW_LENGTH);
  return `${line}  ${style(preview, "dim")}`;
}

/**
 * Print a summary line for every record in a results file
 */
export function printRecordList(options: PrintOptions): boolean {
  const out = options.out ?? stdoutSink;
  const style = createStyler(options.color ?? false);

  const summaries = guard(
    () => listRecords(loadRecords(options.filePath, { onDebug: options.onDebug })),
    out,
    style
  );
  if (!summaries) {
    return false;
  }

  for (const summary of summaries) {
    out(formatRecordSummary(summary, style));
  }
  return true;
}
