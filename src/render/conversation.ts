import type { LocatedRecord } from "../locator/index.js";
import { isUserTurn, type Turn } from "../types/index.js";
import { buildCallIndex } from "./call-index.js";
import type { CompactOptions } from "./compact.js";
import { createStyler, type Styler } from "./palette.js";
import { renderTurn } from "./turn.js";
import { indent, wrapText } from "./wrap.js";

export const DEFAULT_WIDTH = 100;

export interface RenderOptions {
  /** Wrap width; zero or negative disables wrapping */
  width?: number;
  color?: boolean;
  compact?: CompactOptions;
  onDebug?: (message: string) => void;
}

/**
 * Index of the first user turn, or 0 when there is none
 */
export function findStartIndex(turns: Turn[]): number {
  const index = turns.findIndex(isUserTurn);
  return index === -1 ? 0 : index;
}

function* renderHeader(
  record: Pick<LocatedRecord, "taskId" | "trial" | "instruction">,
  width: number,
  style: Styler
): Generator<string> {
  const title = `Conversation — task_id=${record.taskId}, trial=${record.trial}`;
  const rule = style("─".repeat(title.length), "meta");

  yield style(title, "bold");
  yield rule;

  if (record.instruction) {
    yield style("[instruction]", "bold");
    yield indent(wrapText(record.instruction, width));
    yield rule;
  }
}

/**
 * Render a located record as line groups, in output order.
 * The call index is built over every turn before the first group is produced.
 */
export function* renderConversation(
  record: Pick<LocatedRecord, "taskId" | "trial" | "instruction" | "turns">,
  options: RenderOptions = {}
): Generator<string> {
  const width = options.width ?? DEFAULT_WIDTH;
  const style = createStyler(options.color ?? false);
  const debug = options.onDebug ?? (() => {});

  const callIndex = buildCallIndex(record.turns, options.compact);
  debug(`[Index] ${callIndex.size} tool call(s) indexed`);

  yield* renderHeader(record, width, style);

  const start = findStartIndex(record.turns);
  if (start > 0) {
    debug(`[Render] Skipping ${start} turn(s) before the first user turn`);
  }

  for (const turn of record.turns.slice(start)) {
    yield* renderTurn(turn, callIndex, { width, style, compact: options.compact });
  }
}

/**
 * Render to a single string, one line group per line
 */
export function renderConversationText(
  record: Pick<LocatedRecord, "taskId" | "trial" | "instruction" | "turns">,
  options: RenderOptions = {}
): string {
  return [...renderConversation(record, options)].join("\n");
}
