import { isAssistantTurn, type ToolCall, type Turn } from "../types/index.js";
import { compactArgs, type CompactOptions } from "./compact.js";

export interface CallInfo {
  name: string;
  /** Compacted arguments, "" when the call had none */
  args: string;
}

export type CallIndex = Map<string, CallInfo>;

/**
 * Identifier of a tool call; producers use either `id` or `tool_call_id`
 */
export function toolCallId(call: ToolCall): string | undefined {
  return call.id || call.tool_call_id || undefined;
}

/**
 * Map every tool-call id issued by an assistant turn to its function name
 * and compacted arguments. Must run over the whole trajectory before
 * rendering, since tool turns point back at earlier assistant turns.
 * A repeated id keeps the last call seen.
 */
export function buildCallIndex(turns: Turn[], options: CompactOptions = {}): CallIndex {
  const index: CallIndex = new Map();

  for (const turn of turns) {
    if (!isAssistantTurn(turn)) {
      continue;
    }
    for (const call of turn.tool_calls ?? []) {
      if (!call) {
        continue;
      }
      const id = toolCallId(call);
      if (!id) {
        continue;
      }
      index.set(id, {
        name: call.function?.name ?? "",
        args: compactArgs(call.function?.arguments, options),
      });
    }
  }

  return index;
}
