import { roleKind, type RoleKind, type ToolCall, type Turn } from "../types/index.js";
import type { CallIndex } from "./call-index.js";
import { compactArgs, type CompactOptions } from "./compact.js";
import { ROLE_STYLES, type Styler } from "./palette.js";
import { indent, wrapText } from "./wrap.js";

export const TOOL_CALLS_MARKER = "→ tool call(s): ";
export const NO_CONTENT = "(no content)";

export interface FormattedTurn {
  kind: RoleKind;
  /** Label text without styling, e.g. `[tool:lookup(x=1)]` */
  label: string;
  body: string;
}

export interface TurnRenderOptions {
  width: number;
  style: Styler;
  compact?: CompactOptions;
}

function describeCall(call: ToolCall | null, options: CompactOptions): string {
  const name = call?.function?.name ?? "<?>";
  const args = compactArgs(call?.function?.arguments, options);
  return args ? `${name}(${args})` : `${name}()`;
}

function toolLabel(turn: Turn, callIndex: CallIndex): string {
  const call = turn.tool_call_id ? callIndex.get(turn.tool_call_id) : undefined;
  const name = call?.name || turn.name || "";
  const args = call?.args ?? "";

  if (!name) {
    return "[tool]";
  }
  return args ? `[tool:${name}(${args})]` : `[tool:${name}]`;
}

/**
 * Work out the label and body text of a turn from its role
 */
export function formatTurn(
  turn: Turn,
  callIndex: CallIndex,
  options: CompactOptions = {}
): FormattedTurn {
  const kind = roleKind(turn);
  const content = turn.content ?? "";

  switch (kind) {
    case "assistant": {
      if (turn.content !== null && turn.content !== undefined) {
        return { kind, label: "[assistant]", body: turn.content };
      }
      const calls = turn.tool_calls ?? [];
      const body = calls.length > 0
        ? TOOL_CALLS_MARKER + calls.map((call) => describeCall(call, options)).join("; ")
        : "";
      return { kind, label: "[assistant]", body };
    }

    case "tool":
      return { kind, label: toolLabel(turn, callIndex), body: content };

    case "system":
    case "user":
      return { kind, label: `[${kind}]`, body: content };

    case "other":
      return { kind, label: `[${turn.role ?? ""}]`, body: content };
  }
}

/**
 * Wrap and indent a body, substituting a dimmed placeholder when it is blank
 */
export function renderBody(body: string, width: number, style: Styler): string {
  const wrapped = wrapText(body, width);
  if (wrapped.trim() === "") {
    return indent(style(NO_CONTENT, "dim"));
  }
  return indent(wrapped);
}

/**
 * Styled label line followed by the body block. The label line ends in a
 * single unstyled space.
 */
export function renderTurn(
  turn: Turn,
  callIndex: CallIndex,
  options: TurnRenderOptions
): [label: string, body: string] {
  const formatted = formatTurn(turn, callIndex, options.compact);
  return [
    `${options.style(formatted.label, ROLE_STYLES[formatted.kind])} `,
    renderBody(formatted.body, options.width, options.style),
  ];
}
