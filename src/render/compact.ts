import { parseTree, type Node, type ParseError } from "jsonc-parser";

export const DEFAULT_MAX_LENGTH = 200;
export const DEFAULT_MAX_VALUE_LENGTH = 80;

const ELLIPSIS = "…";

export interface CompactOptions {
  /** Cap for the whole compacted string */
  maxLength?: number;
  /** Cap for each re-encoded value */
  maxValueLength?: number;
}

/**
 * Cut text to at most maxLength code points, marking the cut with an ellipsis
 */
export function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }
  return chars.slice(0, Math.max(maxLength - 1, 0)).join("") + ELLIPSIS;
}

/**
 * Parse strict JSON into a tree that keeps members in source order.
 * Any syntax error (trailing text, comments, trailing commas) yields undefined.
 */
function parseJson(text: string): Node | undefined {
  const errors: ParseError[] = [];
  const root = parseTree(text, errors, {
    disallowComments: true,
    allowTrailingComma: false,
    allowEmptyContent: false,
  });
  return errors.length === 0 ? root : undefined;
}

// A repeated key keeps its first position and takes the last value
function objectMembers(node: Node): Map<string, Node> {
  const members = new Map<string, Node>();
  for (const property of node.children ?? []) {
    const [key, value] = property.children ?? [];
    if (key !== undefined && value !== undefined) {
      members.set(String(key.value), value);
    }
  }
  return members;
}

function sourceText(node: Node, source: string): string {
  return source.slice(node.offset, node.offset + node.length);
}

/**
 * Re-encode a node with `, ` and `: ` separators. Numbers keep their
 * source digits so large integers are not rounded.
 */
function encodeNode(node: Node, source: string): string {
  switch (node.type) {
    case "object":
      return `{${[...objectMembers(node)]
        .map(([key, value]) => `${JSON.stringify(key)}: ${encodeNode(value, source)}`)
        .join(", ")}}`;
    case "array":
      return `[${(node.children ?? []).map((child) => encodeNode(child, source)).join(", ")}]`;
    case "string":
      return JSON.stringify(String(node.value));
    case "property": {
      const value = node.children?.[1];
      return value ? encodeNode(value, source) : "null";
    }
    default:
      return sourceText(node, source);
  }
}

function compactNode(root: Node, source: string, options: CompactOptions): string {
  const maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
  const maxValueLength = options.maxValueLength ?? DEFAULT_MAX_VALUE_LENGTH;
  const encode = (node: Node): string => truncate(encodeNode(node, source), maxValueLength);

  const out =
    root.type === "object"
      ? [...objectMembers(root)].map(([key, node]) => `${key}=${encode(node)}`).join(", ")
      : encode(root);

  return truncate(out, maxLength);
}

/**
 * Render an already-decoded arguments value on a single line
 */
export function compactValue(value: unknown, options: CompactOptions = {}): string {
  const source = JSON.stringify(value) ?? "null";
  const root = parseJson(source);
  return root ? compactNode(root, source, options) : "";
}

/**
 * Turn a function-call arguments payload into `key=value, ...` form.
 * Payloads that are not valid JSON fall back to the raw text on one line.
 */
export function compactArgs(
  raw: string | Record<string, unknown> | null | undefined,
  options: CompactOptions = {}
): string {
  if (raw === null || raw === undefined || raw === "") {
    return "";
  }
  if (typeof raw !== "string") {
    return compactValue(raw, options);
  }

  const root = parseJson(raw);
  if (root === undefined) {
    return truncate(raw.replaceAll("\n", " "), options.maxLength ?? DEFAULT_MAX_LENGTH);
  }
  return compactNode(root, raw, options);
}
