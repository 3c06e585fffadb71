import pc from "picocolors";
import type { RoleKind } from "../types/index.js";

export type StyleTag = "user" | "assistant" | "tool" | "meta" | "error" | "bold" | "dim";

export type Styler = (text: string, tag: StyleTag) => string;

export const ROLE_STYLES: Record<RoleKind, StyleTag> = {
  system: "meta",
  user: "user",
  assistant: "assistant",
  tool: "tool",
  other: "meta",
};

/**
 * Build the styler for one render. With `enabled` false every tag is identity.
 */
export function createStyler(enabled: boolean): Styler {
  const colors = pc.createColors(enabled);
  const formatters: Record<StyleTag, (text: string) => string> = {
    user: colors.greenBright,
    assistant: colors.cyanBright,
    tool: colors.magentaBright,
    meta: colors.gray,
    error: colors.redBright,
    bold: colors.bold,
    dim: colors.dim,
  };
  return (text, tag) => formatters[tag](text);
}
