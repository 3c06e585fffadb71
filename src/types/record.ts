import { z } from "zod";

const FunctionSchema = z.object({
  name: z.string().nullish(),
  // Usually a JSON-encoded string; some producers store the decoded object
  arguments: z.union([z.string(), z.record(z.unknown())]).nullish(),
}).passthrough();

const ToolCallSchema = z.object({
  id: z.string().nullish(),
  tool_call_id: z.string().nullish(),
  function: FunctionSchema.nullish(),
}).passthrough();

export const TurnSchema = z.object({
  role: z.string().optional(),
  content: z.string().nullish(),
  name: z.string().nullish(),
  tool_call_id: z.string().nullish(),
  tool_calls: z.array(ToolCallSchema.nullable()).nullish(),
}).passthrough();

export const TrajectorySchema = z.array(TurnSchema);

// Only the path the viewer reads; everything else under `info` is ignored
export const InstructionInfoSchema = z.object({
  task: z.object({
    instruction: z.string(),
  }),
});

export const RecordKeySchema = z.object({
  task_id: z.number().int(),
  trial: z.number().int(),
}).passthrough();

export type Turn = z.infer<typeof TurnSchema>;
export type ToolCall = z.infer<typeof ToolCallSchema>;

export type RoleKind = "system" | "user" | "assistant" | "tool" | "other";

/**
 * Classify a turn by role. A turn without a role renders as assistant output.
 */
export function roleKind(turn: Turn): RoleKind {
  const role = turn.role ?? "assistant";
  switch (role) {
    case "system":
    case "user":
    case "assistant":
    case "tool":
      return role;
    default:
      return "other";
  }
}

export function isUserTurn(turn: Turn): boolean {
  return turn.role === "user";
}

// Only an explicit assistant role issues tool calls; a missing role does not
export function isAssistantTurn(turn: Turn): boolean {
  return turn.role === "assistant";
}
