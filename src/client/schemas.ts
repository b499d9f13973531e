/**
 * Wire Schemas
 *
 * zod schemas for the agent service's JSON payloads and converters into
 * the domain types. Unknown fields are dropped; missing required fields
 * fail validation.
 */

import { z } from "zod";
import type { ToolCallRequest } from "../approval/types.js";
import type { Agent, RequiredAction, Run, RunStep, RunStepPage, StepToolCall, ThreadMessage } from "./types.js";

export const RunStatusSchema = z.enum([
  "queued",
  "in_progress",
  "requires_action",
  "cancelling",
  "completed",
  "failed",
  "cancelled",
  "expired",
]);

const RequiredToolCallSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string(),
  arguments: z.string().nullish(),
  server_label: z.string().nullish(),
});

const RequiredActionSchema = z.object({
  type: z.string(),
  submit_tool_approval: z
    .object({
      tool_calls: z.array(RequiredToolCallSchema),
    })
    .nullish(),
});

const LastErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
});

export const RunWireSchema = z.object({
  id: z.string(),
  thread_id: z.string(),
  assistant_id: z.string(),
  status: RunStatusSchema,
  required_action: RequiredActionSchema.nullish(),
  last_error: LastErrorSchema.nullish(),
});
export type RunWire = z.infer<typeof RunWireSchema>;

const StepToolCallWireSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string().nullish(),
  arguments: z.unknown().optional(),
  output: z.unknown().optional(),
  server_label: z.string().nullish(),
  function: z
    .object({
      name: z.string().nullish(),
      arguments: z.unknown().optional(),
      output: z.unknown().optional(),
    })
    .nullish(),
});

const ActivitySchema = z.object({
  id: z.string().nullish(),
  tools: z.record(z.unknown()).nullish(),
});

export const RunStepWireSchema = z.object({
  id: z.string(),
  type: z.string(),
  status: z.string(),
  created_at: z.number().nullish(),
  step_details: z
    .object({
      type: z.string(),
      tool_calls: z.array(StepToolCallWireSchema).nullish(),
      activities: z.array(ActivitySchema).nullish(),
    })
    .nullish(),
});
export type RunStepWire = z.infer<typeof RunStepWireSchema>;

export const RunStepListSchema = z.object({
  data: z.array(RunStepWireSchema),
  has_more: z.boolean(),
  last_id: z.string().nullish(),
});

const MessageContentSchema = z.object({
  type: z.string(),
  text: z.object({ value: z.string() }).nullish(),
});

export const MessageWireSchema = z.object({
  id: z.string(),
  role: z.enum(["user", "assistant"]),
  content: z.array(MessageContentSchema),
});
export type MessageWire = z.infer<typeof MessageWireSchema>;

export const MessageListSchema = z.object({
  data: z.array(MessageWireSchema),
});

export const AgentWireSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  model: z.string(),
});

export const ThreadWireSchema = z.object({
  id: z.string(),
});

/**
 * MCP arguments arrive as a JSON string. Anything that is not a JSON
 * object is kept under `raw`.
 */
export function parseToolArguments(value: string | null | undefined): Record<string, unknown> {
  if (value === null || value === undefined || value.trim() === "") {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return { raw: value };
  }
  if (isPlainObject(parsed)) {
    return parsed;
  }
  return { raw: value };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toRequiredAction(wire: z.infer<typeof RequiredActionSchema>): RequiredAction {
  if (wire.type === "submit_tool_approval" && wire.submit_tool_approval) {
    const toolCalls: ToolCallRequest[] = wire.submit_tool_approval.tool_calls.map((call) => ({
      id: call.id,
      name: call.name,
      arguments: parseToolArguments(call.arguments),
      ...(call.server_label ? { serverLabel: call.server_label } : {}),
    }));
    return { type: "submit_tool_approval", toolCalls };
  }
  return { type: "unsupported", actionType: wire.type, raw: wire };
}

export function toRun(wire: RunWire): Run {
  return {
    id: wire.id,
    threadId: wire.thread_id,
    agentId: wire.assistant_id,
    status: wire.status,
    ...(wire.required_action ? { requiredAction: toRequiredAction(wire.required_action) } : {}),
    ...(wire.last_error ? { lastError: { code: wire.last_error.code, message: wire.last_error.message } } : {}),
  };
}

function toStepToolCall(wire: z.infer<typeof StepToolCallWireSchema>): StepToolCall {
  const fn = wire.function;
  const name = wire.name ?? fn?.name ?? undefined;
  const args = wire.arguments !== undefined ? wire.arguments : fn?.arguments;
  const output = wire.output !== undefined ? wire.output : fn?.output;

  return {
    id: wire.id,
    type: wire.type,
    ...(name !== undefined ? { name } : {}),
    ...(args !== undefined ? { arguments: args } : {}),
    ...(output !== undefined ? { output } : {}),
    ...(wire.server_label ? { serverLabel: wire.server_label } : {}),
  };
}

export function toRunStep(wire: RunStepWire): RunStep {
  const details = wire.step_details;
  const toolCalls: StepToolCall[] = (details?.tool_calls ?? []).map(toStepToolCall);

  // Activity steps list the tools they used by name only.
  for (const activity of details?.activities ?? []) {
    for (const [name, args] of Object.entries(activity.tools ?? {})) {
      toolCalls.push({ id: activity.id ?? `${wire.id}/${name}`, type: "activity", name, arguments: args });
    }
  }

  return {
    id: wire.id,
    type: wire.type,
    status: wire.status,
    ...(typeof wire.created_at === "number" ? { createdAt: new Date(wire.created_at * 1000) } : {}),
    toolCalls,
  };
}

export function toRunStepPage(wire: z.infer<typeof RunStepListSchema>): RunStepPage {
  return {
    steps: wire.data.map(toRunStep),
    hasMore: wire.has_more,
    ...(wire.last_id ? { lastId: wire.last_id } : {}),
  };
}

/**
 * Text of the last text part of a message, or null if it has none.
 */
export function messageText(wire: MessageWire): string | null {
  const parts = wire.content.flatMap((part) => (part.type === "text" && part.text ? [part.text.value] : []));
  return parts.length > 0 ? (parts[parts.length - 1] ?? null) : null;
}

export function toThreadMessage(wire: MessageWire): ThreadMessage {
  return { id: wire.id, role: wire.role, text: messageText(wire) ?? "" };
}

export function toAgent(wire: z.infer<typeof AgentWireSchema>): Agent {
  return { id: wire.id, name: wire.name ?? "", model: wire.model };
}
