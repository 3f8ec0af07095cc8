import type {
  ApplyPatchEditor,
  ApplyPatchOperation,
  ApplyPatchResult,
} from "./editor.js";

import { isDiffError } from "../apply-diff.js";
import { log } from "./logger/log.js";
import { z } from "zod";

export const ApplyPatchOperationSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("create_file"),
    path: z.string().min(1),
    diff: z.string(),
  }),
  z.object({
    type: z.literal("update_file"),
    path: z.string().min(1),
    diff: z.string(),
  }),
  z.object({
    type: z.literal("delete_file"),
    path: z.string().min(1),
  }),
]);

/**
 * An `apply_patch` tool call as a model emits it. The diff carries only the
 * hunks for one file; the path says which.
 */
export const ApplyPatchCallSchema = z.object({
  type: z.literal("apply_patch_call"),
  call_id: z.string(),
  operation: ApplyPatchOperationSchema,
});

export type ApplyPatchCall = z.infer<typeof ApplyPatchCallSchema>;

export type ApplyPatchCallOutput = {
  type: "apply_patch_call_output";
  call_id: string;
  status: "completed" | "failed";
  output: string;
};

function callIdOf(call: unknown): string {
  if (
    typeof call === "object" &&
    call !== null &&
    "call_id" in call &&
    typeof call.call_id === "string"
  ) {
    return call.call_id;
  }
  return "";
}

function dispatch(
  editor: ApplyPatchEditor,
  operation: ApplyPatchOperation,
): ApplyPatchResult | Promise<ApplyPatchResult> {
  switch (operation.type) {
    case "create_file":
      return editor.createFile(operation);
    case "update_file":
      return editor.updateFile(operation);
    case "delete_file":
      return editor.deleteFile(operation);
  }
}

export function describeError(err: unknown): string {
  if (isDiffError(err)) {
    return `Patch rejected (${err.kind} error): ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs one `apply_patch` call against `editor`. Failures, including ones
 * thrown by the editor, come back as a `failed` output carrying the reason.
 */
export async function executeApplyPatchCall(
  editor: ApplyPatchEditor,
  call: unknown,
): Promise<ApplyPatchCallOutput> {
  const parsed = ApplyPatchCallSchema.safeParse(call);
  if (!parsed.success) {
    const output = `Invalid apply_patch call: ${parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ")}`;
    log(`[anchor-patch] ${output}`);
    return {
      type: "apply_patch_call_output",
      call_id: callIdOf(call),
      status: "failed",
      output,
    };
  }

  const { call_id: callId, operation } = parsed.data;
  log(`[anchor-patch] ${operation.type} ${operation.path} (call ${callId})`);

  try {
    const result = await dispatch(editor, operation);
    return {
      type: "apply_patch_call_output",
      call_id: callId,
      status: result.status ?? "completed",
      output: result.output ?? "",
    };
  } catch (err) {
    const output = describeError(err);
    log(`[anchor-patch] call ${callId} failed: ${output}`);
    return {
      type: "apply_patch_call_output",
      call_id: callId,
      status: "failed",
      output,
    };
  }
}
