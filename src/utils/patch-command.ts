import type { ApplyPatchCallOutput } from "./apply-patch-tool.js";
import type { AppConfig } from "./config.js";
import type { ApplyPatchOperation, FileChange } from "./editor.js";

import { executeApplyPatchCall } from "./apply-patch-tool.js";
import {
  generateColoredDiff,
  generateDiffStats,
  generateFileDiff,
} from "./code-diff.js";
import { WorkspaceEditor } from "./editor.js";

export type PatchCommandMode = "update" | "create" | "delete";

export type PatchCommandOptions = {
  file: string;
  /** Ignored in delete mode. */
  patch: string;
  mode: PatchCommandMode;
  cwd: string;
  dryRun: boolean;
  preview: boolean;
  config: AppConfig;
};

function toOperation(
  mode: PatchCommandMode,
  file: string,
  patch: string,
): ApplyPatchOperation {
  switch (mode) {
    case "create":
      return { type: "create_file", path: file, diff: patch };
    case "update":
      return { type: "update_file", path: file, diff: patch };
    case "delete":
      return { type: "delete_file", path: file };
  }
}

/**
 * Applies one patch to one file the way the CLI does. Previews and dry-run
 * output go to `write`; the returned output says whether it worked.
 */
export async function runPatchCommand(
  options: PatchCommandOptions,
  write: (text: string) => void,
): Promise<ApplyPatchCallOutput> {
  const { config } = options;

  const onChange = (change: FileChange) => {
    if (options.preview) {
      const diff = generateFileDiff(
        change.oldContent ?? "",
        change.newContent ?? "",
        change.path,
        config.previewContext,
      );
      write(config.color ? generateColoredDiff(diff) : diff);
      const [added, removed] = generateDiffStats(diff);
      write(`${change.path}: +${added} -${removed}`);
    }
    if (options.dryRun && change.newContent !== null) {
      write(change.newContent);
    }
  };

  const editor = new WorkspaceEditor(options.cwd, {
    maxFuzz: config.maxFuzz,
    dryRun: options.dryRun,
    onChange,
  });

  return executeApplyPatchCall(editor, {
    type: "apply_patch_call",
    call_id: "cli",
    operation: toOperation(options.mode, options.file, options.patch),
  });
}
