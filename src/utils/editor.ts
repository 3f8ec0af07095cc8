import { applyDiffDetailed } from "../apply-diff.js";
import { log } from "./logger/log.js";
import fs from "fs";
import path from "path";

export type CreateFileOperation = {
  type: "create_file";
  path: string;
  diff: string;
};

export type UpdateFileOperation = {
  type: "update_file";
  path: string;
  diff: string;
};

export type DeleteFileOperation = {
  type: "delete_file";
  path: string;
};

export type ApplyPatchOperation =
  | CreateFileOperation
  | UpdateFileOperation
  | DeleteFileOperation;

export type ApplyPatchResult = {
  status?: "completed" | "failed";
  output?: string;
};

/**
 * Owns everything around the diff engine: path resolution, reading and
 * writing. Implementations may be synchronous or not.
 */
export interface ApplyPatchEditor {
  createFile(
    operation: CreateFileOperation,
  ): ApplyPatchResult | Promise<ApplyPatchResult>;
  updateFile(
    operation: UpdateFileOperation,
  ): ApplyPatchResult | Promise<ApplyPatchResult>;
  deleteFile(
    operation: DeleteFileOperation,
  ): ApplyPatchResult | Promise<ApplyPatchResult>;
}

/**
 * Follows symlinks in the longest existing prefix of `absolute` and appends
 * the segments that do not exist yet. A dangling symlink throws.
 */
function realpathAllowingMissing(absolute: string): string {
  const missing: Array<string> = [];
  let existing = absolute;
  while (!fs.lstatSync(existing, { throwIfNoEntry: false })) {
    const parent = path.dirname(existing);
    if (parent === existing) {
      break;
    }
    missing.unshift(path.basename(existing));
    existing = parent;
  }
  return path.join(fs.realpathSync(existing), ...missing);
}

export type FileChange = {
  /** Path relative to the workspace root, with forward slashes. */
  path: string;
  type: "create" | "update" | "delete";
  oldContent: string | null;
  newContent: string | null;
  fuzz: number;
};

export type WorkspaceEditorOptions = {
  maxFuzz?: number;
  /** Compute every change but write nothing. */
  dryRun?: boolean;
  /** Called with each change before it is written. */
  onChange?: (change: FileChange) => void;
};

export class WorkspaceEditor implements ApplyPatchEditor {
  private readonly root: string;

  constructor(
    root: string,
    private readonly options: WorkspaceEditorOptions = {},
  ) {
    this.root = fs.realpathSync(path.resolve(root));
  }

  createFile(operation: CreateFileOperation): ApplyPatchResult {
    const { absolute, relative } = this.resolve(operation.path);
    if (fs.existsSync(absolute)) {
      throw new Error(`Add File Error: File already exists: ${relative}`);
    }
    const { text } = applyDiffDetailed("", operation.diff, "create");
    this.commit(absolute, {
      path: relative,
      type: "create",
      oldContent: null,
      newContent: text,
      fuzz: 0,
    });
    return { status: "completed", output: `Created ${relative}` };
  }

  updateFile(operation: UpdateFileOperation): ApplyPatchResult {
    const { absolute, relative } = this.resolve(operation.path);
    const original = this.read(absolute, relative);
    const { text, fuzz } = applyDiffDetailed(
      original,
      operation.diff,
      "update",
      { maxFuzz: this.options.maxFuzz },
    );
    if (fuzz > 0) {
      log(`[anchor-patch] ${relative}: context matched with fuzz ${fuzz}`);
    }
    this.commit(absolute, {
      path: relative,
      type: "update",
      oldContent: original,
      newContent: text,
      fuzz,
    });
    return { status: "completed", output: `Updated ${relative}` };
  }

  deleteFile(operation: DeleteFileOperation): ApplyPatchResult {
    const { absolute, relative } = this.resolve(operation.path);
    const oldContent = fs.existsSync(absolute)
      ? fs.readFileSync(absolute, "utf8")
      : null;
    this.commit(absolute, {
      path: relative,
      type: "delete",
      oldContent,
      newContent: null,
      fuzz: 0,
    });
    return { status: "completed", output: `Deleted ${relative}` };
  }

  private resolve(p: string): { absolute: string; relative: string } {
    let absolute: string;
    try {
      absolute = realpathAllowingMissing(path.resolve(this.root, p));
    } catch (err) {
      throw new Error(`Operation outside workspace: ${p}`, { cause: err });
    }
    const relative = path.relative(this.root, absolute);
    if (
      relative === "" ||
      relative === ".." ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative)
    ) {
      throw new Error(`Operation outside workspace: ${p}`);
    }
    return { absolute, relative: relative.split(path.sep).join("/") };
  }

  private read(absolute: string, relative: string): string {
    try {
      return fs.readFileSync(absolute, "utf8");
    } catch (err) {
      throw new Error(`File not found: ${relative}`, { cause: err });
    }
  }

  private commit(absolute: string, change: FileChange): void {
    this.options.onChange?.(change);
    if (this.options.dryRun) {
      log(`[anchor-patch] dry run, not writing ${change.path}`);
      return;
    }
    if (change.newContent === null) {
      fs.rmSync(absolute, { force: true });
    } else {
      fs.mkdirSync(path.dirname(absolute), { recursive: true });
      fs.writeFileSync(absolute, change.newContent, "utf8");
    }
    log(`[anchor-patch] ${change.type} ${change.path}`);
  }
}
