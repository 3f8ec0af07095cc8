import * as fsSync from "fs";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

export interface Logger {
  log(message: string): void;
  /** Resolves once every message logged so far is on disk. */
  flush(): Promise<void>;
}

export type LoggerOptions = {
  /** Defaults to `DEBUG` being set. */
  enabled?: boolean;
  dir?: string;
  /** Log files are named `<prefix>-<timestamp>.log`. */
  prefix?: string;
};

const DEFAULT_PREFIX = "anchor-patch";

/** Appends to one file, one write at a time, in the order of `log()` calls. */
class FileLogger implements Logger {
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  log(message: string): void {
    const entry = `[${new Date().toISOString()}] ${message}\n`;
    this.pending = this.pending
      .then(() => fs.appendFile(this.filePath, entry))
      .catch((err: unknown) => {
        // The log file itself is unusable, so stderr is all that is left.
        // eslint-disable-next-line no-console
        console.error(`anchor-patch: failed to write log: ${String(err)}`);
      });
  }

  flush(): Promise<void> {
    return this.pending;
  }
}

const disabledLogger: Logger = {
  log: () => {},
  flush: () => Promise.resolve(),
};

/**
 * On Linux logs go under ~/.local so they are not world-readable; elsewhere
 * the temp dir is private to the user already.
 */
export function defaultLogDir(): string {
  return process.platform === "darwin" || process.platform === "win32"
    ? path.join(os.tmpdir(), "anchor-patch")
    : path.join(os.homedir(), ".local", "anchor-patch");
}

/** Points `<prefix>-latest.log` at the current session's file. */
function linkLatest(dir: string, prefix: string, logFile: string): void {
  if (process.platform === "win32") {
    return;
  }
  const latestLink = path.join(dir, `${prefix}-latest.log`);
  fsSync.rmSync(latestLink, { force: true });
  fsSync.symlinkSync(logFile, latestLink, "file");
}

/**
 * Creates the session log file eagerly (so it can be `tail -F`'d before
 * anything is written) or returns a no-op logger when disabled.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const enabled = options.enabled ?? Boolean(process.env["DEBUG"]);
  if (!enabled) {
    return disabledLogger;
  }

  const dir = options.dir ?? defaultLogDir();
  const prefix = options.prefix ?? DEFAULT_PREFIX;
  fsSync.mkdirSync(dir, { recursive: true });
  // Colons are not allowed in Windows file names.
  const stamp = new Date().toISOString().replace(/[:.]/g, "-");
  const logFile = path.join(dir, `${prefix}-${stamp}.log`);
  fsSync.writeFileSync(logFile, "");
  linkLatest(dir, prefix, logFile);

  return new FileLogger(logFile);
}

let logger: Logger | undefined;

/**
 * Sets up the process-wide logger. Only the first call has an effect. Run
 * with DEBUG=1 and follow `~/.local/anchor-patch/anchor-patch-latest.log`
 * (`$TMPDIR/anchor-patch/...` on macOS).
 */
export function initLogger(options: LoggerOptions = {}): Logger {
  if (!logger) {
    logger = createLogger(options);
  }
  return logger;
}

export function log(message: string): void {
  initLogger().log(message);
}

export function flushLog(): Promise<void> {
  return logger ? logger.flush() : Promise.resolve();
}
