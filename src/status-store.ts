import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  StatusLoadError,
  StatusPersistError,
  errorCode,
  errorMessage,
} from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import {
  emptyStatusDocument,
  statusDocumentSchema,
  type RunResult,
  type StatusDocument,
} from "./types.js";

// JSON has no representation for these; store their string form instead of
// failing the whole write.
function coerceUnrepresentable(_key: string, value: unknown): unknown {
  switch (typeof value) {
    case "bigint":
    case "symbol":
    case "function":
      return String(value);
    default:
      return value;
  }
}

export function serializeStatus(doc: StatusDocument): string {
  return JSON.stringify(doc, coerceUnrepresentable, 2) + "\n";
}

/**
 * The durable status document (status.json): the latest RunResult per job
 * plus run counters. Read at batch start, mutated in memory, written once at
 * batch end.
 */
export class StatusStore {
  private doc: StatusDocument = emptyStatusDocument();
  private readonly logger: Logger;

  constructor(
    public readonly file: string,
    { logger }: { logger?: Logger } = {},
  ) {
    this.logger = logger ?? new NullLogger();
  }

  get document(): StatusDocument {
    return this.doc;
  }

  // Never throws; anything unreadable falls back to the empty document.
  async load(): Promise<StatusDocument> {
    let text: string;
    try {
      text = await readFile(this.file, "utf8");
    } catch (err) {
      if (errorCode(err) !== "ENOENT") {
        this.reportLoadFailure(
          new StatusLoadError(
            `Failed to read status: ${errorMessage(err)}`,
            { file: this.file },
            { cause: err },
          ),
        );
      }
      this.doc = emptyStatusDocument();
      return this.doc;
    }

    try {
      const parsed = statusDocumentSchema.safeParse(JSON.parse(text));
      if (!parsed.success) {
        throw new StatusLoadError(
          `Status document has unexpected shape: ${parsed.error.issues
            .map((i) => `${i.path.join(".")}: ${i.message}`)
            .join("; ")}`,
          { file: this.file },
        );
      }
      this.doc = parsed.data;
    } catch (err) {
      this.reportLoadFailure(
        err instanceof StatusLoadError
          ? err
          : new StatusLoadError(
              `Failed to parse status: ${errorMessage(err)}`,
              { file: this.file },
              { cause: err },
            ),
      );
      this.doc = emptyStatusDocument();
    }
    return this.doc;
  }

  recordRun(result: RunResult): void {
    this.doc.jobs[result.name] = result;
  }

  finalizeRun(batchStart: Date, successful: number, failed: number): void {
    this.doc.last_run = batchStart.toISOString();
    this.doc.total_runs += 1;
    this.doc.last_summary = {
      successful,
      failed,
      total: successful + failed,
    };
  }

  /**
   * Write the document next to its destination, then rename it into place so
   * a reader never sees a half-written file. Resolves false (after logging)
   * when the write fails.
   */
  async persist(): Promise<boolean> {
    const tmp = `${this.file}.${process.pid}.tmp`;
    try {
      await mkdir(path.dirname(this.file), { recursive: true });
      await writeFile(tmp, serializeStatus(this.doc));
      await rename(tmp, this.file);
      return true;
    } catch (err) {
      const failure = new StatusPersistError(
        `Failed to save status: ${errorMessage(err)}`,
        { file: this.file },
        { cause: err },
      );
      this.logger.error(failure.message, { kind: failure.kind, ...failure.context });
      await rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.debug("failed to remove temporary status file", {
          file: tmp,
          error: errorMessage(cleanupErr),
        });
      });
      return false;
    }
  }

  private reportLoadFailure(err: StatusLoadError): void {
    this.logger.error(err.message, { kind: err.kind, ...err.context });
  }
}
