export type MirrorErrorKind =
  | "config-load"
  | "status-load"
  | "status-persist"
  | "history-write"
  | "job-timeout"
  | "job-execution"
  | "notification-delivery"
  | "batch-locked";

export class MirrorError extends Error {
  constructor(
    public readonly kind: MirrorErrorKind,
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MirrorError";
  }
}

export class ConfigLoadError extends MirrorError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super("config-load", message, context, options);
    this.name = "ConfigLoadError";
  }
}

export class StatusLoadError extends MirrorError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super("status-load", message, context, options);
    this.name = "StatusLoadError";
  }
}

export class StatusPersistError extends MirrorError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super("status-persist", message, context, options);
    this.name = "StatusPersistError";
  }
}

export class HistoryWriteError extends MirrorError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super("history-write", message, context, options);
    this.name = "HistoryWriteError";
  }
}

export class JobTimeoutError extends MirrorError {
  constructor(
    message: string,
    public readonly timeoutSeconds: number,
    context?: Record<string, unknown>,
  ) {
    super("job-timeout", message, context);
    this.name = "JobTimeoutError";
  }
}

export class JobExecutionError extends MirrorError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super("job-execution", message, context, options);
    this.name = "JobExecutionError";
  }
}

export class NotificationDeliveryError extends MirrorError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super("notification-delivery", message, context, options);
    this.name = "NotificationDeliveryError";
  }
}

export class BatchLockedError extends MirrorError {
  constructor(
    message: string,
    public readonly holderPid: number,
    context?: Record<string, unknown>,
  ) {
    super("batch-locked", message, context);
    this.name = "BatchLockedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}
