export class AutomationError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** A local input could not be staged (missing, unreadable or a bad archive). */
export class StagingError extends AutomationError {}

/** `aws s3 sync` exited non-zero. */
export class SyncError extends AutomationError {}

/** `aws s3 rm` exited non-zero or was asked to delete a whole bucket. */
export class DeleteError extends AutomationError {}

export class NotFoundError extends AutomationError {}

/** An image handler could not find its input or its script failed. */
export class PackagingError extends AutomationError {}

export class UsageError extends AutomationError {}

export class ConfigError extends AutomationError {}

export function exitCodeOf(code: number | null): number {
  return code === null || code === 0 ? 1 : code;
}

export function locationMessage(...parts: string[]): string {
  return [...parts, "Are we in the right place?"].join(" ");
}

export function cantProceedMessage(...parts: string[]): string {
  return [...parts, "Nothing to do."].join(" ");
}
