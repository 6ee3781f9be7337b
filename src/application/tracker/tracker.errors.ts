export type TrackerErrorCode = "backend_unavailable" | "unknown_worker" | "store_closed";

export type TrackerErrorContext = {
  operation?: string;
  workerId?: number;
};

type ErrorWithCause = Error & { cause?: unknown };

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class TrackerError extends Error {
  readonly code: TrackerErrorCode;
  readonly context: TrackerErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: TrackerErrorCode; message: string; context?: TrackerErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "TrackerError";
    this.code = args.code;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The shared store could not be reached. The only tracker failure callers should retry.
 */
export class BackendUnavailableError extends TrackerError {
  constructor(args: { message: string; context?: TrackerErrorContext; cause?: unknown }) {
    super({ code: "backend_unavailable", ...args });
    this.name = "BackendUnavailableError";
  }
}

export class UnknownWorkerError extends TrackerError {
  constructor(workerId: number) {
    super({
      code: "unknown_worker",
      message: `Worker ${workerId} is not registered`,
      context: { workerId }
    });
    this.name = "UnknownWorkerError";
  }
}

export const isBackendUnavailable = (err: unknown): err is BackendUnavailableError =>
  err instanceof BackendUnavailableError;

export const wrapBackendFailure = (reason: unknown, operation: string): BackendUnavailableError => {
  const cause = reason instanceof Error ? (reason as ErrorWithCause).cause ?? reason : reason;
  return new BackendUnavailableError({
    message: `Tracker backend unavailable during ${operation}: ${toErrorMessage(reason)}`,
    context: { operation },
    cause
  });
};
