export class DashError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProcessLaunchFailure extends DashError {}

export class CapabilityEnableFailure extends DashError {}

/** Caller input rejected before any request, or a payload that failed its schema. */
export class ValidationError extends DashError {}

/** Network failure or timeout talking to the Dash API. */
export class TransportError extends DashError {
  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Non-2xx response from the Dash API. `body` is kept for substring matching. */
export class UpstreamHttpError extends DashError {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly body: string,
    readonly url: string
  ) {
    super(`${status} ${statusText} for url '${url}'`);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
