import type { ExceptionDetails } from "@/runtime/remote-object";

export interface RuntimeHandleErrorContext {
  method?: string;
  executionContextId?: number;
  objectId?: string;
  cause?: unknown;
}

export class RuntimeHandleError extends Error {
  public readonly method?: string;
  public readonly executionContextId?: number;
  public readonly objectId?: string;
  public readonly cause?: unknown;

  constructor(message: string, context: RuntimeHandleErrorContext = {}) {
    super(message);
    this.name = "RuntimeHandleError";
    this.method = context.method;
    this.executionContextId = context.executionContextId;
    this.objectId = context.objectId;
    this.cause = context.cause;
  }
}

/**
 * The remote runtime threw while running the supplied function.
 */
export class EvaluationFailedError extends RuntimeHandleError {
  public readonly exceptionDetails: ExceptionDetails;

  constructor(
    message: string,
    exceptionDetails: ExceptionDetails,
    context: RuntimeHandleErrorContext = {}
  ) {
    super(`Evaluation failed: ${message}`, context);
    this.name = "EvaluationFailedError";
    this.exceptionDetails = exceptionDetails;
  }
}

export class CrossContextHandleError extends RuntimeHandleError {
  public readonly handleContextId: number;

  constructor(handleContextId: number, context: RuntimeHandleErrorContext = {}) {
    super(
      "JSHandles can be evaluated only in the context they were created!",
      context
    );
    this.name = "CrossContextHandleError";
    this.handleContextId = handleContextId;
  }
}

export class DisposedHandleUseError extends RuntimeHandleError {
  constructor(message = "JSHandle is disposed!", context: RuntimeHandleErrorContext = {}) {
    super(message, context);
    this.name = "DisposedHandleUseError";
  }
}

export class PrototypeNotObjectError extends RuntimeHandleError {
  constructor(context: RuntimeHandleErrorContext = {}) {
    super("Prototype JSHandle must not be referencing primitive value", context);
    this.name = "PrototypeNotObjectError";
  }
}

/**
 * Error response returned by the remote end for a single command.
 */
export class ProtocolError extends Error {
  public readonly code: number;
  public readonly method: string;
  public readonly data?: unknown;

  constructor(method: string, code: number, message: string, data?: unknown) {
    super(`${method}: ${code} ${message}`);
    this.name = "ProtocolError";
    this.method = method;
    this.code = code;
    this.data = data;
  }
}

export class TransportClosedError extends Error {
  public readonly reason: string;

  constructor(reason: string) {
    super(`Transport closed: ${reason}`);
    this.name = "TransportClosedError";
    this.reason = reason;
  }
}
