import type { Protocol } from "devtools-protocol";

import type { CDPSession } from "@/cdp/types";
import {
  CrossContextHandleError,
  DisposedHandleUseError,
  EvaluationFailedError,
  PrototypeNotObjectError,
} from "@/error";
import type { HandleFactory } from "@/runtime/handle-factory";
import { JSHandle, disposeAfter } from "@/runtime/js-handle";
import {
  CallFunctionOnResponseSchema,
  QueryObjectsResponseSchema,
  classifyRemoteObject,
  getExceptionMessage,
  parseResponse,
  releaseObject,
  type RemoteObject,
} from "@/runtime/remote-object";
import { formatDiagnostic } from "@/utils/format-unknown-error";

/**
 * Function run in the remote context: either declaration source text, or a
 * local function whose source is sent as-is (it must not close over local
 * variables).
 */
export type PageFunction = string | ((...args: never[]) => unknown);

export interface ExecutionContextInfo {
  frameId?: string;
  name?: string;
  origin?: string;
  isDefault?: boolean;
}

function serializePageFunction(pageFunction: PageFunction): string {
  return typeof pageFunction === "string" ? pageFunction : pageFunction.toString();
}

/**
 * One isolated JavaScript world in the remote runtime.
 *
 * Every evaluation goes through `Runtime.callFunctionOn`, including calls
 * without arguments, so `pageFunction` is always a function declaration.
 */
export class ExecutionContext {
  private readonly createHandle: (remoteObject: RemoteObject) => JSHandle;

  constructor(
    readonly session: CDPSession,
    readonly contextId: number,
    handleFactory: HandleFactory,
    readonly info: Readonly<ExecutionContextInfo> = {}
  ) {
    this.createHandle = (remoteObject) => handleFactory(this, remoteObject);
  }

  get frameId(): string | undefined {
    return this.info.frameId;
  }

  async evaluate(pageFunction: PageFunction, ...args: unknown[]): Promise<unknown> {
    const handle = await this.evaluateHandle(pageFunction, ...args);
    return disposeAfter(handle, "ExecutionContext", () => handle.jsonValue());
  }

  async evaluateHandle(
    pageFunction: PageFunction,
    ...args: unknown[]
  ): Promise<JSHandle> {
    const callArguments = args.map((arg) => this.convertArgument(arg));
    const response = parseResponse(
      CallFunctionOnResponseSchema,
      "Runtime.callFunctionOn",
      await this.session.send("Runtime.callFunctionOn", {
        functionDeclaration: serializePageFunction(pageFunction),
        executionContextId: this.contextId,
        arguments: callArguments,
        returnByValue: false,
        awaitPromise: true,
      } satisfies Protocol.Runtime.CallFunctionOnRequest)
    );

    if (response.exceptionDetails) {
      await this.releaseExceptionObject(response.exceptionDetails.exception);
      throw new EvaluationFailedError(
        getExceptionMessage(response.exceptionDetails),
        response.exceptionDetails,
        { method: "Runtime.callFunctionOn", executionContextId: this.contextId }
      );
    }
    return this.createHandle(response.result);
  }

  async queryObject(prototypeHandle: JSHandle): Promise<JSHandle> {
    if (prototypeHandle.disposed) {
      throw new DisposedHandleUseError("Prototype JSHandle is disposed!", {
        executionContextId: this.contextId,
        objectId: prototypeHandle.remoteObject.objectId,
      });
    }
    const prototypeObjectId = prototypeHandle.remoteObject.objectId;
    if (!prototypeObjectId) {
      throw new PrototypeNotObjectError({ executionContextId: this.contextId });
    }

    const response = parseResponse(
      QueryObjectsResponseSchema,
      "Runtime.queryObjects",
      await this.session.send("Runtime.queryObjects", {
        prototypeObjectId,
      } satisfies Protocol.Runtime.QueryObjectsRequest)
    );
    return this.createHandle(response.objects);
  }

  /**
   * Wraps a descriptor received for this context into a handle.
   */
  wrapRemoteObject(remoteObject: RemoteObject): JSHandle {
    return this.createHandle(remoteObject);
  }

  toString(): string {
    return `ExecutionContext@${this.contextId}`;
  }

  private convertArgument(arg: unknown): Protocol.Runtime.CallArgument {
    if (arg === Infinity) {
      return { unserializableValue: "Infinity" };
    }
    if (arg === -Infinity) {
      return { unserializableValue: "-Infinity" };
    }
    if (typeof arg === "bigint") {
      return { unserializableValue: `${arg}n` };
    }
    if (arg instanceof JSHandle) {
      const handleContext = arg.executionContext;
      if (handleContext !== this) {
        throw new CrossContextHandleError(handleContext.contextId, {
          executionContextId: this.contextId,
          objectId: arg.remoteObject.objectId,
        });
      }
      if (arg.disposed) {
        throw new DisposedHandleUseError("JSHandle is disposed!", {
          executionContextId: this.contextId,
          objectId: arg.remoteObject.objectId,
        });
      }
      const remoteValue = classifyRemoteObject(arg.remoteObject);
      switch (remoteValue.kind) {
        case "unserializable":
          return { unserializableValue: remoteValue.sentinel };
        case "value":
          return { value: remoteValue.value };
        case "reference":
          return { objectId: remoteValue.objectId };
      }
    }
    return { value: arg };
  }

  private async releaseExceptionObject(
    exception: RemoteObject | undefined
  ): Promise<void> {
    if (!exception) return;
    try {
      await releaseObject(this.session, exception);
    } catch (error) {
      console.warn(
        `[CDP][ExecutionContext] Failed to release exception object: ${formatDiagnostic(error)}`
      );
    }
  }
}
