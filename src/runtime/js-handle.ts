import type { CDPSession } from "@/cdp/types";
import { DisposedHandleUseError, EvaluationFailedError, RuntimeHandleError } from "@/error";
import type { ElementHandle } from "@/runtime/element-handle";
import type { ExecutionContext } from "@/runtime/execution-context";
import {
  CallFunctionOnResponseSchema,
  GetPropertiesResponseSchema,
  classifyRemoteObject,
  decodeUnserializableValue,
  getExceptionMessage,
  isUnserializableSentinel,
  parseResponse,
  releaseObject,
  valueFromRemoteObject,
  type RemoteObject,
} from "@/runtime/remote-object";
import { formatDiagnostic } from "@/utils/format-unknown-error";

export type HandleKind = "js" | "element";

const GET_PROPERTY_FUNCTION = `(object, propertyName) => {
  const result = { __proto__: null };
  result[propertyName] = object[propertyName];
  return result;
}`;

const RETURN_THIS_FUNCTION = "function() { return this; }";

function renderValue(value: unknown): string {
  if (Object.is(value, -0)) {
    return "-0";
  }
  return String(value);
}

/**
 * Runs `step`, then disposes `handle`. When `step` fails, a failed release is
 * only logged and the step's error is rethrown.
 */
export async function disposeAfter<T>(
  handle: JSHandle,
  component: string,
  step: () => Promise<T>
): Promise<T> {
  let result: T;
  try {
    result = await step();
  } catch (error) {
    try {
      await handle.dispose();
    } catch (releaseError) {
      console.warn(
        `[CDP][${component}] Failed to release ${handle.toString()}: ${formatDiagnostic(releaseError)}`
      );
    }
    throw error;
  }
  await handle.dispose();
  return result;
}

/**
 * Local proxy for one value living in a remote execution context.
 *
 * Handles holding an objectId pin the remote object until `dispose()` is
 * called. Only the owning context's handle factory creates them.
 */
export class JSHandle {
  readonly session: CDPSession;
  private disposedFlag = false;

  constructor(
    private readonly context: ExecutionContext,
    private readonly descriptor: RemoteObject
  ) {
    this.session = context.session;
  }

  get kind(): HandleKind {
    return "js";
  }

  get executionContext(): ExecutionContext {
    return this.context;
  }

  get remoteObject(): Readonly<RemoteObject> {
    return this.descriptor;
  }

  get disposed(): boolean {
    return this.disposedFlag;
  }

  async getProperty(propertyName: string): Promise<JSHandle> {
    this.assertNotDisposed("getProperty");
    const carrier = await this.context.evaluateHandle(
      GET_PROPERTY_FUNCTION,
      this,
      propertyName
    );
    return disposeAfter(carrier, "JSHandle", async () => {
      const properties = await carrier.getProperties();
      const result = properties.get(propertyName);
      if (!result) {
        throw new RuntimeHandleError(
          `Property ${propertyName} missing from carrier object`,
          {
            executionContextId: this.context.contextId,
            objectId: carrier.remoteObject.objectId,
          }
        );
      }
      return result;
    });
  }

  async getProperties(): Promise<Map<string, JSHandle>> {
    this.assertNotDisposed("getProperties");
    const result = new Map<string, JSHandle>();
    const { objectId } = this.descriptor;
    if (!objectId) {
      return result;
    }

    const response = parseResponse(
      GetPropertiesResponseSchema,
      "Runtime.getProperties",
      await this.session.send("Runtime.getProperties", {
        objectId,
        ownProperties: true,
      })
    );
    for (const property of response.result) {
      if (!property.enumerable || !property.value) {
        continue;
      }
      result.set(property.name, this.context.wrapRemoteObject(property.value));
    }
    return result;
  }

  async jsonValue(): Promise<unknown> {
    this.assertNotDisposed("jsonValue");
    const { objectId } = this.descriptor;
    if (!objectId) {
      return valueFromRemoteObject(this.descriptor);
    }

    const response = parseResponse(
      CallFunctionOnResponseSchema,
      "Runtime.callFunctionOn",
      await this.session.send("Runtime.callFunctionOn", {
        functionDeclaration: RETURN_THIS_FUNCTION,
        objectId,
        returnByValue: true,
        awaitPromise: true,
      })
    );
    if (response.exceptionDetails) {
      throw new EvaluationFailedError(
        getExceptionMessage(response.exceptionDetails),
        response.exceptionDetails,
        {
          method: "Runtime.callFunctionOn",
          executionContextId: this.context.contextId,
          objectId,
        }
      );
    }
    return valueFromRemoteObject(response.result);
  }

  asElement(): ElementHandle | null {
    return null;
  }

  async dispose(): Promise<void> {
    if (this.disposedFlag) {
      return;
    }
    this.disposedFlag = true;
    await releaseObject(this.session, this.descriptor);
  }

  toString(): string {
    const remoteValue = classifyRemoteObject(this.descriptor);
    switch (remoteValue.kind) {
      case "reference":
        return `JSHandle@${this.descriptor.subtype || this.descriptor.type}`;
      case "unserializable":
        return isUnserializableSentinel(remoteValue.sentinel)
          ? `JSHandle:${renderValue(decodeUnserializableValue(remoteValue.sentinel))}`
          : `JSHandle:${remoteValue.sentinel}`;
      case "value":
        return `JSHandle:${renderValue(remoteValue.value)}`;
    }
  }

  private assertNotDisposed(operation: string): void {
    if (this.disposedFlag) {
      throw new DisposedHandleUseError(
        `JSHandle is disposed! Cannot call ${operation}()`,
        {
          executionContextId: this.context.contextId,
          objectId: this.descriptor.objectId,
        }
      );
    }
  }
}
