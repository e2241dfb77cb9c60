import { ElementHandle } from "@/runtime/element-handle";
import type { ExecutionContext } from "@/runtime/execution-context";
import { JSHandle } from "@/runtime/js-handle";
import type { RemoteObject } from "@/runtime/remote-object";

export type HandleFactory = (
  context: ExecutionContext,
  remoteObject: RemoteObject
) => JSHandle;

export const createJSHandle: HandleFactory = (context, remoteObject) => {
  if (remoteObject.subtype === "node") {
    return new ElementHandle(context, remoteObject);
  }
  return new JSHandle(context, remoteObject);
};
