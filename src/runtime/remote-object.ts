import { z } from "zod";

import type { CDPSession } from "@/cdp/types";
import { debugLog } from "@/debug/options";
import { ProtocolError, RuntimeHandleError, TransportClosedError } from "@/error";
import { formatDiagnostic, formatUnknownError } from "@/utils/format-unknown-error";

export const RemoteObjectSchema = z.object({
  type: z.string(),
  subtype: z.string().optional(),
  className: z.string().optional(),
  value: z.unknown().optional(),
  unserializableValue: z.string().optional(),
  description: z.string().optional(),
  objectId: z.string().optional(),
});

export type RemoteObject = z.infer<typeof RemoteObjectSchema>;

const CallFrameSchema = z.object({
  functionName: z.string(),
  url: z.string(),
  lineNumber: z.number(),
  columnNumber: z.number(),
});

export const ExceptionDetailsSchema = z.object({
  exceptionId: z.number().optional(),
  text: z.string(),
  lineNumber: z.number().optional(),
  columnNumber: z.number().optional(),
  url: z.string().optional(),
  stackTrace: z.object({ callFrames: z.array(CallFrameSchema) }).optional(),
  exception: RemoteObjectSchema.optional(),
});

export type ExceptionDetails = z.infer<typeof ExceptionDetailsSchema>;

export const CallFunctionOnResponseSchema = z.object({
  result: RemoteObjectSchema,
  exceptionDetails: ExceptionDetailsSchema.optional(),
});

export const GetPropertiesResponseSchema = z.object({
  result: z.array(
    z.object({
      name: z.string(),
      enumerable: z.boolean(),
      value: RemoteObjectSchema.optional(),
    })
  ),
});

export const QueryObjectsResponseSchema = z.object({
  objects: RemoteObjectSchema,
});

/**
 * Validates a CDP response payload; malformed payloads surface as
 * RuntimeHandleError tagged with the method that produced them.
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  method: string,
  payload: unknown
): z.infer<T> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new RuntimeHandleError(`Malformed ${method} response`, {
      method,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export type UnserializableSentinel =
  | "Infinity"
  | "-Infinity"
  | "NaN"
  | "-0"
  | `${bigint}n`;

export type RemoteValue =
  | { kind: "reference"; objectId: string }
  | { kind: "unserializable"; sentinel: string }
  | { kind: "value"; value: unknown };

export function classifyRemoteObject(remoteObject: RemoteObject): RemoteValue {
  if (remoteObject.objectId) {
    return { kind: "reference", objectId: remoteObject.objectId };
  }
  if (remoteObject.unserializableValue) {
    return { kind: "unserializable", sentinel: remoteObject.unserializableValue };
  }
  return { kind: "value", value: remoteObject.value };
}

const BIGINT_SENTINEL = /^-?\d+n$/;

export function isUnserializableSentinel(
  sentinel: string
): sentinel is UnserializableSentinel {
  return (
    sentinel === "Infinity" ||
    sentinel === "-Infinity" ||
    sentinel === "NaN" ||
    sentinel === "-0" ||
    BIGINT_SENTINEL.test(sentinel)
  );
}

export function decodeUnserializableValue(sentinel: string): number | bigint {
  if (!isUnserializableSentinel(sentinel)) {
    throw new RuntimeHandleError(`Unsupported unserializable value: ${sentinel}`);
  }
  switch (sentinel) {
    case "Infinity":
      return Infinity;
    case "-Infinity":
      return -Infinity;
    case "NaN":
      return NaN;
    case "-0":
      return -0;
    default:
      return BigInt(sentinel.slice(0, -1));
  }
}

/**
 * Local value carried by a descriptor that has no remote reference.
 * Absent `value` decodes to `undefined`.
 */
export function valueFromRemoteObject(remoteObject: RemoteObject): unknown {
  const remoteValue = classifyRemoteObject(remoteObject);
  switch (remoteValue.kind) {
    case "reference":
      throw new RuntimeHandleError(
        "Cannot extract value when objectId is given",
        { objectId: remoteValue.objectId }
      );
    case "unserializable":
      return decodeUnserializableValue(remoteValue.sentinel);
    case "value":
      return remoteValue.value;
  }
}

export function getExceptionMessage(exceptionDetails: ExceptionDetails): string {
  const { exception } = exceptionDetails;
  if (exception) {
    if (exception.description) {
      return exception.description;
    }
    if (exception.unserializableValue) {
      return exception.unserializableValue;
    }
    if (exception.value !== undefined) {
      return formatUnknownError(exception.value);
    }
  }

  let message = exceptionDetails.text;
  for (const callFrame of exceptionDetails.stackTrace?.callFrames ?? []) {
    const location = `${callFrame.url}:${callFrame.lineNumber}:${callFrame.columnNumber}`;
    const functionName = callFrame.functionName || "<anonymous>";
    message += `\n    at ${functionName} (${location})`;
  }
  return message;
}

const OBJECT_GONE_MESSAGES = [
  "Could not find object with given id",
  "Cannot find context with specified id",
  "Inspected target navigated or closed",
  "Session closed",
];

/**
 * True when a release failed because the remote object can no longer be
 * reached, which leaves nothing to release.
 */
export function isObjectGoneError(error: unknown): boolean {
  if (error instanceof TransportClosedError) {
    return true;
  }
  if (!(error instanceof ProtocolError)) {
    return false;
  }
  return OBJECT_GONE_MESSAGES.some((message) => error.message.includes(message));
}

export async function releaseObject(
  session: CDPSession,
  remoteObject: RemoteObject
): Promise<void> {
  const { objectId } = remoteObject;
  if (!objectId) {
    return;
  }
  try {
    await session.send("Runtime.releaseObject", { objectId });
    debugLog("handles", "Release", `released ${objectId}`);
  } catch (error) {
    if (!isObjectGoneError(error)) {
      throw error;
    }
    debugLog(
      "handles",
      "Release",
      `${objectId} already gone: ${formatDiagnostic(error)}`
    );
  }
}
