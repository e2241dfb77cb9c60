import { FakeCDPSession } from "@/__tests__/fake-cdp-session";
import {
  CrossContextHandleError,
  DisposedHandleUseError,
  EvaluationFailedError,
  PrototypeNotObjectError,
  ProtocolError,
} from "@/error";
import { ElementHandle } from "@/runtime/element-handle";
import { ExecutionContext } from "@/runtime/execution-context";
import { createJSHandle } from "@/runtime/handle-factory";
import { JSHandle } from "@/runtime/js-handle";

function createContext(session: FakeCDPSession, contextId = 7): ExecutionContext {
  return new ExecutionContext(session, contextId, createJSHandle);
}

describe("ExecutionContext.evaluate", () => {
  it("returns the JSON value of an evaluation with arguments", async () => {
    const session = new FakeCDPSession().respond("Runtime.callFunctionOn", () => ({
      result: { type: "number", value: 3, description: "3" },
    }));
    const context = createContext(session);

    await expect(context.evaluate("(a,b) => a+b", 1, 2)).resolves.toBe(3);
    expect(session.calls).toEqual([
      {
        method: "Runtime.callFunctionOn",
        params: {
          functionDeclaration: "(a,b) => a+b",
          executionContextId: 7,
          arguments: [{ value: 1 }, { value: 2 }],
          returnByValue: false,
          awaitPromise: true,
        },
      },
    ]);
  });

  it("materializes object results by value and releases the reference", async () => {
    const session = new FakeCDPSession().respond(
      "Runtime.callFunctionOn",
      (params) =>
        params && "returnByValue" in params && params.returnByValue
          ? { result: { type: "object", value: { a: 1 } } }
          : { result: { type: "object", objectId: "obj-1" } }
    );
    const context = createContext(session);

    await expect(context.evaluate("() => ({ a: 1 })")).resolves.toEqual({ a: 1 });
    expect(session.calls.map((call) => call.method)).toEqual([
      "Runtime.callFunctionOn",
      "Runtime.callFunctionOn",
      "Runtime.releaseObject",
    ]);
    expect(session.callsFor("Runtime.releaseObject")[0]?.params).toEqual({
      objectId: "obj-1",
    });
  });

  it("disposes the intermediate handle when materialization fails", async () => {
    let callCount = 0;
    const session = new FakeCDPSession().respond("Runtime.callFunctionOn", () => {
      callCount += 1;
      if (callCount === 1) {
        return { result: { type: "object", objectId: "cyclic-1" } };
      }
      throw new ProtocolError(
        "Runtime.callFunctionOn",
        -32000,
        "Object reference chain is too long"
      );
    });
    const context = createContext(session);

    await expect(context.evaluate("() => window")).rejects.toBeInstanceOf(
      ProtocolError
    );
    expect(session.callsFor("Runtime.releaseObject")).toEqual([
      { method: "Runtime.releaseObject", params: { objectId: "cyclic-1" } },
    ]);
  });

  it("keeps the materialization error when the release also fails", async () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    let callCount = 0;
    const session = new FakeCDPSession()
      .respond("Runtime.callFunctionOn", () => {
        callCount += 1;
        if (callCount === 1) {
          return { result: { type: "object", objectId: "o-1" } };
        }
        throw new ProtocolError(
          "Runtime.callFunctionOn",
          -32000,
          "Object reference chain is too long"
        );
      })
      .respond("Runtime.releaseObject", () => {
        throw new ProtocolError("Runtime.releaseObject", -32603, "Internal error");
      });
    const context = createContext(session);

    await expect(context.evaluate("() => window")).rejects.toThrow(
      "Runtime.callFunctionOn: -32000 Object reference chain is too long"
    );
    expect(warn).toHaveBeenCalledWith(
      "[CDP][ExecutionContext] Failed to release JSHandle@object: Runtime.releaseObject: -32603 Internal error"
    );
    warn.mockRestore();
  });

  it("surfaces a failed release after a successful materialization", async () => {
    const session = new FakeCDPSession()
      .respond("Runtime.callFunctionOn", (params) =>
        params && "returnByValue" in params && params.returnByValue
          ? { result: { type: "object", value: {} } }
          : { result: { type: "object", objectId: "o-2" } }
      )
      .respond("Runtime.releaseObject", () => {
        throw new ProtocolError("Runtime.releaseObject", -32603, "Internal error");
      });
    const context = createContext(session);

    await expect(context.evaluate("() => ({})")).rejects.toThrow(
      "Runtime.releaseObject: -32603 Internal error"
    );
  });

  it("sends the source of local functions", async () => {
    const session = new FakeCDPSession().respond("Runtime.callFunctionOn", () => ({
      result: { type: "string", value: "ok" },
    }));
    const context = createContext(session);
    const pageFunction = (): string => "ok";

    await context.evaluate(pageFunction);

    const params = session.calls[0]?.params;
    expect(params).toHaveProperty("functionDeclaration", pageFunction.toString());
  });
});

describe("ExecutionContext.evaluateHandle", () => {
  it("encodes infinities as unserializable values", async () => {
    const session = new FakeCDPSession().respond("Runtime.callFunctionOn", () => ({
      result: { type: "undefined" },
    }));
    const context = createContext(session);

    await context.evaluateHandle("(a, b, c) => {}", Infinity, -Infinity, "text");

    expect(session.calls[0]?.params).toHaveProperty("arguments", [
      { unserializableValue: "Infinity" },
      { unserializableValue: "-Infinity" },
      { value: "text" },
    ]);
  });

  it("encodes bigint arguments as unserializable values", async () => {
    const session = new FakeCDPSession().respond("Runtime.callFunctionOn", () => ({
      result: { type: "bigint", unserializableValue: "10n", description: "10n" },
    }));
    const context = createContext(session);

    await expect(context.evaluate("(a) => a", 10n)).resolves.toBe(10n);
    expect(session.calls[0]?.params).toHaveProperty("arguments", [
      { unserializableValue: "10n" },
    ]);
  });

  it("forwards handle arguments by reference, value or sentinel", async () => {
    const session = new FakeCDPSession().respond("Runtime.callFunctionOn", () => ({
      result: { type: "undefined" },
    }));
    const context = createContext(session);
    const reference = context.wrapRemoteObject({ type: "object", objectId: "obj-9" });
    const primitive = context.wrapRemoteObject({ type: "string", value: "hi" });
    const sentinel = context.wrapRemoteObject({
      type: "number",
      unserializableValue: "NaN",
    });

    await context.evaluateHandle("(a, b, c) => {}", reference, primitive, sentinel);

    expect(session.calls[0]?.params).toHaveProperty("arguments", [
      { objectId: "obj-9" },
      { value: "hi" },
      { unserializableValue: "NaN" },
    ]);
  });

  it("rejects handles from another context before sending anything", async () => {
    const session = new FakeCDPSession();
    const context = createContext(session, 1);
    const otherContext = createContext(session, 2);
    const foreign = otherContext.wrapRemoteObject({
      type: "object",
      objectId: "obj-2",
    });

    const error = await context
      .evaluateHandle("(a) => a", foreign)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CrossContextHandleError);
    expect(error).toMatchObject({ handleContextId: 2, executionContextId: 1 });
    expect(session.calls).toEqual([]);
  });

  it("rejects disposed handles before sending anything", async () => {
    const session = new FakeCDPSession();
    const context = createContext(session);
    const handle = context.wrapRemoteObject({ type: "number", value: 4 });
    await handle.dispose();

    await expect(context.evaluateHandle("(a) => a", handle)).rejects.toBeInstanceOf(
      DisposedHandleUseError
    );
    expect(session.calls).toEqual([]);
  });

  it("surfaces remote exceptions and releases the thrown object", async () => {
    const session = new FakeCDPSession().respond("Runtime.callFunctionOn", () => ({
      result: { type: "object", subtype: "error", objectId: "err-1" },
      exceptionDetails: {
        exceptionId: 1,
        text: "Uncaught",
        lineNumber: 0,
        columnNumber: 7,
        exception: {
          type: "object",
          subtype: "error",
          description: "Error: boom\n    at <anonymous>:1:7",
          objectId: "err-1",
        },
      },
    }));
    const context = createContext(session);

    const error = await context
      .evaluateHandle("() => { throw new Error('boom'); }")
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EvaluationFailedError);
    expect(error).toHaveProperty(
      "message",
      "Evaluation failed: Error: boom\n    at <anonymous>:1:7"
    );
    expect(session.callsFor("Runtime.releaseObject")).toEqual([
      { method: "Runtime.releaseObject", params: { objectId: "err-1" } },
    ]);
  });

  it("builds element handles for DOM nodes through the factory", async () => {
    const session = new FakeCDPSession().respond("Runtime.callFunctionOn", () => ({
      result: { type: "object", subtype: "node", objectId: "node-1" },
    }));
    const context = createContext(session);

    const handle = await context.evaluateHandle("() => document.body");

    expect(handle).toBeInstanceOf(ElementHandle);
    expect(handle.asElement()).toBe(handle);
    expect(handle.executionContext).toBe(context);
  });

  it("uses an injected factory for every wrapped descriptor", async () => {
    const session = new FakeCDPSession().respond("Runtime.callFunctionOn", () => ({
      result: { type: "object", objectId: "obj-1" },
    }));
    const factory = jest.fn(
      (ctx: ExecutionContext, remoteObject: { type: string }) =>
        new JSHandle(ctx, remoteObject)
    );
    const context = new ExecutionContext(session, 3, factory);

    await context.evaluateHandle("() => ({})");

    expect(factory).toHaveBeenCalledWith(context, {
      type: "object",
      objectId: "obj-1",
    });
  });
});

describe("ExecutionContext.queryObject", () => {
  it("fails for primitive prototypes without contacting the session", async () => {
    const session = new FakeCDPSession();
    const context = createContext(session);
    const primitive = context.wrapRemoteObject({ type: "number", value: 1 });

    await expect(context.queryObject(primitive)).rejects.toBeInstanceOf(
      PrototypeNotObjectError
    );
    expect(session.calls).toEqual([]);
  });

  it("fails for disposed prototypes", async () => {
    const session = new FakeCDPSession();
    const context = createContext(session);
    const prototype = context.wrapRemoteObject({ type: "object", objectId: "proto-1" });
    await prototype.dispose();
    session.calls.length = 0;

    await expect(context.queryObject(prototype)).rejects.toBeInstanceOf(
      DisposedHandleUseError
    );
    expect(session.calls).toEqual([]);
  });

  it("wraps the matching objects array", async () => {
    const session = new FakeCDPSession().respond("Runtime.queryObjects", () => ({
      objects: { type: "object", subtype: "array", objectId: "arr-1" },
    }));
    const context = createContext(session);
    const prototype = context.wrapRemoteObject({ type: "object", objectId: "proto-1" });

    const matches = await context.queryObject(prototype);

    expect(session.calls).toEqual([
      { method: "Runtime.queryObjects", params: { prototypeObjectId: "proto-1" } },
    ]);
    expect(matches.toString()).toBe("JSHandle@array");
  });
});
