import type { Protocol } from "devtools-protocol";

import type { CDPSession } from "@/cdp/types";
import { debugLog } from "@/debug/options";
import { ExecutionContext } from "@/runtime/execution-context";
import { createJSHandle, type HandleFactory } from "@/runtime/handle-factory";

export type WorldFilter = "default" | "all";

export interface ExecutionContextRegistryOptions {
  /** Track only each frame's main world, or isolated worlds too. */
  worlds?: WorldFilter;
  handleFactory?: HandleFactory;
  contextWaitTimeoutMs?: number;
}

interface ContextWaiter {
  resolve: (context?: ExecutionContext) => void;
  timeoutId?: NodeJS.Timeout;
}

const DEFAULT_CONTEXT_WAIT_TIMEOUT_MS = 750;

function readAuxData(
  auxData: unknown
): { frameId?: string; isDefault?: boolean; type?: string } {
  if (!auxData || typeof auxData !== "object") {
    return {};
  }
  const frameId: unknown = Reflect.get(auxData, "frameId");
  const isDefault: unknown = Reflect.get(auxData, "isDefault");
  const type: unknown = Reflect.get(auxData, "type");
  return {
    frameId: typeof frameId === "string" ? frameId : undefined,
    isDefault: typeof isDefault === "boolean" ? isDefault : undefined,
    type: typeof type === "string" ? type : undefined,
  };
}

/**
 * Keeps one ExecutionContext per live remote context of a session, keyed by
 * context id, and by frame id for each frame's default world.
 */
export class ExecutionContextRegistry {
  private readonly contexts = new Map<number, ExecutionContext>();
  private readonly frameContexts = new Map<string, number>();
  private readonly frameWaiters = new Map<string, Set<ContextWaiter>>();
  private readonly worlds: WorldFilter;
  private readonly handleFactory: HandleFactory;
  private readonly contextWaitTimeoutMs: number;
  private enablePromise: Promise<void> | null = null;
  private listening = false;

  constructor(
    private readonly session: CDPSession,
    options: ExecutionContextRegistryOptions = {}
  ) {
    this.worlds = options.worlds ?? "default";
    this.handleFactory = options.handleFactory ?? createJSHandle;
    this.contextWaitTimeoutMs =
      options.contextWaitTimeoutMs ?? DEFAULT_CONTEXT_WAIT_TIMEOUT_MS;
  }

  async enable(): Promise<void> {
    if (this.enablePromise) return this.enablePromise;

    this.listen();
    this.enablePromise = this.session
      .send("Runtime.enable")
      .then(() => undefined)
      .catch((error: unknown) => {
        this.enablePromise = null;
        throw error;
      });
    return this.enablePromise;
  }

  get(contextId: number): ExecutionContext | undefined {
    return this.contexts.get(contextId);
  }

  getForFrame(frameId: string): ExecutionContext | undefined {
    const contextId = this.frameContexts.get(frameId);
    return typeof contextId === "number" ? this.contexts.get(contextId) : undefined;
  }

  list(): ExecutionContext[] {
    return Array.from(this.contexts.values());
  }

  async waitForFrameContext(
    frameId: string,
    timeoutMs = this.contextWaitTimeoutMs
  ): Promise<ExecutionContext | undefined> {
    const existing = this.getForFrame(frameId);
    if (existing) {
      return existing;
    }

    return await new Promise<ExecutionContext | undefined>((resolve) => {
      const waiter: ContextWaiter = { resolve };

      waiter.timeoutId = setTimeout(() => {
        const waiters = this.frameWaiters.get(frameId);
        if (waiters) {
          waiters.delete(waiter);
          if (waiters.size === 0) {
            this.frameWaiters.delete(frameId);
          }
        }
        resolve(undefined);
      }, timeoutMs);

      let waiters = this.frameWaiters.get(frameId);
      if (!waiters) {
        waiters = new Set();
        this.frameWaiters.set(frameId, waiters);
      }
      waiters.add(waiter);
    });
  }

  dispose(): void {
    if (this.listening) {
      this.session.off?.("Runtime.executionContextCreated", this.onCreated);
      this.session.off?.("Runtime.executionContextDestroyed", this.onDestroyed);
      this.session.off?.("Runtime.executionContextsCleared", this.onCleared);
      this.listening = false;
    }
    this.contexts.clear();
    this.frameContexts.clear();
    for (const waiters of this.frameWaiters.values()) {
      for (const waiter of waiters) {
        if (waiter.timeoutId) clearTimeout(waiter.timeoutId);
        waiter.resolve(undefined);
      }
    }
    this.frameWaiters.clear();
    this.enablePromise = null;
  }

  private listen(): void {
    if (this.listening) return;
    this.listening = true;
    this.session.on("Runtime.executionContextCreated", this.onCreated);
    this.session.on("Runtime.executionContextDestroyed", this.onDestroyed);
    this.session.on("Runtime.executionContextsCleared", this.onCleared);
  }

  private readonly onCreated = (
    event: Protocol.Runtime.ExecutionContextCreatedEvent
  ): void => {
    const description = event.context;
    const auxData = readAuxData(description.auxData);
    const isDefault = auxData.isDefault ?? auxData.type === "default";
    if (!isDefault && this.worlds === "default") {
      return;
    }

    const context = new ExecutionContext(
      this.session,
      description.id,
      this.handleFactory,
      {
        frameId: auxData.frameId,
        name: description.name,
        origin: description.origin,
        isDefault,
      }
    );
    this.contexts.set(description.id, context);
    debugLog(
      "contexts",
      "Registry",
      `context ${description.id} created${auxData.frameId ? ` for frame ${auxData.frameId}` : ""}`
    );

    if (!auxData.frameId || !isDefault) return;
    this.frameContexts.set(auxData.frameId, description.id);

    const waiters = this.frameWaiters.get(auxData.frameId);
    if (waiters) {
      for (const waiter of waiters) {
        if (waiter.timeoutId) clearTimeout(waiter.timeoutId);
        waiter.resolve(context);
      }
      this.frameWaiters.delete(auxData.frameId);
    }
  };

  private readonly onDestroyed = (
    event: Protocol.Runtime.ExecutionContextDestroyedEvent
  ): void => {
    const context = this.contexts.get(event.executionContextId);
    if (!context) return;
    this.contexts.delete(event.executionContextId);
    const { frameId } = context;
    if (frameId && this.frameContexts.get(frameId) === event.executionContextId) {
      this.frameContexts.delete(frameId);
    }
    debugLog("contexts", "Registry", `context ${event.executionContextId} destroyed`);
  };

  private readonly onCleared = (): void => {
    this.contexts.clear();
    this.frameContexts.clear();
    debugLog("contexts", "Registry", "all contexts cleared");
  };
}
