import WebSocket, { RawData } from "ws";
import { z } from "zod";

import type { CDPSession } from "@/cdp/types";
import { debugLog } from "@/debug/options";
import { ProtocolError, TransportClosedError } from "@/error";
import { formatDiagnostic } from "@/utils/format-unknown-error";

interface InflightEntry {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  method: string;
  sessionId: string | null;
}

type EventHandler = (params: unknown) => void;

const ResponseMessageSchema = z.object({
  id: z.number(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
  sessionId: z.string().optional(),
});

const EventMessageSchema = z.object({
  method: z.string(),
  params: z.unknown().optional(),
  sessionId: z.string().optional(),
});

const RawMessageSchema = z.union([ResponseMessageSchema, EventMessageSchema]);

const AttachToTargetResultSchema = z.object({ sessionId: z.string() });
const SessionEventSchema = z.object({ sessionId: z.string() });

const TargetInfoSchema = z.object({
  targetId: z.string(),
  type: z.string(),
  title: z.string(),
  url: z.string(),
  attached: z.boolean(),
  openerId: z.string().optional(),
  browserContextId: z.string().optional(),
});

const GetTargetsResultSchema = z.object({
  targetInfos: z.array(TargetInfoSchema),
});

export type TargetInfo = z.infer<typeof TargetInfoSchema>;

class CdpSession implements CDPSession {
  private readonly handlers = new Map<string, Set<EventHandler>>();

  constructor(
    private readonly connection: CdpConnection,
    readonly id: string | null
  ) {}

  async send<T = unknown>(method: string, params?: object): Promise<T> {
    return this.connection.sendCommand(method, params, this.id) as Promise<T>;
  }

  on<TPayload = unknown>(event: string, handler: (payload: TPayload) => void): void {
    const set = this.handlers.get(event) ?? new Set<EventHandler>();
    set.add(handler as EventHandler);
    this.handlers.set(event, set);
  }

  off<TPayload = unknown>(event: string, handler: (payload: TPayload) => void): void {
    const set = this.handlers.get(event);
    if (set) {
      set.delete(handler as EventHandler);
      if (set.size === 0) {
        this.handlers.delete(event);
      }
    }
  }

  emit(event: string, params: unknown): void {
    const handlers = this.handlers.get(event);
    if (!handlers) return;
    for (const handler of handlers) {
      try {
        handler(params);
      } catch (error) {
        console.error(
          `[CDP][Session] handler error for ${event}: ${formatDiagnostic(error)}`
        );
      }
    }
  }

  async detach(): Promise<void> {
    if (this.id) {
      try {
        await this.connection.sendCommand(
          "Target.detachFromTarget",
          { sessionId: this.id },
          null
        );
      } finally {
        this.connection.forgetSession(this.id);
      }
    } else {
      await this.connection.close();
    }
  }
}

/**
 * CDP client over a single WebSocket. Child targets use flattened sessions
 * multiplexed on the same socket.
 */
export class CdpConnection {
  private readonly ws: WebSocket;
  private nextId = 1;
  private readonly inflight = new Map<number, InflightEntry>();
  private readonly sessions = new Map<string, CdpSession>();
  private readonly transportCloseHandlers = new Set<(why: string) => void>();
  private readonly rootSession: CdpSession;
  private closedReason: string | null = null;

  private constructor(ws: WebSocket) {
    this.ws = ws;
    this.rootSession = new CdpSession(this, null);
    this.setupSocket();
  }

  static async connect(wsUrl: string): Promise<CdpConnection> {
    const ws = new WebSocket(wsUrl);
    await new Promise<void>((resolve, reject) => {
      ws.once("open", () => resolve());
      ws.once("error", (err: Error) => reject(err));
    });
    return new CdpConnection(ws);
  }

  static fromSocket(ws: WebSocket): CdpConnection {
    return new CdpConnection(ws);
  }

  get root(): CDPSession {
    return this.rootSession;
  }

  /** Commands sent and still waiting for a response. */
  get pendingCommands(): number {
    return this.inflight.size;
  }

  get closed(): boolean {
    return this.closedReason !== null;
  }

  onTransportClosed(handler: (why: string) => void): void {
    this.transportCloseHandlers.add(handler);
  }

  offTransportClosed(handler: (why: string) => void): void {
    this.transportCloseHandlers.delete(handler);
  }

  async attachToTarget(targetId: string): Promise<CDPSession> {
    const result = await this.sendCommand(
      "Target.attachToTarget",
      { targetId, flatten: true },
      null
    );
    const { sessionId } = AttachToTargetResultSchema.parse(result);
    return this.getOrCreateSession(sessionId);
  }

  async getTargets(): Promise<TargetInfo[]> {
    const result = await this.sendCommand("Target.getTargets", undefined, null);
    return GetTargetsResultSchema.parse(result).targetInfos;
  }

  async close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return;
    await new Promise<void>((resolve) => {
      this.ws.once("close", () => resolve());
      this.ws.close();
    });
  }

  private setupSocket(): void {
    this.ws.on("message", (data: RawData) => this.onMessage(data));
    this.ws.on("close", (code: number, reason: Buffer) => {
      const why = `socket-close code=${code} reason=${String(reason || "")}`;
      this.handleTransportClosed(why);
    });
    this.ws.on("error", (error: Error) => {
      const why = `socket-error ${error?.message ?? String(error)}`;
      this.handleTransportClosed(why);
    });
  }

  private onMessage(data: RawData): void {
    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch (error) {
      console.error(
        `[CDP][Connection] Failed to parse CDP message: ${formatDiagnostic(error)}`
      );
      return;
    }

    const parsed = RawMessageSchema.safeParse(raw);
    if (!parsed.success) {
      console.error(
        `[CDP][Connection] Dropping malformed CDP message: ${formatDiagnostic(raw)}`
      );
      return;
    }
    const message = parsed.data;

    if ("id" in message) {
      const entry = this.inflight.get(message.id);
      if (!entry) return;
      this.inflight.delete(message.id);

      if (message.error) {
        entry.reject(
          new ProtocolError(
            entry.method,
            message.error.code,
            message.error.message,
            message.error.data
          )
        );
      } else {
        entry.resolve(message.result ?? {});
      }
      return;
    }

    this.dispatchEvent(message.method, message.params, message.sessionId);
  }

  private dispatchEvent(
    method: string,
    params: unknown,
    sessionId?: string
  ): void {
    if (method === "Target.attachedToTarget") {
      const evt = SessionEventSchema.safeParse(params);
      if (evt.success) {
        const session = this.getOrCreateSession(evt.data.sessionId);
        session.emit(method, params);
      }
      this.rootSession.emit(method, params);
      return;
    }

    if (method === "Target.detachedFromTarget") {
      const evt = SessionEventSchema.safeParse(params);
      if (evt.success) {
        this.forgetSession(evt.data.sessionId);
      }
      this.rootSession.emit(method, params);
      return;
    }

    const targetSession = sessionId
      ? this.sessions.get(sessionId)
      : this.rootSession;
    targetSession?.emit(method, params);
  }

  private getOrCreateSession(sessionId: string): CdpSession {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = new CdpSession(this, sessionId);
      this.sessions.set(sessionId, session);
    }
    return session;
  }

  sendCommand(
    method: string,
    params?: object,
    sessionId: string | null = null
  ): Promise<unknown> {
    if (this.closedReason !== null) {
      return Promise.reject(new TransportClosedError(this.closedReason));
    }

    const id = this.nextId++;
    const payload: Record<string, unknown> = { id, method };
    if (params) payload.params = params;
    if (sessionId) payload.sessionId = sessionId;

    debugLog(
      "protocol",
      "Connection",
      `-> ${method} #${id}${sessionId ? ` (${sessionId})` : ""}`
    );

    let frame: string;
    try {
      frame = JSON.stringify(payload);
    } catch (error) {
      return Promise.reject(error);
    }

    return new Promise((resolve, reject) => {
      this.inflight.set(id, { resolve, reject, method, sessionId });
      this.ws.send(frame);
    });
  }

  forgetSession(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  private handleTransportClosed(reason: string): void {
    if (this.closedReason !== null) return;
    this.closedReason = reason;
    for (const entry of this.inflight.values()) {
      entry.reject(new TransportClosedError(reason));
    }
    this.inflight.clear();
    for (const handler of this.transportCloseHandlers) {
      try {
        handler(reason);
      } catch (error) {
        console.error(
          `[CDP][Connection] transport close handler error: ${formatDiagnostic(error)}`
        );
      }
    }
  }
}

export default CdpConnection;
