import { z } from "zod";

import type { RuntimeDebugOptions } from "@/debug/options";
import type { WorldFilter } from "@/runtime/execution-context-registry";

export interface RuntimeBridgeOptions {
  /**
   * DevTools WebSocket URL of a page, or of the browser when `targetId` is
   * given. Defaults to `CDP_WS_ENDPOINT`.
   */
  wsEndpoint?: string;
  /**
   * Target to attach to through the browser endpoint.
   */
  targetId?: string;
  worlds?: WorldFilter;
  /**
   * How long `waitForFrameContext` waits by default. Defaults to 750ms.
   */
  contextWaitTimeoutMs?: number;

  debug?: boolean;
  debugOptions?: RuntimeDebugOptions;
}

const DebugOptionsSchema = z
  .object({
    protocol: z.boolean().optional(),
    handles: z.boolean().optional(),
    contexts: z.boolean().optional(),
  })
  .strict();

export const RuntimeBridgeConfigSchema = z.object({
  wsEndpoint: z
    .string()
    .url()
    .refine((value) => /^wss?:\/\//.test(value), {
      message: "wsEndpoint must be a ws:// or wss:// URL",
    }),
  targetId: z.string().min(1).optional(),
  worlds: z.enum(["default", "all"]).default("default"),
  contextWaitTimeoutMs: z.number().int().positive().default(750),
  debug: z.boolean().default(false),
  debugOptions: DebugOptionsSchema.default({}),
});

export type RuntimeBridgeConfig = z.infer<typeof RuntimeBridgeConfigSchema>;

function readDebugFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true";
}

export function resolveRuntimeBridgeConfig(
  options: RuntimeBridgeOptions = {},
  env: NodeJS.ProcessEnv = process.env
): RuntimeBridgeConfig {
  return RuntimeBridgeConfigSchema.parse({
    ...options,
    wsEndpoint: options.wsEndpoint ?? env.CDP_WS_ENDPOINT,
    debug: options.debug ?? readDebugFlag(env.CDP_RUNTIME_DEBUG),
  });
}
