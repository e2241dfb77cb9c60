import { CdpConnection } from "@/cdp/connection";
import type { CDPSession } from "@/cdp/types";
import { setDebugOptions } from "@/debug/options";
import { ExecutionContextRegistry } from "@/runtime/execution-context-registry";
import {
  resolveRuntimeBridgeConfig,
  type RuntimeBridgeOptions,
} from "@/types/config";
import { formatDiagnostic } from "@/utils/format-unknown-error";

export interface RuntimeBridge {
  connection: CdpConnection;
  session: CDPSession;
  registry: ExecutionContextRegistry;
  close(): Promise<void>;
}

/**
 * Connects to a DevTools endpoint and starts tracking the execution contexts
 * of the page (or of `targetId`, attached through the browser endpoint).
 */
export async function connectRuntimeBridge(
  options: RuntimeBridgeOptions = {}
): Promise<RuntimeBridge> {
  const config = resolveRuntimeBridgeConfig(options);
  setDebugOptions(config.debugOptions, config.debug);

  const connection = await CdpConnection.connect(config.wsEndpoint);
  try {
    const session = config.targetId
      ? await connection.attachToTarget(config.targetId)
      : connection.root;
    const registry = new ExecutionContextRegistry(session, {
      worlds: config.worlds,
      contextWaitTimeoutMs: config.contextWaitTimeoutMs,
    });
    await registry.enable();

    return {
      connection,
      session,
      registry,
      close: async () => {
        registry.dispose();
        await connection.close();
      },
    };
  } catch (error) {
    try {
      await connection.close();
    } catch (closeError) {
      console.warn(
        `[CDP][Bridge] Failed to close connection after setup error: ${formatDiagnostic(closeError)}`
      );
    }
    throw error;
  }
}
