/**
 * Basic usage example for the runtime bridge
 *
 * Start Chrome with --remote-debugging-port=9222, copy a page's
 * webSocketDebuggerUrl from http://127.0.0.1:9222/json and run with
 * CDP_WS_ENDPOINT set to it.
 */

import { connectRuntimeBridge, type CDPSession } from "../../src";

async function main() {
  const bridge = await connectRuntimeBridge({ debug: true });

  try {
    const context = await bridge.registry.waitForFrameContext(
      await mainFrameId(bridge.session)
    );
    if (!context) {
      throw new Error("Main frame has no execution context yet");
    }

    const sum = await context.evaluate("(a, b) => a + b", 1, 2);
    console.log(`1 + 2 = ${String(sum)}`);

    const location = await context.evaluateHandle("() => window.location");
    const href = await location.getProperty("href");
    console.log(`${location.toString()} href: ${String(await href.jsonValue())}`);
    await href.dispose();
    await location.dispose();

    const body = await context.evaluateHandle("() => document.body");
    console.log(`body is an element: ${body.asElement() !== null}`);
    await body.dispose();
  } finally {
    await bridge.close();
  }
}

async function mainFrameId(session: CDPSession): Promise<string> {
  const { frameTree } = await session.send<{ frameTree: { frame: { id: string } } }>(
    "Page.getFrameTree"
  );
  return frameTree.frame.id;
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
