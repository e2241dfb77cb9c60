export interface RuntimeDebugOptions {
  /** Log every command sent over the CDP connection. */
  protocol?: boolean;
  handles?: boolean;
  contexts?: boolean;
}

export type DebugFlag = keyof RuntimeDebugOptions;

const DEBUG_FLAGS: DebugFlag[] = ["protocol", "handles", "contexts"];

let currentDebugOptions: RuntimeDebugOptions & { enabled: boolean } = {
  enabled: false,
};

function readBooleanFlag(
  options: RuntimeDebugOptions,
  flag: DebugFlag
): boolean | undefined {
  try {
    const value: unknown = options[flag];
    return typeof value === "boolean" ? value : undefined;
  } catch {
    return undefined;
  }
}

export function setDebugOptions(
  options?: RuntimeDebugOptions,
  enabled = false
): void {
  const next: RuntimeDebugOptions & { enabled: boolean } = { enabled };
  if (options) {
    for (const flag of DEBUG_FLAGS) {
      const value = readBooleanFlag(options, flag);
      if (value !== undefined) {
        next[flag] = value;
      }
    }
  }
  currentDebugOptions = next;
}

export function getDebugOptions(): RuntimeDebugOptions & { enabled: boolean } {
  return currentDebugOptions;
}

/**
 * A flag counts when debugging is enabled and the flag is not switched off.
 */
export function isDebugEnabled(flag: DebugFlag): boolean {
  return currentDebugOptions.enabled && currentDebugOptions[flag] !== false;
}

export function debugLog(flag: DebugFlag, component: string, message: string): void {
  if (isDebugEnabled(flag)) {
    console.log(`[CDP][${component}] ${message}`);
  }
}
