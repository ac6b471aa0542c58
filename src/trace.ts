import { resolveMapperOptions } from "./config";

let traceOverride: boolean | undefined;

export function setTraceEnabled(enabled: boolean | undefined): void {
  traceOverride = enabled;
}

/** The last `setTraceEnabled` value, else `PHP_AST_TRACE`. */
export function traceEnabled(): boolean {
  return traceOverride ?? resolveMapperOptions().trace;
}

export function trace(message: string, enabled: boolean = traceEnabled()): void {
  if (!enabled) return;
  console.error(`[trace] ${message}`);
}
