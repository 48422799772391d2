/**
 * Built-in tools, registered when BUILTIN_TOOLS is on.
 */

import { createClockTool } from "./clock.js";
import type { ToolDefinition } from "../types.js";

export { createClockTool, readClock } from "./clock.js";
export type { ClockReading } from "./clock.js";

export function builtinTools(): ToolDefinition[] {
  return [createClockTool()];
}
