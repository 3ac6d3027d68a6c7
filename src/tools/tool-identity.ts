import type { ToolIdentity } from '../types.js';

export const TOOL_NAME_SEPARATOR = '-';

const SERVER_NAME_PATTERN = /^[A-Za-z0-9_]+$/;

export function isValidServerName(name: string): boolean {
  return SERVER_NAME_PATTERN.test(name);
}

export function composeToolName(identity: ToolIdentity): string {
  return `${identity.serverName}${TOOL_NAME_SEPARATOR}${identity.toolName}`;
}

/**
 * Split an exposed tool name on the first separator only, so tool names may
 * contain `-` while server names may not.
 */
export function splitToolName(exposedName: string): ToolIdentity | undefined {
  const idx = exposedName.indexOf(TOOL_NAME_SEPARATOR);
  if (idx <= 0 || idx === exposedName.length - 1) return undefined;
  return {
    serverName: exposedName.slice(0, idx),
    toolName: exposedName.slice(idx + 1),
  };
}
