/**
 * Tool command results
 *
 * Shape returned by the group chat command surface (`broadcast`,
 * `get_messages`) to the surrounding tool framework.
 */

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type GroupChatCommand = 'broadcast' | 'get_messages';

export const GROUP_CHAT_COMMANDS: readonly GroupChatCommand[] = ['broadcast', 'get_messages'];

export interface ToolResult {
  success: boolean;
  /** Human-readable outcome */
  content: string;
  /** Structured data for the caller */
  metadata?: Record<string, unknown>;
  /** Hint shown to the caller after a failure */
  guidance?: string;
}

export function isGroupChatCommand(value: string): value is GroupChatCommand {
  return GROUP_CHAT_COMMANDS.some((command) => command === value);
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORIES
// ═══════════════════════════════════════════════════════════════════════════

export function successResult(content: string, metadata?: Record<string, unknown>): ToolResult {
  return metadata ? { success: true, content, metadata } : { success: true, content };
}

export function errorResult(
  content: string,
  extra?: { metadata?: Record<string, unknown>; guidance?: string },
): ToolResult {
  return { success: false, content, ...extra };
}
