/**
 * Chat-service types (local to this service).
 * Transcript and completion types live in @taskchat/shared.
 */

import type { ToolDefinition } from '@taskchat/shared';
import type { z } from 'zod';

// ---------------------------------------------------------------------------
// Tool execution
// ---------------------------------------------------------------------------

/** Raw handler output; dispatch turns it into the tool result text */
export type ToolOutput = string | boolean;

export interface RegisteredTool {
  definition: ToolDefinition;
  /** Argument validators keyed by parameter name */
  parameters: z.ZodRawShape;
  /** Validate the argument bag and run the handler. Throws on invalid input. */
  invoke(input: Record<string, unknown>): Promise<ToolOutput>;
}

// ---------------------------------------------------------------------------
// Conversation
// ---------------------------------------------------------------------------

export type ConversationState =
  | 'awaiting_input'
  | 'requesting_completion'
  | 'direct_reply'
  | 'tool_calling_round'
  | 'terminated';

export type TurnResult =
  | { kind: 'reply'; text: string }
  | { kind: 'tool_round'; text: string; toolCalls: number }
  | { kind: 'failed'; error: string };

export type ExitReason = 'quit' | 'interrupted';
