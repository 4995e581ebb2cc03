/**
 * Token budgeting for grading prompts.
 *
 * Grading prompts embed whole diffs and transcripts, which can exceed the
 * judge's context window. Oversized prompts are cut down by a
 * characters-per-token estimate instead of re-tokenizing until they fit, so
 * the number of tokens actually removed is approximate.
 */

import { encode } from "gpt-tokenizer";

// =============================================================================
// MODEL CONTEXT WINDOWS
// =============================================================================

/** Tokens kept free for the judge's reply */
export const RESPONSE_BUFFER_TOKENS = 1000;

/** Context length assumed for models missing from the table */
export const DEFAULT_CONTEXT_LENGTH = 8192;

const CONTEXT_LENGTHS: Record<string, number> = {
  "gpt-4-1106-preview": 128000,
  "gpt-4-0125-preview": 128000,
  "gpt-4-turbo": 128000,
  "gpt-4-32k": 32768,
  "gpt-4": 8192,
  "gpt-4o": 128000,
  "gpt-4o-mini": 128000,
  "gpt-4.1": 1047576,
  "gpt-3.5-turbo": 16385,
  "o1": 200000,
  "o3-mini": 200000,
  "claude-3-5-sonnet": 200000,
  "claude-3-opus": 200000,
  "claude-sonnet-4": 200000,
};

/**
 * Look up a model's context window. Dated or suffixed ids
 * (e.g. "gpt-4o-2024-08-06") resolve to their longest listed prefix.
 */
export function getContextLength(model: string): number {
  const exact = CONTEXT_LENGTHS[model];
  if (exact !== undefined) return exact;

  let best: string | undefined;
  for (const name of Object.keys(CONTEXT_LENGTHS)) {
    if (model.startsWith(name) && (!best || name.length > best.length)) {
      best = name;
    }
  }
  return best ? CONTEXT_LENGTHS[best] ?? DEFAULT_CONTEXT_LENGTH : DEFAULT_CONTEXT_LENGTH;
}

// =============================================================================
// TOKEN COUNTING
// =============================================================================

export interface PromptMessage {
  role: "system" | "user";
  content: string;
}

/** System instructions followed by the content to grade */
export type GradingPrompt = [PromptMessage, PromptMessage];

// Chat formatting overhead, as documented for OpenAI chat models
const TOKENS_PER_MESSAGE = 3;
const TOKENS_PER_REPLY = 3;

/** Special-token markup in graded content (`<|endoftext|>`) is counted as text */
function countTextTokens(text: string): number {
  return encode(text, { disallowedSpecial: new Set() }).length;
}

export function countPromptTokens(messages: readonly PromptMessage[]): number {
  let total = TOKENS_PER_REPLY;
  for (const message of messages) {
    total += TOKENS_PER_MESSAGE + countTextTokens(message.role) + countTextTokens(message.content);
  }
  return total;
}

// =============================================================================
// TRUNCATION
// =============================================================================

export interface TokenBudgetOptions {
  countTokens?: (messages: readonly PromptMessage[]) => number;
  contextLength?: (model: string) => number;
  /** Whether to log the truncation warning (default: true) */
  verbose?: boolean;
}

export interface TruncationInfo {
  tokens: number;
  maxTokens: number;
  wasTruncated: boolean;
  charsRemoved: number;
}

export interface BudgetedPrompt {
  messages: GradingPrompt;
  truncation: TruncationInfo;
}

/**
 * Fit a grading prompt into the model's context window, leaving room for
 * the response. Only the content message is shortened, from its end.
 *
 * The characters-per-token ratio is taken over both messages, so the
 * untouched system message skews the estimate.
 */
export function fitPromptToContext(
  messages: GradingPrompt,
  model: string,
  options: TokenBudgetOptions = {}
): BudgetedPrompt {
  const { countTokens = countPromptTokens, contextLength = getContextLength, verbose = true } = options;

  const tokens = countTokens(messages);
  const maxTokens = contextLength(model) - RESPONSE_BUFFER_TOKENS;

  if (tokens <= maxTokens) {
    return {
      messages,
      truncation: { tokens, maxTokens, wasTruncated: false, charsRemoved: 0 },
    };
  }

  if (verbose) {
    console.warn("[Grader] Prompt too long! Truncating... (this may affect results)");
  }

  const [system, content] = messages;
  const totalChars = system.content.length + content.content.length;
  const charsPerToken = totalChars / tokens;
  const charsToRemove = Math.floor(charsPerToken * (tokens - maxTokens));
  const kept = content.content.slice(0, Math.max(0, content.content.length - charsToRemove));

  return {
    messages: [system, { ...content, content: kept }],
    truncation: {
      tokens,
      maxTokens,
      wasTruncated: true,
      charsRemoved: content.content.length - kept.length,
    },
  };
}
