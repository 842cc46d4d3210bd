/**
 * Provide a fast token estimate used to bound offloaded context.
 *
 * Non-goals:
 * - Produce exact provider-token counts.
 */

export const CHARS_PER_TOKEN = 4;

/**
 * Estimate token usage from plain text length.
 *
 * Invariants:
 * - Pure and deterministic; equals `floor(text.length / 4)`.
 */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}
