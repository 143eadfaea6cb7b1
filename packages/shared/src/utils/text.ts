/**
 * Chat-text helpers for anything a user typed or a remote source named
 */

const MARKDOWN_SPECIALS = /([\\*_~`|>])/g;
const MASS_MENTIONS = /@(everyone|here)/g;

export function escapeMarkdown(input: string): string {
  return input.replace(MARKDOWN_SPECIALS, '\\$1');
}

/**
 * Break mass mentions with a zero-width space so they render but never ping
 */
export function defuseMentions(input: string): string {
  return input.replace(MASS_MENTIONS, '@\u200B$1');
}

export function escapeAndDefuse(input: string): string {
  return defuseMentions(escapeMarkdown(input));
}
