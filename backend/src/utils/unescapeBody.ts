const escapeSequences: Record<string, string> = {
  n: "\n",
  '"': '"',
  "'": "'",
  "\\": "\\",
};

/**
 * Turn literal escape sequences left in model output into real characters.
 *
 * Examples:
 *   "Hi,\\nSee you"   → "Hi,\nSee you"
 *   'say \\"hi\\"'    → 'say "hi"'
 *   "already clean"   → "already clean"
 */
export function unescapeBody(text: string): string {
  return text.replace(/\\(n|"|'|\\)/g, (_match, sequence: string) => escapeSequences[sequence]);
}
