/**
 * Characters stripped from GraphQL query text unless SANITIZE_DENYLIST says otherwise.
 */
export const DEFAULT_DENYLIST = ";&*+#=<>-";

export type Sanitizer = (text: string) => string;

function escapeForCharacterClass(char: string): string {
  return /[\\\]^-]/.test(char) ? `\\${char}` : char;
}

/**
 * Builds a sanitizer that removes every character of `denylist` from its input,
 * keeping the remaining characters in order.
 */
export function createSanitizer(denylist: string = DEFAULT_DENYLIST): Sanitizer {
  const chars = [...new Set(denylist)];
  if (chars.length === 0) {
    return (text) => text;
  }

  const pattern = new RegExp(`[${chars.map(escapeForCharacterClass).join("")}]`, "gu");
  return (text) => text.replace(pattern, "");
}

export const sanitize: Sanitizer = createSanitizer();
