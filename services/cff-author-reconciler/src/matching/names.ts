const COMBINING_MARKS = /\p{M}/gu;
const PROFILE_URL_PREFIX = /^(?:https?:\/\/)?(?:www\.)?github\.com\//i;
const NOREPLY_EMAIL = /^(?:\d+\+)?([^@]+)@users\.noreply\.github\.com$/i;

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Case-fold, strip diacritics and collapse whitespace so that
 * "  José   Díaz" and "jose diaz" compare equal, as do "Straße" and
 * "STRASSE".
 */
export function foldName(value: string): string {
  return collapseWhitespace(
    value
      .normalize("NFKD")
      .replace(COMBINING_MARKS, "")
      // upper first: "ß" becomes "SS", final "ς" becomes "Σ"
      .toUpperCase()
      .toLowerCase(),
  );
}

/**
 * Reduce an alias or username to a bare, folded handle:
 * "@Alice", "https://github.com/alice/" and "alice" all become "alice".
 */
export function normalizeAlias(value: string): string {
  return value
    .trim()
    .replace(PROFILE_URL_PREFIX, "")
    .replace(/^@/, "")
    .replace(/\/+$/, "")
    .toLowerCase();
}

export function normalizeEmail(value: string): string {
  return value.trim().toLowerCase();
}

export function isNoreplyEmail(email: string): boolean {
  return NOREPLY_EMAIL.test(email.trim());
}

/**
 * GitHub noreply addresses encode the account login.
 */
export function usernameFromNoreplyEmail(email: string): string | null {
  const match = email.trim().match(NOREPLY_EMAIL);
  return match ? match[1].toLowerCase() : null;
}

/**
 * Every login an identity names: its username, plus the one a noreply
 * address encodes.
 */
export function loginsOf(identity: { username?: string; email?: string }): string[] {
  const logins: string[] = [];
  if (identity.username && identity.username.trim() !== "") {
    logins.push(normalizeAlias(identity.username));
  }
  if (identity.email && identity.email.trim() !== "") {
    const implied = usernameFromNoreplyEmail(normalizeEmail(identity.email));
    if (implied && !logins.includes(implied)) {
      logins.push(implied);
    }
  }
  return logins;
}

export interface SplitName {
  givenNames: string;
  familyNames: string;
}

/**
 * Split at the first space. Single-part names return null.
 */
export function splitFullName(fullName: string): SplitName | null {
  const collapsed = collapseWhitespace(fullName);
  const space = collapsed.indexOf(" ");
  if (space === -1) {
    return null;
  }
  return {
    givenNames: collapsed.slice(0, space),
    familyNames: collapsed.slice(space + 1),
  };
}

export function profileUrl(username: string): string {
  return `https://github.com/${normalizeAlias(username)}`;
}
