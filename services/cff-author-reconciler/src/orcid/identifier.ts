const ORCID_IN_TEXT = /(\d{4}-\d{4}-\d{4}-\d{3}[\dXx])(?![\dXx])/;
const ORCID_EXACT = /^(?:https?:\/\/(?:www\.)?orcid\.org\/)?(\d{4}-\d{4}-\d{4}-\d{3}[\dXx])\/?$/;

/**
 * ISO 7064 MOD 11-2 check over the first 15 digits.
 */
export function hasValidChecksum(orcid: string): boolean {
  const digits = orcid.replace(/-/g, "").toUpperCase();
  if (!/^\d{15}[\dX]$/.test(digits)) {
    return false;
  }

  let total = 0;
  for (const char of digits.slice(0, 15)) {
    total = (total + Number(char)) * 2;
  }
  const remainder = total % 11;
  const result = (12 - remainder) % 11;
  const expected = result === 10 ? "X" : String(result);

  return digits[15] === expected;
}

/**
 * Accepts a bare id or an orcid.org URL. Returns the bare id, or null when
 * the value is not an ORCID or fails the checksum.
 */
export function parseOrcid(value: string): string | null {
  const match = value.trim().match(ORCID_EXACT);
  if (!match) {
    return null;
  }
  const id = match[1].toUpperCase();
  return hasValidChecksum(id) ? id : null;
}

/**
 * First ORCID-shaped token in free text, such as a profile bio.
 * The checksum is not verified here.
 */
export function extractOrcid(text: string | null | undefined): string | null {
  if (!text) {
    return null;
  }
  const match = text.match(ORCID_IN_TEXT);
  return match ? match[1].toUpperCase() : null;
}

export function toOrcidUrl(orcid: string): string {
  return `https://orcid.org/${orcid}`;
}
