import { createHmac, timingSafeEqual } from "node:crypto";

const SIGNATURE_PREFIX = "sha256=";

/**
 * Check GitHub's `x-hub-signature-256` header against the raw body.
 */
export function verifySignature(
  payload: string,
  signature: string | undefined,
  secret: string,
): boolean {
  if (!signature?.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  const expected = Buffer.from(
    SIGNATURE_PREFIX + createHmac("sha256", secret).update(payload, "utf8").digest("hex"),
  );
  const received = Buffer.from(signature);

  return received.length === expected.length && timingSafeEqual(received, expected);
}
