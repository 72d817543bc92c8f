import { verify } from '@octokit/webhooks-methods';

/**
 * GitHub Telegram Relay - Webhook Signature Verifier
 *
 * Checks the `X-Hub-Signature-256` header GitHub attaches to every delivery.
 * The digest is HMAC-SHA256 over the raw request body keyed by the shared
 * secret; @octokit/webhooks-methods computes it and compares in constant time.
 *
 * Outcomes:
 * - no secret configured: accepted (the caller is expected to warn)
 * - header absent or not in `sha256=<hex>` form: rejected
 * - digest mismatch: rejected
 *
 * Never throws.
 *
 * @since 2025
 */

const SIGNATURE_PREFIX = 'sha256=';

export async function verifySignature(
  secret: string | undefined,
  rawBody: string,
  signatureHeader: string | undefined
): Promise<boolean> {
  if (!secret) {
    return true;
  }

  if (!signatureHeader || !signatureHeader.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  try {
    return await verify(secret, rawBody, signatureHeader);
  } catch {
    // verify() throws on empty arguments; that is a mismatch, not a fault
    return false;
  }
}
