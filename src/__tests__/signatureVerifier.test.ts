/**
 * Unit tests for webhook signature verification
 */
import { createHmac } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { verifySignature } from '../sdk/github-webhook/SignatureVerifier.js';

const SECRET = 'test-secret';
const BODY = '{"zen":"Keep it logically awesome.","repository":{"full_name":"octocat/hello-world"}}';

function sign(body: string, secret: string = SECRET): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

describe('verifySignature', () => {
  it('should accept a correct signature', async () => {
    await expect(verifySignature(SECRET, BODY, sign(BODY))).resolves.toBe(true);
  });

  it('should reject a signature made with another secret', async () => {
    await expect(verifySignature(SECRET, BODY, sign(BODY, 'other-secret'))).resolves.toBe(false);
  });

  it('should reject a signature over a different body', async () => {
    await expect(verifySignature(SECRET, `${BODY} `, sign(BODY))).resolves.toBe(false);
  });

  it('should reject a header with one digit changed', async () => {
    const header = sign(BODY);
    const last = header.slice(-1) === '0' ? '1' : '0';

    await expect(verifySignature(SECRET, BODY, `${header.slice(0, -1)}${last}`)).resolves.toBe(false);
  });

  it('should reject a missing header', async () => {
    await expect(verifySignature(SECRET, BODY, undefined)).resolves.toBe(false);
  });

  it('should reject a header without the sha256= prefix', async () => {
    const digest = sign(BODY).slice('sha256='.length);

    await expect(verifySignature(SECRET, BODY, digest)).resolves.toBe(false);
    await expect(verifySignature(SECRET, BODY, `sha1=${digest}`)).resolves.toBe(false);
  });

  it('should reject a malformed digest without throwing', async () => {
    await expect(verifySignature(SECRET, BODY, 'sha256=not-hex')).resolves.toBe(false);
  });

  it('should accept anything when no secret is configured', async () => {
    await expect(verifySignature('', BODY, undefined)).resolves.toBe(true);
    await expect(verifySignature(undefined, BODY, 'sha256=deadbeef')).resolves.toBe(true);
  });
});
