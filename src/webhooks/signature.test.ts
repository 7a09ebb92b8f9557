import { describe, it, expect } from 'vitest';
import { signPayload, verifySignature } from './signature';

const BODY = '{"type":"ping"}';
const EXPECTED = 'sha256=5a325db300c4be4c44b2d95c065fdce8b91830a6e6ce2622d63c301205b83cc3';

describe('signPayload', () => {
  it('produces sha256=<hex hmac> over the exact body', () => {
    expect(signPayload('test-secret', BODY)).toBe(EXPECTED);
  });

  it('changes with the secret and with the body', () => {
    expect(signPayload('other-secret', BODY)).not.toBe(EXPECTED);
    expect(signPayload('test-secret', '{"type": "ping"}')).not.toBe(EXPECTED);
  });
});

describe('verifySignature', () => {
  it('accepts the matching signature', () => {
    expect(verifySignature('test-secret', BODY, EXPECTED)).toBe(true);
  });

  it('rejects a signature made with another secret', () => {
    expect(verifySignature('test-secret', BODY, signPayload('other-secret', BODY))).toBe(false);
  });

  it('rejects a signature of a different length', () => {
    expect(verifySignature('test-secret', BODY, 'sha256=abc')).toBe(false);
    expect(verifySignature('test-secret', BODY, '')).toBe(false);
  });
});
