import { buildOtpauthUri, parseOtpauthUri, validateOtpauthUri } from '../uri-codec';
import type { Credential, HotpCredential, TotpCredential } from '../interfaces/credential.interface';
import type { OtpError } from '../../shared/otp-error';

function expectParsed(uri: string): Credential {
  const result = parseOtpauthUri(uri);
  if (!result.ok) {
    throw new Error(`Expected ${uri} to parse, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

function expectRejected(uri: string): OtpError {
  const result = parseOtpauthUri(uri);
  if (result.ok) {
    throw new Error(`Expected ${uri} to be rejected`);
  }
  return result.error;
}

describe('parseOtpauthUri', () => {
  it('should parse a complete TOTP URI', () => {
    const credential = expectParsed(
      'otpauth://totp/GitHub:user%40example.com?secret=JBSWY3DPEBLW64TMMQ======&issuer=GitHub&algorithm=SHA1&digits=6&period=30',
    );

    expect(credential).toEqual({
      kind: 'totp',
      label: 'user@example.com',
      issuer: 'GitHub',
      secret: 'JBSWY3DPEBLW64TMMQ======',
      algorithm: 'SHA1',
      digits: 6,
      period: 30,
    });
  });

  it('should apply defaults and uppercase the secret', () => {
    const credential = expectParsed('otpauth://TOTP/alice?secret=jbswy3dp');

    expect(credential).toEqual({
      kind: 'totp',
      label: 'alice',
      issuer: 'Unknown',
      secret: 'JBSWY3DP',
      algorithm: 'SHA1',
      digits: 6,
      period: 30,
    });
  });

  it('should parse a HOTP URI and keep only the counter', () => {
    const credential = expectParsed('otpauth://hotp/Acme:bob?secret=JBSWY3DP&counter=5&period=60');

    expect(credential).toEqual({
      kind: 'hotp',
      label: 'bob',
      issuer: 'Acme',
      secret: 'JBSWY3DP',
      algorithm: 'SHA1',
      digits: 6,
      counter: 5,
    });
    expect(credential).not.toHaveProperty('period');
  });

  it('should prefer the issuer parameter over the path issuer', () => {
    const credential = expectParsed('otpauth://totp/PathCorp:bob?secret=JBSWY3DP&issuer=QueryCorp');
    expect(credential.issuer).toBe('QueryCorp');
  });

  it('should treat an empty issuer parameter as absent', () => {
    const credential = expectParsed('otpauth://totp/PathCorp:bob?secret=JBSWY3DP&issuer=');
    expect(credential.issuer).toBe('PathCorp');
  });

  it('should trim path parts and decode the issuer', () => {
    const credential = expectParsed('otpauth://totp/Big%20Corp: bob ?secret=JBSWY3DP');
    expect(credential.issuer).toBe('Big Corp');
    expect(credential.label).toBe('bob');
  });

  it('should uppercase the algorithm', () => {
    const credential = expectParsed('otpauth://totp/bob?secret=JBSWY3DP&algorithm=sha256');
    expect(credential.algorithm).toBe('SHA256');
  });

  it.each([
    ['https://example.com/totp?secret=JBSWY3DP'],
    ['OTPAUTH://totp/bob?secret=JBSWY3DP'],
    ['otpauth://sms/bob?secret=JBSWY3DP'],
    [''],
  ])('should reject %p as InvalidUri', (uri) => {
    expect(expectRejected(uri).code).toBe('InvalidUri');
  });

  it('should keep a malformed percent escape in the label as written', () => {
    expect(expectParsed('otpauth://totp/Acme:bob%ZZ?secret=JBSWY3DP').label).toBe('bob%ZZ');
  });

  it('should decode the valid escapes around a malformed one', () => {
    const credential = expectParsed('otpauth://totp/My%20Co:a%20b%ZZ%40c?secret=JBSWY3DP');

    expect(credential.issuer).toBe('My Co');
    expect(credential.label).toBe('a b%ZZ@c');
  });

  it('should replace a byte run that is not valid UTF-8', () => {
    expect(expectParsed('otpauth://totp/Acme:x%FFy?secret=JBSWY3DP').label).toBe('x\uFFFDy');
  });

  it('should report a missing secret before an empty label', () => {
    const error = expectRejected('otpauth://totp/Acme:?issuer=Acme');
    expect(error.code).toBe('MissingField');
    expect(error.details).toEqual({ field: 'secret' });
  });

  it('should reject an empty label', () => {
    const error = expectRejected('otpauth://totp/Acme:?secret=JBSWY3DP');
    expect(error.code).toBe('MissingField');
    expect(error.details).toEqual({ field: 'label' });
  });

  it('should reject a secret outside the Base32 alphabet', () => {
    expect(expectRejected('otpauth://totp/bob?secret=JBSW1Y3DP').code).toBe('InvalidSecret');
  });

  it('should reject an unknown algorithm', () => {
    const error = expectRejected('otpauth://totp/bob?secret=JBSWY3DP&algorithm=AES');
    expect(error.code).toBe('InvalidAlgorithm');
    expect(error.message).toBe('Invalid algorithm: AES. Must be one of: SHA1, SHA256, SHA512, MD5');
  });

  it.each([['3'], ['11'], ['six'], ['6.5']])('should reject digits=%s', (digits) => {
    expect(expectRejected(`otpauth://totp/bob?secret=JBSWY3DP&digits=${digits}`).code).toBe('InvalidDigits');
  });

  it.each([[4], [10]])('should accept digits=%d', (digits) => {
    expect(expectParsed(`otpauth://totp/bob?secret=JBSWY3DP&digits=${digits}`).digits).toBe(digits);
  });

  it('should reject period=0', () => {
    expect(expectRejected('otpauth://totp/bob?secret=JBSWY3DP&period=0').code).toBe('InvalidPeriod');
  });

  it('should reject counter=-1', () => {
    expect(expectRejected('otpauth://hotp/bob?secret=JBSWY3DP&counter=-1').code).toBe('InvalidCounter');
  });

  it('should validate the counter on TOTP URIs too', () => {
    expect(expectRejected('otpauth://totp/bob?secret=JBSWY3DP&counter=x').code).toBe('InvalidCounter');
  });

  it('should check validation errors in order', () => {
    const error = expectRejected('otpauth://totp/bob?secret=JBSWY3DP&algorithm=AES&digits=3&period=0');
    expect(error.code).toBe('InvalidAlgorithm');
  });
});

describe('buildOtpauthUri', () => {
  const totp: TotpCredential = {
    kind: 'totp',
    label: 'user@example.com',
    issuer: 'Big Corp',
    secret: 'JBSWY3DP',
    algorithm: 'SHA1',
    digits: 6,
    period: 30,
  };

  const hotp: HotpCredential = {
    kind: 'hotp',
    label: 'a:b+c&d',
    issuer: 'Acme',
    secret: 'GEZDGNBVGY3TQOJQ',
    algorithm: 'SHA512',
    digits: 8,
    counter: 0,
  };

  it('should percent-encode issuer and label', () => {
    expect(buildOtpauthUri(totp)).toBe(
      'otpauth://totp/Big%20Corp:user%40example.com?secret=JBSWY3DP&issuer=Big%20Corp&algorithm=SHA1&digits=6&period=30',
    );
  });

  it('should emit the counter for HOTP credentials', () => {
    expect(buildOtpauthUri(hotp)).toBe(
      'otpauth://hotp/Acme:a%3Ab%2Bc%26d?secret=GEZDGNBVGY3TQOJQ&issuer=Acme&algorithm=SHA512&digits=8&counter=0',
    );
  });

  it.each([[totp], [hotp]])('should reparse to an equal credential', (credential) => {
    expect(expectParsed(buildOtpauthUri(credential))).toEqual(credential);
  });
});

describe('validateOtpauthUri', () => {
  it('should report a valid URI', () => {
    expect(validateOtpauthUri('otpauth://totp/bob?secret=JBSWY3DP')).toEqual({ valid: true });
  });

  it('should report the error message for an invalid URI', () => {
    expect(validateOtpauthUri('mailto:bob@example.com')).toEqual({
      valid: false,
      error: "URI must start with 'otpauth://'",
    });
  });
});
