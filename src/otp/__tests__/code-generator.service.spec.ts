import { Test, TestingModule } from '@nestjs/testing';
import { CODE_UNAVAILABLE, CodeGeneratorService } from '../code-generator.service';
import type { HotpCredential, TotpCredential } from '../interfaces/credential.interface';
import { OtpError } from '../../shared/otp-error';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

// ASCII "12345678901234567890", repeated to 32 and 64 bytes for the SHA256 and SHA512 test keys
const SHA1_SECRET = 'GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ';
const SHA256_SECRET = 'GEZDGNBVGY3TQOJQ'.repeat(3) + 'GEZA====';
const SHA512_SECRET = 'GEZDGNBVGY3TQOJQ'.repeat(6) + 'GEZDGNA=';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('CodeGeneratorService', () => {
  let service: CodeGeneratorService;
  const restoreLogger = silenceNestLogger();

  afterAll(() => restoreLogger());

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [CodeGeneratorService],
    }).compile();

    service = module.get<CodeGeneratorService>(CodeGeneratorService);
  });

  describe('generateHotp', () => {
    it.each([
      [0, '755224'],
      [1, '287082'],
      [2, '359152'],
      [9, '520489'],
    ])('should match the RFC 4226 value for counter %d', (counter, expected) => {
      expect(service.generateHotp(SHA1_SECRET, counter, 'SHA1', 6)).toBe(expected);
    });

    it('should reject an unsupported algorithm', () => {
      expect(() => service.generateHotp(SHA1_SECRET, 0, 'SHA3', 6)).toThrow(OtpError);
      expect(() => service.generateHotp(SHA1_SECRET, 0, 'SHA3', 6)).toThrow('Unsupported algorithm: SHA3');
    });

    it('should reject an undecodable secret', () => {
      const error = captureError(() => service.generateHotp('NOT!BASE32', 0, 'SHA1', 6));
      expect(error).toBeInstanceOf(OtpError);
      expect(error).toHaveProperty('code', 'CodeGenerationError');
    });
  });

  describe('generateTotp', () => {
    it.each([
      [59, 'SHA1', SHA1_SECRET, '94287082'],
      [59, 'SHA256', SHA256_SECRET, '46119246'],
      [59, 'SHA512', SHA512_SECRET, '90693936'],
      [1111111109, 'SHA1', SHA1_SECRET, '07081804'],
      [1111111109, 'SHA256', SHA256_SECRET, '68084774'],
      [1111111109, 'SHA512', SHA512_SECRET, '25091201'],
    ])('should match the RFC 6238 value at T=%d with %s', (seconds, algorithm, secret, expected) => {
      expect(service.generateTotp(secret, seconds * 1000, algorithm, 8, 30).code).toBe(expected);
    });

    it('should report the seconds left in the window', () => {
      expect(service.generateTotp(SHA1_SECRET, 59_000, 'SHA1', 6, 30).remainingSeconds).toBe(1);
      expect(service.generateTotp(SHA1_SECRET, 60_000, 'SHA1', 6, 30).remainingSeconds).toBe(30);
    });
  });

  describe('generate', () => {
    const totp: TotpCredential = {
      kind: 'totp',
      label: 'alice',
      issuer: 'Acme',
      secret: SHA1_SECRET,
      algorithm: 'SHA1',
      digits: 6,
      period: 30,
    };

    it('should be deterministic within a window and change across windows', () => {
      const first = service.generate(totp, 31_000);
      const second = service.generate(totp, 59_999);
      const next = service.generate(totp, 60_000);

      expect(first).toEqual({ code: '287082', remainingSeconds: 29 });
      expect(second.code).toBe(first.code);
      expect(next.code).toBe('359152');
    });

    it('should use the stored counter for HOTP without advancing it', () => {
      const hotp: HotpCredential = {
        kind: 'hotp',
        label: 'bob',
        issuer: 'Acme',
        secret: SHA1_SECRET,
        algorithm: 'SHA1',
        digits: 6,
        counter: 1,
      };

      expect(service.generate(hotp)).toEqual({ code: '287082' });
      expect(service.generate(hotp)).toEqual({ code: '287082' });
      expect(hotp.counter).toBe(1);
    });
  });

  describe('generateForDisplay', () => {
    it('should render the sentinel instead of throwing', () => {
      const broken: TotpCredential = {
        kind: 'totp',
        label: 'broken',
        issuer: 'Acme',
        secret: '11111111',
        algorithm: 'SHA1',
        digits: 6,
        period: 30,
      };

      expect(service.generateForDisplay(broken, 0)).toEqual({ code: CODE_UNAVAILABLE });
    });
  });

  describe('computeTimeCode', () => {
    it('should default to SHA512 with 6 digits and a 30 second period', () => {
      expect(service.computeTimeCode(SHA512_SECRET, 59_000)).toBe('693936');
    });

    it('should honour an explicit algorithm', () => {
      expect(service.computeTimeCode(SHA1_SECRET, 59_000, { algorithm: 'SHA1', digits: 8 })).toBe('94287082');
    });
  });

  describe('generateSecret', () => {
    it('should return an unpadded Base32 secret of the requested size', () => {
      expect(service.generateSecret()).toMatch(/^[A-Z2-7]{32}$/);
      expect(service.generateSecret(10)).toMatch(/^[A-Z2-7]{16}$/);
    });

    it('should return a different secret on each call', () => {
      expect(service.generateSecret()).not.toBe(service.generateSecret());
    });
  });
});
