import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import * as fs from 'fs';
import * as path from 'path';
import { VaultService } from '../vault.service';
import { QR_CODEC, QrCodec } from '../interfaces/host-adapters.interface';
import { MasterKeyService } from '../master-key.service';
import { VaultStorageService } from '../storage/vault-storage.service';
import { VaultLock } from '../storage/vault-lock';
import { SessionService } from '../../session/session.service';
import { SessionState } from '../../session/interfaces';
import { CryptoService } from '../../crypto/crypto.service';
import { PasswordStrengthService } from '../../password/password-strength.service';
import { CodeGeneratorService } from '../../otp/code-generator.service';
import { OtpError } from '../../shared/otp-error';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import { createTempDir, createTestConfigService, removeTempDir } from '../../../test/helpers/test-config';

const PASSWORD = 'Str0ng!Pass1234';
/** RFC 6238 / RFC 4226 test secret "12345678901234567890" */
const RFC_SECRET = 'GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ';
const ALICE_URI = `otpauth://totp/Example:alice?secret=${RFC_SECRET}&issuer=Example&digits=8`;
const BOB_URI = `otpauth://hotp/Example:bob?secret=${RFC_SECRET}&counter=1`;

/** Stand-in codec: the "image" is the text behind a marker. */
const fakeQrCodec: QrCodec = {
  imageFromText: (text) => Promise.resolve(Buffer.from(`QR:${text}`, 'utf8')),
  textFromImage: (image) => {
    const text = image.toString('utf8');
    return Promise.resolve(text.startsWith('QR:') ? text.slice(3) : null);
  },
};

async function captureError(promise: Promise<unknown>): Promise<OtpError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof OtpError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

describe('VaultService', () => {
  let service: VaultService;
  let sessionService: SessionService;
  let cryptoService: CryptoService;
  let vaultDir: string;
  const restoreLogger = silenceNestLogger();

  afterAll(() => restoreLogger());

  const createModule = async (qrCodec: QrCodec | null = fakeQrCodec): Promise<void> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        VaultService,
        SessionService,
        MasterKeyService,
        VaultStorageService,
        VaultLock,
        CryptoService,
        PasswordStrengthService,
        CodeGeneratorService,
        { provide: EventEmitter2, useValue: new EventEmitter2() },
        { provide: ConfigService, useValue: createTestConfigService(vaultDir) },
        { provide: QR_CODEC, useValue: qrCodec },
      ],
    }).compile();

    service = module.get<VaultService>(VaultService);
    sessionService = module.get<SessionService>(SessionService);
    cryptoService = module.get<CryptoService>(CryptoService);
    sessionService.onModuleInit();
  };

  beforeEach(async () => {
    vaultDir = createTempDir();
    await createModule();
    await sessionService.setup(PASSWORD);
  });

  afterEach(() => {
    removeTempDir(vaultDir);
  });

  describe('importUri', () => {
    it('should store the credential under its sanitized label', async () => {
      const summary = await service.importUri(ALICE_URI);

      expect(summary.name).toBe('alice');
      expect(fs.existsSync(path.join(vaultDir, 'alice.enc'))).toBe(true);
      expect(service.getCredential('alice', 59_000)).toEqual({
        name: 'alice',
        kind: 'totp',
        label: 'alice',
        issuer: 'Example',
        algorithm: 'SHA1',
        digits: 8,
        period: 30,
        code: '94287082',
        remainingSeconds: 1,
      });
    });

    it('should replace unsafe characters in the name', async () => {
      const summary = await service.importUri(`otpauth://totp/Acme:Jane%20Doe%2Fwork?secret=${RFC_SECRET}`);

      expect(summary.name).toBe('Jane_Doe_work');
      expect(summary.label).toBe('Jane Doe/work');
    });

    it('should summarize HOTP credentials with their counter', async () => {
      await service.importUri(BOB_URI);

      expect(service.getCredential('bob')).toEqual({
        name: 'bob',
        kind: 'hotp',
        label: 'bob',
        issuer: 'Example',
        algorithm: 'SHA1',
        digits: 6,
        counter: 1,
        code: '287082',
      });
    });

    it('should refuse an existing name unless overwrite is set', async () => {
      await service.importUri(ALICE_URI);

      const error = await captureError(service.importUri(ALICE_URI.replace('issuer=Example', 'issuer=Other')));
      expect(error.code).toBe('CredentialExists');
      expect(error.message).toBe('A credential named "alice" already exists');

      const summary = await service.importUri(ALICE_URI.replace('issuer=Example', 'issuer=Other'), true);
      expect(summary.issuer).toBe('Other');
    });

    it('should refuse a name whose file exists but did not load', async () => {
      fs.writeFileSync(path.join(vaultDir, 'alice.enc'), 'not an envelope');

      await expect(service.importUri(ALICE_URI)).rejects.toMatchObject({ code: 'CredentialExists' });
    });

    it('should surface parse errors', async () => {
      await expect(service.importUri('https://example.com')).rejects.toMatchObject({
        code: 'InvalidUri',
        message: "URI must start with 'otpauth://'",
      });
    });

    it('should require an unlocked session', async () => {
      sessionService.lock();

      await expect(service.importUri(ALICE_URI)).rejects.toMatchObject({ code: 'SessionLocked' });
    });
  });

  describe('listCredentials', () => {
    it('should sort by name', async () => {
      await service.importUri(BOB_URI);
      await service.importUri(ALICE_URI);

      expect(service.listCredentials(59_000).map((entry) => [entry.name, entry.code])).toEqual([
        ['alice', '94287082'],
        ['bob', '287082'],
      ]);
    });

    it('should survive an unlock from disk', async () => {
      await service.importUri(ALICE_URI);
      sessionService.lock();
      await sessionService.unlock(PASSWORD);

      expect(service.listCredentials().map((entry) => entry.name)).toEqual(['alice']);
    });
  });

  describe('getUri', () => {
    it('should build the canonical URI', async () => {
      await service.importUri(ALICE_URI);

      expect(service.getUri('alice')).toBe(
        `otpauth://totp/Example:alice?secret=${RFC_SECRET}&issuer=Example&algorithm=SHA1&digits=8&period=30`,
      );
    });

    it('should report unknown names', () => {
      expect(() => service.getUri('nobody')).toThrow('Credential "nobody" not found');
    });
  });

  describe('deleteCredential', () => {
    it('should remove the file and the cached credential', async () => {
      await service.importUri(ALICE_URI);

      await service.deleteCredential('alice');

      expect(fs.existsSync(path.join(vaultDir, 'alice.enc'))).toBe(false);
      expect(service.listCredentials()).toEqual([]);
      await expect(service.deleteCredential('alice')).rejects.toMatchObject({ code: 'CredentialNotFound' });
    });

    it('should delete by the label a name was derived from', async () => {
      const uri = `otpauth://totp/Acme:a%20b?secret=${RFC_SECRET}`;
      await service.importUri(uri);

      await service.deleteCredential('a b');

      expect(fs.existsSync(path.join(vaultDir, 'a_b.enc'))).toBe(false);
      expect(service.listCredentials()).toEqual([]);
      await expect(service.importUri(uri)).resolves.toMatchObject({ name: 'a_b' });
    });
  });

  describe('QR export and import', () => {
    it('should encrypt the rendered image under the master password', async () => {
      await service.importUri(ALICE_URI);

      const exported = await service.exportQr('alice');

      expect(exported.name).toBe('alice');
      expect(cryptoService.decryptText(exported.data, PASSWORD)).toEqual({
        ok: true,
        value: `QR:${service.getUri('alice')}`,
      });
    });

    it('should import an encrypted export written as base64 text', async () => {
      await service.importUri(ALICE_URI);
      const exported = await service.exportQr('alice');
      await service.deleteCredential('alice');

      const summary = await service.importQr(Buffer.from(exported.data, 'utf8'));

      expect(summary).toMatchObject({ name: 'alice', issuer: 'Example', digits: 8 });
    });

    it('should import an encrypted export given as raw envelope bytes', async () => {
      await service.importUri(ALICE_URI);
      const exported = await service.exportQr('alice');
      await service.deleteCredential('alice');

      const summary = await service.importQr(Buffer.from(exported.data, 'base64'));

      expect(summary.name).toBe('alice');
    });

    it('should import a plain image', async () => {
      const summary = await service.importQr(Buffer.from(`QR:${BOB_URI}`, 'utf8'));

      expect(summary).toMatchObject({ name: 'bob', kind: 'hotp' });
    });

    it('should reject an image without a QR code', async () => {
      await expect(service.importQr(Buffer.from('holiday photo', 'utf8'))).rejects.toMatchObject({
        code: 'InvalidUri',
        message: 'No QR code found in the image',
      });
    });

    it('should report a missing codec', async () => {
      await createModule(null);
      await sessionService.unlock(PASSWORD);

      await expect(service.exportQr('alice')).rejects.toMatchObject({ code: 'QrUnavailable' });
      await expect(service.importQr(Buffer.from('QR:x'))).rejects.toMatchObject({ code: 'QrUnavailable' });
    });
  });

  describe('generator', () => {
    it('should generate a 160-bit Base32 secret by default', () => {
      expect(service.generateSecret()).toMatch(/^[A-Z2-7]{32}$/);
    });

    it('should reject an out-of-range secret length', () => {
      expect(() => service.generateSecret(5)).toThrow('Secret length must be between 10 and 64 bytes');
    });

    it('should default to SHA1 when previewing a code', () => {
      expect(service.computeCode(RFC_SECRET, { digits: 8 }, 59_000)).toEqual({
        code: '94287082',
        remainingSeconds: 1,
      });
    });
  });

  describe('code snapshot', () => {
    it('should refresh while unlocked and clear on lock', async () => {
      await service.importUri(ALICE_URI);

      const snapshot = await service.refreshCodes(59_000);

      expect(snapshot).toEqual({
        generatedAt: '1970-01-01T00:00:59.000Z',
        entries: [expect.objectContaining({ name: 'alice', code: '94287082' })],
      });
      expect(service.getSnapshot()).toBe(snapshot);

      sessionService.lock();
      service.handleSessionLocked();

      await expect(service.refreshCodes(60_000)).resolves.toBeUndefined();
      expect(() => service.getSnapshot()).toThrow('Session is locked');
    });

    it('should compute a snapshot on demand before the first refresh', async () => {
      await service.importUri(BOB_URI);

      expect(service.getSnapshot(0)).toEqual({
        generatedAt: '1970-01-01T00:00:00.000Z',
        entries: [expect.objectContaining({ name: 'bob', code: '287082' })],
      });
    });

    it('should not serve a stale snapshot after an import or delete', async () => {
      await service.importUri(ALICE_URI);
      await service.refreshCodes(59_000);

      await service.importUri(BOB_URI);
      expect(service.getSnapshot(59_000).entries.map((entry) => entry.name)).toEqual(['alice', 'bob']);

      await service.refreshCodes(59_000);
      await service.deleteCredential('alice');
      expect(service.getSnapshot(59_000).entries.map((entry) => entry.name)).toEqual(['bob']);
    });
  });

  describe('reset', () => {
    it('should empty the vault and return to first run', async () => {
      await service.importUri(ALICE_URI);
      await service.importUri(BOB_URI);

      await expect(service.reset()).resolves.toBe(2);

      expect(sessionService.currentState).toBe(SessionState.UNINITIALIZED);
      expect(fs.readdirSync(vaultDir)).toEqual([]);
    });
  });
});
