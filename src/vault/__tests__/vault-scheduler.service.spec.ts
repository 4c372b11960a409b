import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import {
  CODE_REFRESH_TASK,
  IDLE_CHECK_TASK,
  IMPORT_SCAN_TASK,
  VaultSchedulerService,
} from '../vault-scheduler.service';
import { VaultService } from '../vault.service';
import { CLIPBOARD_SOURCE, ClipboardSource } from '../interfaces/host-adapters.interface';
import { SessionService } from '../../session/session.service';
import { OtpError } from '../../shared/otp-error';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import { createTestConfigService } from '../../../test/helpers/test-config';

const URI = 'otpauth://totp/Acme:alice?secret=JBSWY3DPEHPK3PXP';

describe('VaultSchedulerService', () => {
  let scheduler: VaultSchedulerService;
  let registry: SchedulerRegistry;
  const restoreLogger = silenceNestLogger();

  const vaultService = {
    refreshCodes: jest.fn(),
    importUri: jest.fn(),
  };
  const sessionService = {
    isUnlocked: jest.fn(),
    checkIdle: jest.fn(),
  };
  const readText = jest.fn<Promise<string | null>, []>();
  const clipboard: ClipboardSource = { readText };

  afterAll(() => restoreLogger());

  const createModule = async (clipboardSource: ClipboardSource | null = clipboard): Promise<void> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        VaultSchedulerService,
        SchedulerRegistry,
        { provide: ConfigService, useValue: createTestConfigService('/tmp/otpv-unused') },
        { provide: VaultService, useValue: vaultService },
        { provide: SessionService, useValue: sessionService },
        { provide: CLIPBOARD_SOURCE, useValue: clipboardSource },
      ],
    }).compile();

    scheduler = module.get<VaultSchedulerService>(VaultSchedulerService);
    registry = module.get<SchedulerRegistry>(SchedulerRegistry);
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    sessionService.isUnlocked.mockReturnValue(true);
    await createModule();
  });

  afterEach(() => {
    scheduler.onModuleDestroy();
  });

  describe('lifecycle', () => {
    it('should register all three tasks with a clipboard source', () => {
      scheduler.onModuleInit();

      expect(registry.getIntervals().sort()).toEqual([CODE_REFRESH_TASK, IDLE_CHECK_TASK, IMPORT_SCAN_TASK]);
    });

    it('should skip the import scan without a clipboard source', async () => {
      await createModule(null);
      scheduler.onModuleInit();

      expect(registry.getIntervals().sort()).toEqual([CODE_REFRESH_TASK, IDLE_CHECK_TASK]);
      expect(scheduler.getImportStatus()).toEqual({ enabled: false });
    });

    it('should remove every task on shutdown', () => {
      scheduler.onModuleInit();
      scheduler.onModuleDestroy();

      expect(registry.getIntervals()).toEqual([]);
    });
  });

  describe('ticks', () => {
    it('should refresh codes through the vault service', async () => {
      await scheduler.refreshCodes(5_000);

      expect(vaultService.refreshCodes).toHaveBeenCalledWith(5_000);
    });

    it('should run the idle check', () => {
      sessionService.checkIdle.mockReturnValue(true);

      scheduler.checkIdle(200_000);

      expect(sessionService.checkIdle).toHaveBeenCalledWith(200_000);
    });
  });

  describe('scanClipboard', () => {
    it('should import a new otpauth URI once', async () => {
      readText.mockResolvedValue(`  ${URI}\n`);
      vaultService.importUri.mockResolvedValue({ name: 'alice' });

      await scheduler.scanClipboard(0);
      await scheduler.scanClipboard(2_000);

      expect(vaultService.importUri).toHaveBeenCalledTimes(1);
      expect(vaultService.importUri).toHaveBeenCalledWith(URI, false);
      expect(scheduler.getImportStatus()).toEqual({
        enabled: true,
        lastCheckedAt: '1970-01-01T00:00:02.000Z',
        lastImported: 'alice',
        lastError: undefined,
      });
    });

    it('should ignore text that is not an otpauth URI', async () => {
      readText.mockResolvedValue('hello world');

      await scheduler.scanClipboard();

      expect(vaultService.importUri).not.toHaveBeenCalled();
    });

    it('should ignore an empty clipboard', async () => {
      readText.mockResolvedValue(null);

      await scheduler.scanClipboard();

      expect(vaultService.importUri).not.toHaveBeenCalled();
    });

    it('should not read the clipboard while locked', async () => {
      sessionService.isUnlocked.mockReturnValue(false);

      await scheduler.scanClipboard();

      expect(readText).not.toHaveBeenCalled();
    });

    it('should record a rejected import', async () => {
      readText.mockResolvedValue(URI);
      vaultService.importUri.mockRejectedValue(
        new OtpError('CredentialExists', 'A credential named "alice" already exists'),
      );

      await scheduler.scanClipboard(0);

      expect(scheduler.getImportStatus()).toMatchObject({
        enabled: true,
        lastError: 'A credential named "alice" already exists',
      });
    });
  });
});
