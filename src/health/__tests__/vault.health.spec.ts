import { Test, TestingModule } from '@nestjs/testing';
import { HealthIndicatorService } from '@nestjs/terminus';
import { VaultHealthIndicator } from '../vault.health';
import { VaultStorageService } from '../../vault/storage/vault-storage.service';
import { MasterKeyService } from '../../vault/master-key.service';
import { SessionService } from '../../session/session.service';
import { SessionState } from '../../session/interfaces';
import { createTempDir, removeTempDir } from '../../../test/helpers/test-config';

describe('VaultHealthIndicator', () => {
  let indicator: VaultHealthIndicator;
  let vaultDir: string;

  const storage = { isOpen: jest.fn(), vaultPath: '' };
  const masterKey = { isInitialized: jest.fn() };
  const session = { currentState: SessionState.LOCKED };

  beforeEach(async () => {
    vaultDir = createTempDir();
    storage.vaultPath = vaultDir;
    storage.isOpen.mockReturnValue(true);
    masterKey.isInitialized.mockReturnValue(true);
    session.currentState = SessionState.LOCKED;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        VaultHealthIndicator,
        HealthIndicatorService,
        { provide: VaultStorageService, useValue: storage },
        { provide: MasterKeyService, useValue: masterKey },
        { provide: SessionService, useValue: session },
      ],
    }).compile();

    indicator = module.get<VaultHealthIndicator>(VaultHealthIndicator);
  });

  afterEach(() => {
    removeTempDir(vaultDir);
    jest.clearAllMocks();
  });

  it('should be up with a writable directory', async () => {
    await expect(indicator.isHealthy('vault')).resolves.toEqual({
      vault: { status: 'up', open: true, writable: true, initialized: true, session: 'locked' },
    });
  });

  it('should be down after the session was terminated', async () => {
    session.currentState = SessionState.TERMINATED;

    await expect(indicator.isHealthy('vault')).resolves.toEqual({
      vault: { status: 'down', open: true, writable: true, initialized: true, session: 'terminated' },
    });
  });

  it('should be down before the vault is opened', async () => {
    storage.isOpen.mockReturnValue(false);

    await expect(indicator.isHealthy('vault')).resolves.toEqual({
      vault: { status: 'down', open: false, session: 'locked' },
    });
  });

  it('should be down when the directory is gone', async () => {
    storage.vaultPath = `${vaultDir}-missing`;

    await expect(indicator.isHealthy('vault')).resolves.toMatchObject({
      vault: { status: 'down', writable: false },
    });
  });
});
