import { Test, TestingModule } from '@nestjs/testing';
import { SessionController } from '../session.controller';
import { SessionService } from '../session.service';
import { SessionState, SessionStatus } from '../interfaces';
import { VaultKeySource } from '../../config/config.constants';

describe('SessionController', () => {
  let controller: SessionController;

  const status: SessionStatus = {
    state: SessionState.UNLOCKED,
    credentialCount: 2,
    failedFiles: [],
    keySource: VaultKeySource.PASSWORD,
    idleTimeoutSecs: 180,
  };

  const sessionService = {
    getStatus: jest.fn().mockReturnValue(status),
    setup: jest.fn().mockResolvedValue(status),
    unlock: jest.fn().mockResolvedValue(status),
    lock: jest.fn().mockReturnValue(true),
    changePassword: jest.fn().mockResolvedValue({ succeeded: ['alice'], failed: [], committed: true }),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [SessionController],
      providers: [{ provide: SessionService, useValue: sessionService }],
    }).compile();

    controller = module.get<SessionController>(SessionController);
  });

  it('should return the session status', () => {
    expect(controller.getStatus()).toEqual(status);
  });

  it('should pass the password and confirmation to setup', async () => {
    await expect(controller.setup({ password: 'test-secret', confirmation: 'test-secret' })).resolves.toEqual(status);
    expect(sessionService.setup).toHaveBeenCalledWith('test-secret', 'test-secret');
  });

  it('should unlock with the given password', async () => {
    await controller.unlock({ password: 'test-secret' });
    expect(sessionService.unlock).toHaveBeenCalledWith('test-secret');
  });

  it('should lock manually', () => {
    expect(controller.lock()).toEqual({ locked: true });
    expect(sessionService.lock).toHaveBeenCalledWith('manual');
  });

  it('should change the password', async () => {
    await expect(
      controller.changePassword({ oldPassword: 'test-secret', newPassword: 'test-secret-2' }),
    ).resolves.toEqual({ succeeded: ['alice'], failed: [], committed: true });
    expect(sessionService.changePassword).toHaveBeenCalledWith('test-secret', 'test-secret-2', undefined);
  });
});
