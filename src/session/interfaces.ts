import type { VaultKeySource } from '../config/config.constants';
import type { OtpErrorCode } from '../shared/otp-error';

export enum SessionState {
  UNINITIALIZED = 'uninitialized',
  LOCKED = 'locked',
  UNLOCKED = 'unlocked',
  TERMINATED = 'terminated',
}

export const SESSION_EVENTS = {
  LOCKED: 'session.locked',
  UNLOCKED: 'session.unlocked',
  TERMINATED: 'session.terminated',
} as const;

export type LockReason = 'manual' | 'idle' | 'reset';

/**
 * Payload of `session.locked`
 */
export interface SessionLockedEvent {
  reason: LockReason;
  lockedAt: Date;
}

/**
 * Payload of `session.unlocked`
 */
export interface SessionUnlockedEvent {
  credentialCount: number;
  failedFiles: string[];
  unlockedAt: Date;
}

/**
 * Payload of `session.terminated`
 */
export interface SessionTerminatedEvent {
  code: OtpErrorCode;
  reason: string;
  terminatedAt: Date;
}

export interface SessionStatus {
  state: SessionState;
  credentialCount: number;
  /** Files that did not load at the last unlock */
  failedFiles: string[];
  keySource: VaultKeySource;
  idleTimeoutSecs: number;
}
