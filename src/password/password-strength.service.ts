import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_PASSWORD_MIN_LENGTH, DEFAULT_PASSWORD_MIN_SCORE } from '../config/config.constants';
import { OtpError } from '../shared/otp-error';

export type StrengthLevel = 'Very Weak' | 'Weak' | 'Fair' | 'Good' | 'Strong';

export interface PasswordStrength {
  score: number;
  level: StrengthLevel;
  feedback: string[];
  color: string;
}

const LENGTH_STEPS = [8, 12, 16];
const LENGTH_POINTS = 10;
const CLASS_POINTS = 15;
const REPEAT_PENALTY = 10;
const SEQUENCE_PENALTY = 5;

const SPECIAL_CHARACTERS = /[!@#$%^&*()_+\-=[\]{};:'",.<>?/\\|`~]/;
const REPEATED_CHARACTER = /(.)\1{2,}/u;
const ASCENDING_SEQUENCE = /012|123|234|345|456|567|678|789|abc|bcd|cde/;

const LEVELS: ReadonlyArray<{ below: number; level: StrengthLevel; color: string }> = [
  { below: 20, level: 'Very Weak', color: '#ff0000' },
  { below: 40, level: 'Weak', color: '#ff6600' },
  { below: 60, level: 'Fair', color: '#ffcc00' },
  { below: 80, level: 'Good', color: '#99cc00' },
];
const STRONG = { level: 'Strong', color: '#00cc00' } as const;

const CHARACTER_CLASSES: ReadonlyArray<{ pattern: RegExp; hint: string }> = [
  { pattern: /[a-z]/, hint: 'Add lowercase letters (a-z)' },
  { pattern: /[A-Z]/, hint: 'Add uppercase letters (A-Z)' },
  { pattern: /\d/, hint: 'Add numbers (0-9)' },
  { pattern: SPECIAL_CHARACTERS, hint: 'Add special characters (!@#$%^&*)' },
];

/**
 * Scores candidate master passwords and gates which ones may protect the vault.
 */
@Injectable()
export class PasswordStrengthService {
  private readonly minLength: number;
  private readonly minScore: number;

  constructor(private readonly configService: ConfigService) {
    this.minLength = this.configService.get<number>('otpv.password.minLength', DEFAULT_PASSWORD_MIN_LENGTH);
    this.minScore = this.configService.get<number>('otpv.password.minScore', DEFAULT_PASSWORD_MIN_SCORE);
  }

  /**
   * Additive 0-100 score with a level, a colour hint and ordered improvement hints.
   */
  score(password: string): PasswordStrength {
    if (!password) {
      return { score: 0, level: 'Very Weak', feedback: ['Password is empty'], color: '#ff0000' };
    }

    const length = Array.from(password).length;
    const feedback: string[] = [];
    let score = 0;

    for (const step of LENGTH_STEPS) {
      if (length >= step) {
        score += LENGTH_POINTS;
      }
    }
    if (length < LENGTH_STEPS[0]) {
      feedback.push(`Password should be at least ${LENGTH_STEPS[0]} characters (currently ${length})`);
    }

    for (const { pattern, hint } of CHARACTER_CLASSES) {
      if (pattern.test(password)) {
        score += CLASS_POINTS;
      } else {
        feedback.push(hint);
      }
    }

    if (REPEATED_CHARACTER.test(password)) {
      score -= REPEAT_PENALTY;
      feedback.push('Avoid repeating characters');
    }

    if (ASCENDING_SEQUENCE.test(password.toLowerCase())) {
      score -= SEQUENCE_PENALTY;
      feedback.push('Avoid sequential characters');
    }

    score = Math.max(0, Math.min(100, score));
    const band = LEVELS.find(({ below }) => score < below) ?? STRONG;

    return { score, level: band.level, feedback, color: band.color };
  }

  /**
   * Length and score gate applied before a password may key the vault.
   */
  isAcceptable(password: string): boolean {
    return Array.from(password).length >= this.minLength && this.score(password).score >= this.minScore;
  }

  /**
   * Same gate as {@link isAcceptable}, with a confirmation check between the length
   * and score checks.
   *
   * @throws {OtpError} `WeakPassword` or `PasswordMismatch`
   */
  assertAcceptable(password: string, confirmation?: string): void {
    if (Array.from(password).length < this.minLength) {
      throw new OtpError('WeakPassword', `Password must be at least ${this.minLength} characters long`);
    }

    if (confirmation !== undefined && password !== confirmation) {
      throw new OtpError('PasswordMismatch', 'Passwords do not match');
    }

    const { score } = this.score(password);
    if (score < this.minScore) {
      throw new OtpError(
        'WeakPassword',
        `Password is not strong enough (score ${score}, needs at least ${this.minScore})`,
        { score },
      );
    }
  }
}
