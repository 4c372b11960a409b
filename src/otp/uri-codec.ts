/**
 * Parsing and building of `otpauth://` URIs, the interchange format carried by QR codes
 * and pasted text.
 *
 * @module otp/uri-codec
 */

import { OtpError } from '../shared/otp-error';
import { Result, err } from '../shared/result';
import { Credential, CredentialKind } from './interfaces/credential.interface';
import {
  DEFAULT_ALGORITHM,
  DEFAULT_COUNTER,
  DEFAULT_DIGITS,
  DEFAULT_ISSUER,
  DEFAULT_PERIOD,
  validateCredentialFields,
} from './credential.validators';

export const OTPAUTH_SCHEME = 'otpauth://';

const PERCENT_ESCAPE_RUN = /(?:%[0-9A-Fa-f]{2})+/g;

/**
 * Percent-decodes a URI component. `+` is kept literally, matching path semantics.
 * A `%` not followed by two hex digits stays as written, and byte runs that are not
 * valid UTF-8 decode to U+FFFD.
 */
function decodeComponent(value: string): string {
  return value.replace(PERCENT_ESCAPE_RUN, (run) => Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8'));
}

/**
 * First non-empty value of a query parameter. Empty values count as absent.
 */
function firstParam(params: URLSearchParams, key: string): string | undefined {
  return params.getAll(key).find((value) => value.length > 0);
}

/**
 * Splits `otpauth://authority/path?query#fragment` into its three parts.
 */
function splitUri(uri: string): { authority: string; path: string; query: string } {
  const rest = uri.slice(OTPAUTH_SCHEME.length);
  const withoutFragment = rest.split('#', 1)[0];

  const queryStart = withoutFragment.indexOf('?');
  const beforeQuery = queryStart === -1 ? withoutFragment : withoutFragment.slice(0, queryStart);
  const query = queryStart === -1 ? '' : withoutFragment.slice(queryStart + 1);

  const pathStart = beforeQuery.indexOf('/');
  const authority = pathStart === -1 ? beforeQuery : beforeQuery.slice(0, pathStart);
  const path = pathStart === -1 ? '' : beforeQuery.slice(pathStart);

  return { authority, path, query };
}

/**
 * Parse an otpauth URI into a credential.
 *
 * The path is `issuer:label` or a bare `label`, split on the first colon. The `issuer`
 * query parameter wins over the path issuer, which wins over `"Unknown"`.
 *
 * @param uri - Candidate URI
 * @returns The credential, or the first validation error encountered
 * @example
 * ```
 * parseOtpauthUri('otpauth://totp/GitHub:user%40example.com?secret=JBSWY3DPEBLW64TMMQ======&issuer=GitHub')
 * // { ok: true, value: { kind: 'totp', label: 'user@example.com', issuer: 'GitHub', ... } }
 * ```
 */
export function parseOtpauthUri(uri: string): Result<Credential, OtpError> {
  if (!uri) {
    return err(new OtpError('InvalidUri', 'URI must be a non-empty string'));
  }

  if (!uri.startsWith(OTPAUTH_SCHEME)) {
    return err(new OtpError('InvalidUri', "URI must start with 'otpauth://'"));
  }

  const { authority, path, query } = splitUri(uri);

  const kind = authority.toLowerCase();
  if (kind !== 'totp' && kind !== 'hotp') {
    return err(new OtpError('InvalidUri', `Unsupported OTP type: ${kind}`));
  }

  const trimmedPath = path.replace(/^\/+/, '');
  const separator = trimmedPath.indexOf(':');
  const rawIssuer = separator === -1 ? '' : trimmedPath.slice(0, separator).trim();
  const rawLabel = (separator === -1 ? trimmedPath : trimmedPath.slice(separator + 1)).trim();

  const label = decodeComponent(rawLabel);
  const pathIssuer = decodeComponent(rawIssuer);

  const params = new URLSearchParams(query);

  return validateCredentialFields({
    kind: kind satisfies CredentialKind,
    label,
    secret: firstParam(params, 'secret'),
    issuer: firstParam(params, 'issuer') || pathIssuer || DEFAULT_ISSUER,
    algorithm: firstParam(params, 'algorithm') ?? DEFAULT_ALGORITHM,
    digits: firstParam(params, 'digits') ?? DEFAULT_DIGITS,
    period: firstParam(params, 'period') ?? DEFAULT_PERIOD,
    counter: firstParam(params, 'counter') ?? DEFAULT_COUNTER,
  });
}

/**
 * Build the otpauth URI for a credential.
 *
 * The result is not byte-identical to whatever URI the credential was parsed from, but
 * parsing it yields an equal credential.
 */
export function buildOtpauthUri(credential: Credential): string {
  const issuer = encodeURIComponent(credential.issuer);
  const label = encodeURIComponent(credential.label);

  const params = [
    `secret=${credential.secret}`,
    `issuer=${issuer}`,
    `algorithm=${credential.algorithm}`,
    `digits=${credential.digits}`,
    credential.kind === 'totp' ? `period=${credential.period}` : `counter=${credential.counter}`,
  ];

  return `${OTPAUTH_SCHEME}${credential.kind}/${issuer}:${label}?${params.join('&')}`;
}

/**
 * Validate a URI without keeping the parsed credential.
 */
export function validateOtpauthUri(uri: string): { valid: boolean; error?: string } {
  const result = parseOtpauthUri(uri);
  return result.ok ? { valid: true } : { valid: false, error: result.error.message };
}
