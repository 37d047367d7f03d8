'use strict';

import { pbkdf2Sync } from 'crypto';

/** Password value that makes the login endpoint answer with its salts. */
export const SALT_REQUEST_SENTINEL = 'seeksalthash';

/** Salt value meaning the router expects the plaintext password. */
export const PLAINTEXT_SALT = 'none';

const PBKDF2_ITERATIONS = 1000;
const PBKDF2_KEY_LENGTH = 16;

export function pbkdf2Hex(password: string, salt: string): string {
  return pbkdf2Sync(
    Buffer.from(password, 'utf8'),
    Buffer.from(salt, 'utf8'),
    PBKDF2_ITERATIONS,
    PBKDF2_KEY_LENGTH,
    'sha256',
  ).toString('hex');
}

/**
 * Final credential for the second login call. The web UI hashes twice:
 * once with the per-user salt, then the hex result again with `saltwebui`.
 */
export function deriveCredential(password: string, salt: string, saltWebUi: string): string {
  if (salt === PLAINTEXT_SALT) {
    return password;
  }

  return pbkdf2Hex(pbkdf2Hex(password, salt), saltWebUi);
}
