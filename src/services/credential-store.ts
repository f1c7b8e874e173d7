/**
 * Credential Store
 * Durable persistence point for the refreshable credential. No policy lives here.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Credential } from '../types/auth.js';
import { loggers } from '../lib/logger.js';

export const CREDENTIALS_FILE = 'credentials.json';

export interface CredentialStore {
  load(): Credential | undefined;
  save(credential: Credential): void;
  clear(): void;
}

/**
 * Narrow parsed JSON to a Credential; anything without an access token is rejected
 */
export function parseCredential(value: unknown): Credential | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }

  const accessToken: unknown = Reflect.get(value, 'accessToken');
  const refreshToken: unknown = Reflect.get(value, 'refreshToken');
  const expiresAt: unknown = Reflect.get(value, 'expiresAt');

  if (typeof accessToken !== 'string' || accessToken.trim() === '') {
    return undefined;
  }
  if (typeof expiresAt !== 'number' || !Number.isFinite(expiresAt)) {
    return undefined;
  }

  return {
    accessToken,
    refreshToken: typeof refreshToken === 'string' && refreshToken !== '' ? refreshToken : undefined,
    expiresAt,
  };
}

/**
 * JSON file store (mode 0600)
 */
export class FileCredentialStore implements CredentialStore {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  load(): Credential | undefined {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        loggers.store.warn('Credential file unreadable', { path: this.filePath });
      }
      return undefined;
    }

    try {
      const credential = parseCredential(JSON.parse(content));
      if (!credential) {
        loggers.store.warn('Credential file has no usable token', { path: this.filePath });
      }
      return credential;
    } catch {
      loggers.store.warn('Credential file is not valid JSON', { path: this.filePath });
      return undefined;
    }
  }

  save(credential: Credential): void {
    const dir = path.dirname(this.filePath);
    fs.mkdirSync(dir, { recursive: true });

    // Atomic replace; readers never observe a partial file.
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(credential, null, 2), { encoding: 'utf-8', mode: 0o600 });
    fs.renameSync(tmpPath, this.filePath);
    loggers.store.debug('Credential saved', { path: this.filePath });
  }

  clear(): void {
    fs.rmSync(this.filePath, { force: true });
    loggers.store.debug('Credential cleared', { path: this.filePath });
  }
}

/**
 * Process-lifetime store
 */
export class MemoryCredentialStore implements CredentialStore {
  private credential: Credential | undefined;

  constructor(initial?: Credential) {
    this.credential = initial ? { ...initial } : undefined;
  }

  load(): Credential | undefined {
    return this.credential ? { ...this.credential } : undefined;
  }

  save(credential: Credential): void {
    this.credential = { ...credential };
  }

  clear(): void {
    this.credential = undefined;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
