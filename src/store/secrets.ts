import type { Credentials } from '../types';

/**
 * Opaque credential storage. Implementations decide how values are kept at rest;
 * callers only rely on values round-tripping unchanged.
 */
export interface SecretStore {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  delete(key: string): void;
}

export class MemorySecretStore implements SecretStore {
  private readonly values = new Map<string, string>();

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  delete(key: string): void {
    this.values.delete(key);
  }
}

const FIELDS = ['username', 'password', 'apiKey'] as const;

type CredentialField = (typeof FIELDS)[number];

function secretKey(targetName: string, field: CredentialField): string {
  return `target/${targetName}/${field}`;
}

/**
 * Target credentials on top of a SecretStore
 */
export class CredentialVault {
  constructor(private readonly secrets: SecretStore) {}

  get(targetName: string): Credentials {
    const credentials: Credentials = {};
    for (const field of FIELDS) {
      const value = this.secrets.get(secretKey(targetName, field));
      if (value) credentials[field] = value;
    }
    return credentials;
  }

  /** Fields left undefined are kept; an empty string clears the field */
  set(targetName: string, update: Credentials): void {
    for (const field of FIELDS) {
      const value = update[field];
      if (value === undefined) continue;
      if (value === '') {
        this.secrets.delete(secretKey(targetName, field));
      } else {
        this.secrets.set(secretKey(targetName, field), value);
      }
    }
  }

  clear(targetName: string): void {
    for (const field of FIELDS) {
      this.secrets.delete(secretKey(targetName, field));
    }
  }

  hasManualCredentials(targetName: string): boolean {
    const { username, password } = this.get(targetName);
    return Boolean(username && password);
  }

  hasAnyCredentials(targetName: string): boolean {
    return this.hasManualCredentials(targetName) || Boolean(this.get(targetName).apiKey);
  }
}
