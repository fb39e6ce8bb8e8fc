export class VaultError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VaultError";
  }
}

export class ValidationError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Base for failures raised while opening or checking a blob. */
export class CryptoError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "CryptoError";
  }
}

/** Malformed blob or record: bad Base64, wrong length, unexpected structure. */
export class FormatError extends CryptoError {
  constructor(message = "Invalid key or data.") {
    super(message);
    this.name = "FormatError";
  }
}

/** AES-GCM tag did not verify: wrong key, or the blob was altered. */
export class AuthenticationError extends CryptoError {
  constructor(message = "Invalid key or data.") {
    super(message);
    this.name = "AuthenticationError";
  }
}

export class KeyNotAvailableError extends VaultError {
  constructor(message = "No session key; log in first") {
    super(message);
    this.name = "KeyNotAvailableError";
  }
}

export class OwnershipMismatchError extends VaultError {
  constructor(message = "Item does not belong to this vault") {
    super(message);
    this.name = "OwnershipMismatchError";
  }
}

export class DuplicateUsernameError extends VaultError {
  constructor(username: string) {
    super(`Username already exists: ${username}`);
    this.name = "DuplicateUsernameError";
  }
}

export class KdfError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "KdfError";
  }
}

export class EncryptionError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "EncryptionError";
  }
}

export class NotFoundError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class PersistenceError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "PersistenceError";
  }
}

export class StorageFullError extends PersistenceError {
  constructor(message = "Storage quota exceeded") {
    super(message);
    this.name = "StorageFullError";
  }
}

export class NotSupportedError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "NotSupportedError";
  }
}

/** Message of a caught value, whatever was thrown. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
