export const VAULT_CONSTANTS = {
  RECORD_VERSION: 1 as const,

  // AES-GCM
  AES: {
    NAME: "AES-GCM" as const,
    LENGTH: 256 as const,
    IV_LENGTH: 12 as const, // 96-bit nonce
    TAG_LENGTH: 16 as const // 128-bit tag
  },

  // PBKDF2-HMAC-SHA-256 (vault keys and password hashes)
  PBKDF2: {
    NAME: "PBKDF2" as const,
    HASH: "SHA-256" as const,
    ITERATIONS: 65536,
    MIN_ITERATIONS: 65536 as const,
    MAX_ITERATIONS: 10_000_000 as const,
    KEY_LEN: 32 // 256-bit
  },

  // Salt for PBKDF2
  SALT_LEN: 16,

  // salt[16] || derived[32]
  PASSWORD_HASH_LEN: 48,

  PASSWORD_GENERATOR: {
    LENGTH: 16,
    ALPHABET: "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789!@#$%^&*()-_=+"
  },

  // Storage
  NAMESPACE: "secret-vault",

  // IndexedDB
  IDB: {
    DB_NAME: "SECRET_VAULT",
    STORE: "records"
  },

  LOG_LEVEL_ENV: "VAULT_LOG_LEVEL",
  DEFAULT_LOG_LEVEL: "warn" as const
};

/** nonce + tag: the shortest blob `decrypt` accepts (empty plaintext). */
export const MIN_BLOB_LEN = VAULT_CONSTANTS.AES.IV_LENGTH + VAULT_CONSTANTS.AES.TAG_LENGTH;
