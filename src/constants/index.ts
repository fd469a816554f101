/**
 * Shared constants for the lockvendor CLI application
 */

export const FILE_PATTERNS = {
  CARGO_TOML: 'Cargo.toml',
  CARGO_CHECKSUM_JSON: '.cargo-checksum.json',
  DEFAULT_OUTPUT: 'generated-sources.json',
  CONFIG_FILES: ['lockvendor.jsonc', 'lockvendor.json']
} as const;

export const DEFAULT_PATHS = {
  VENDOR_DIR: 'vendor',
  GIT_CHECKOUT_DIR: 'git-checkouts',
  /** Where flatpak-builder places the vendor configuration */
  CARGO_HOME: 'cargo',
  CARGO_CONFIG_FILENAME: 'config'
} as const;

export const SOURCE_PREFIXES = {
  REGISTRY: 'registry+',
  SPARSE: 'sparse+',
  GIT: 'git+',
  PATH: 'path+'
} as const;

export const CRATES_IO = {
  INDEX_URLS: [
    'https://github.com/rust-lang/crates.io-index',
    'https://index.crates.io/'
  ],
  DOWNLOAD_BASE: 'https://static.crates.io/crates',
  SOURCE_NAME: 'crates-io'
} as const;

export const VENDORED_SOURCES = 'vendored-sources';

export const COMMIT_SHORT_LENGTH = 7;

export const RESOLVER_DEFAULTS = {
  CONCURRENCY: 4,
  RETRIES: 3,
  TIMEOUT_MS: 30_000,
  BACKOFF_MS: 500,
  /** Upper bound on a server-requested Retry-After wait */
  MAX_RETRY_AFTER_MS: 60_000
} as const;

export const USER_AGENT = 'lockvendor';
