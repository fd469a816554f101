/**
 * One `[[package]]` entry of a Cargo lockfile.
 */
export interface PackageRecord {
  readonly name: string;
  readonly version: string;
  /** Opaque source descriptor, e.g. `registry+https://...` or `git+https://...#<sha>` */
  readonly source?: string;
  readonly checksum?: string;
}
