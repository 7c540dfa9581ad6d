export type CacheEntry = {
  hash: string;
  sourcePath: string;
  moduleName: string;
  /** Artifact file name inside the entry directory. */
  artifact: string;
  pythonPath: string;
  pythonVersion: string;
  optimize: boolean;
  platform: string;
  createdAt: number;
  /**
   * Timestamp (ms since epoch) updated whenever this cache entry is used.
   * This is tracked in metadata to avoid relying on filesystem atime.
   */
  lastAccessAt?: number;
};
