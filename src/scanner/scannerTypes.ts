export type ImportedName = {
  /**
   * Module as written in the source: dotted (`pkg.mod`), with leading dots
   * for relative imports (`.sibling`, `..`).
   */
  module: string;
  /** Names listed after `from <module> import`; `['*']` for a wildcard, empty for plain `import`. */
  members: string[];
  /** 1-based line of the first occurrence. */
  line: number;
};

export type ScanOptions = {
  /** Source reader; defaults to a UTF-8 `readFileSync`. */
  readFile?: (path: string) => string;
};
