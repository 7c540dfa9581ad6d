import type { PackagerError } from '../errors.js';
import type { ImportedName } from '../scanner/scannerTypes.js';

export type SourceUnit = {
  /** Canonical absolute path; the unit's key. */
  path: string;
  /** Module names found by the static scan, in first-occurrence order. */
  importedNames: string[];
  /** Full scan output, members included. */
  imports: ImportedName[];
  /** True once the unit has been scanned (successfully or not). */
  resolved: boolean;
  /** Set when the scan failed; the unit stays in the graph. */
  error?: PackagerError;
};

/**
 * Outcome of resolving one imported name. `external` covers stdlib and
 * third-party modules as well as broken local paths; neither is an error.
 */
export type ImportResolution =
  | { kind: 'local'; name: string; path: string }
  | { kind: 'external'; name: string };

export type DependencyEdge = {
  from: string;
  to: string;
  /** Imported name that produced the edge. */
  name: string;
};

export type DependencyGraph = {
  entry: string;
  root: string;
  /** Keyed by canonical path, in discovery order. */
  units: ReadonlyMap<string, SourceUnit>;
  edges: readonly DependencyEdge[];
  /** Per unit path, the names that did not resolve to a local file. */
  externals: ReadonlyMap<string, readonly string[]>;
  /** SOURCE_UNREADABLE errors of non-entry units. */
  diagnostics: readonly PackagerError[];
};

export type ResolveOptions = {
  /** Project root; defaults to the entry's directory. */
  root?: string;
  /** Source reader forwarded to the scanner. */
  readFile?: (path: string) => string;
};
