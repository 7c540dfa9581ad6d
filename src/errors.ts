export type PackagerErrorCode =
  | 'SOURCE_UNREADABLE'
  | 'ENTRY_UNRESOLVABLE'
  | 'UNSUPPORTED_FORMAT'
  | 'BACKEND_UNAVAILABLE'
  | 'BACKEND_INVOCATION_FAILED'
  | 'BANNER_INJECTION_FAILED'
  | 'BUILD_CANCELLED';

/** Codes that abort a build as soon as they are raised. */
export const FATAL_CODES: ReadonlySet<PackagerErrorCode> = new Set([
  'ENTRY_UNRESOLVABLE',
  'UNSUPPORTED_FORMAT',
  'BACKEND_UNAVAILABLE',
]);

export type PackagerErrorDetails = {
  path?: string;
  value?: string;
  tool?: string;
  exitCode?: number | null;
  cause?: string;
  /** Captured backend stdout + stderr, verbatim. */
  output?: string;
};

export class PackagerError extends Error {
  readonly code: PackagerErrorCode;
  readonly details?: PackagerErrorDetails;

  constructor(code: PackagerErrorCode, message: string, details?: PackagerErrorDetails) {
    super(message);
    this.name = 'PackagerError';
    this.code = code;
    this.details = details;
  }

  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }
}

export function isPackagerError(err: unknown): err is PackagerError {
  return err instanceof PackagerError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
