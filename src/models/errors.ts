// Fatal run errors. Per-item directory failures are DirectoryResult values, not exceptions.

export type LabErrorKind =
  | "InvalidModeCombination"
  | "NoAccessGroupsConfigured"
  | "NoRoleGroupsConfigured"
  | "NoNameSeedsConfigured"
  | "ConfigFileUnreadable"
  | "InvalidArgument"
  | "ExhaustedNameSpace"
  | "GroupLocationConflict"
  | "GroupCreationFailed"
  | "DirectoryUnavailable";

export class LabError extends Error {
  readonly kind: LabErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: LabErrorKind, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LabError";
    this.kind = kind;
    this.details = details;
  }
}

export function isLabError(error: unknown, kind?: LabErrorKind): error is LabError {
  return error instanceof LabError && (kind === undefined || error.kind === kind);
}
