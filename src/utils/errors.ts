/**
 * Custom error classes for crop planning operations
 */

export class AnalysisError extends Error {
  public readonly code = "ANALYSIS_FAILED";

  constructor(message = "face_analysis_failed") {
    super(message);
    this.name = "AnalysisError";
  }
}

export class DocumentSpecNotFoundError extends Error {
  public readonly code = "DOCUMENT_SPEC_NOT_FOUND";

  constructor(countryCode: string, documentName: string) {
    super(`No document spec for ${countryCode} ${documentName}`);
    this.name = "DocumentSpecNotFoundError";
  }
}

const hasCode = (err: unknown, code: string): boolean =>
  !!err && typeof err === "object" && "code" in err && err.code === code;

/**
 * Type guard to check if an error is an AnalysisError
 */
export const isAnalysisError = (err: unknown): boolean => {
  if (err instanceof AnalysisError) return true;
  return hasCode(err, "ANALYSIS_FAILED");
};

export const isDocumentSpecNotFoundError = (err: unknown): boolean => {
  if (err instanceof DocumentSpecNotFoundError) return true;
  return hasCode(err, "DOCUMENT_SPEC_NOT_FOUND");
};

/**
 * Get error message from unknown error type
 */
export const getErrorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "unknown error";
};
