export type CliErrorCode =
  | "TENANT_UNREACHABLE"
  | "DOWNLOAD_FAILED"
  | "VALIDATION_ERROR"
  | "UNEXPECTED_ERROR";

/** Process exit code per error code. Scripts may rely on these. */
export const EXIT_CODES: Readonly<Record<CliErrorCode, number>> = {
  TENANT_UNREACHABLE: 1,
  DOWNLOAD_FAILED: 2,
  VALIDATION_ERROR: 1,
  UNEXPECTED_ERROR: 1
};

export function exitCodeHelp() {
  return [
    "Exit codes:",
    "  0  success",
    ...Object.entries(EXIT_CODES).map(([code, exitCode]) => `  ${exitCode}  ${code}`)
  ].join("\n");
}

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: CliErrorCode, message: string, exitCode = 1, details?: Record<string, unknown>) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
  }
}

export function errorEnvelope(code: string, message: string, details?: Record<string, unknown>) {
  return {
    ok: false as const,
    error: {
      code,
      message,
      details
    }
  };
}
