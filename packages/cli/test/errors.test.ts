import { describe, expect, it } from "vitest";
import { CliError, errorEnvelope, EXIT_CODES, exitCodeHelp } from "../src/errors.js";

describe("errors", () => {
  it("lists a distinct exit code for download failures in the help text", () => {
    expect(exitCodeHelp()).toBe(
      [
        "Exit codes:",
        "  0  success",
        "  1  TENANT_UNREACHABLE",
        "  2  DOWNLOAD_FAILED",
        "  1  VALIDATION_ERROR",
        "  1  UNEXPECTED_ERROR"
      ].join("\n")
    );
  });

  it("carries the code and exit code into the envelope", () => {
    const error = new CliError("DOWNLOAD_FAILED", "Download of tenant-ca failed (403)", EXIT_CODES.DOWNLOAD_FAILED, {
      status_code: 403
    });

    expect(error.exitCode).toBe(2);
    expect(errorEnvelope(error.code, error.message, error.details)).toEqual({
      ok: false,
      error: { code: "DOWNLOAD_FAILED", message: "Download of tenant-ca failed (403)", details: { status_code: 403 } }
    });
  });
});
