/**
 * Tests for CLI Error Handler
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { Writable } from "node:stream";
import ora from "ora";
import { ZodError } from "zod";
import { handleCommandError } from "../../../src/cli/utils/error-handler.js";
import { DigestCommandOptionsSchema } from "../../../src/cli/utils/validation.js";
import {
  EmptyContentError,
  IngestionError,
  InvalidPatternError,
  PathNotFoundError,
  UnsupportedNodeTypeError,
  ValidationError,
} from "../../../src/ingestion/errors.js";

describe("Error Handler", () => {
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  function expectHandled(error: unknown, heading: string): void {
    expect(() => handleCommandError(error)).toThrow("process.exit called");
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining(heading));
    expect(processExitSpy).toHaveBeenCalledWith(1);
  }

  describe("Option errors", () => {
    it("should list invalid options", () => {
      const result = DigestCommandOptionsSchema.safeParse({ maxSize: "0" });
      const error = result.success ? null : result.error;
      expect(error).toBeInstanceOf(ZodError);

      expectHandled(error, "Invalid Options");
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringContaining("max-size must be at least 1 byte")
      );
    });
  });

  describe("Ingestion errors", () => {
    it("should handle InvalidPatternError", () => {
      expectHandled(new InvalidPatternError("a$b"), "Invalid Pattern");
    });

    it("should handle PathNotFoundError", () => {
      expectHandled(new PathNotFoundError("demo", "/tmp/demo"), "Path Not Found");
      expect(consoleErrorSpy).toHaveBeenCalledWith("\ndemo cannot be found");
    });

    it("should handle EmptyContentError", () => {
      expectHandled(new EmptyContentError("a.txt"), "Empty File");
    });

    it("should handle UnsupportedNodeTypeError", () => {
      expectHandled(new UnsupportedNodeTypeError("/dev/null"), "Unsupported Path");
    });

    it("should handle ValidationError with its field", () => {
      expectHandled(new ValidationError("Path /tmp/x is not a file", "subpath"), "Invalid Request");
      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("subpath"));
    });

    it("should handle other ingestion errors", () => {
      expectHandled(new IngestionError("Something broke"), "Ingestion Error");
    });
  });

  describe("Other errors", () => {
    it("should handle generic errors", () => {
      expectHandled(new Error("Disk full"), "✗ Error");
      expect(consoleErrorSpy).toHaveBeenCalledWith("\nDisk full");
    });

    it("should show the stack trace at debug level", () => {
      vi.stubEnv("LOG_LEVEL", "debug");
      const error = new Error("Disk full");

      expectHandled(error, "✗ Error");
      const firstFrame = error.stack?.split("\n")[1] ?? "";
      expect(firstFrame).toContain("at ");
      expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining(firstFrame));
    });

    it("should handle non-error values", () => {
      expectHandled("plain string", "Unknown Error");
      expect(consoleErrorSpy).toHaveBeenCalledWith("\nplain string");
    });
  });

  describe("Spinner handling", () => {
    it("should stop an active spinner", () => {
      const sink = new Writable({ write: (_chunk, _encoding, callback) => callback() });
      const spinner = ora({ isEnabled: true, stream: sink, discardStdin: false }).start();
      expect(spinner.isSpinning).toBe(true);

      expect(() => handleCommandError(new Error("x"), spinner)).toThrow("process.exit called");
      expect(spinner.isSpinning).toBe(false);
    });
  });
});
