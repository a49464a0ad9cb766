import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  DatasetFormatError,
  ErrorCode,
  ExtractionCancelledError,
  isPyShapeError,
  ParsingError,
} from "../errors.js";

describe("Errors", () => {
  it("should format parse errors with their location", () => {
    const error = new ParsingError("Invalid syntax at line 4, column 11", {
      filePath: "pkg/broken.py",
      line: 4,
      column: 11,
    });
    expect(error.toString()).toBe(
      "[E2003] ParsingError: Invalid syntax at line 4, column 11 at pkg/broken.py:4:11"
    );
  });

  it("should carry codes and context into JSON", () => {
    const error = new ConfigurationError("Unknown filter: Nope", { unknown: ["Nope"] });
    const json = error.toJSON();
    expect(json.code).toBe(ErrorCode.CONFIGURATION_ERROR);
    expect(json.name).toBe("ConfigurationError");
    expect(json.context).toEqual({ unknown: ["Nope"] });
  });

  it("should keep dataset issues on the error and in its context", () => {
    const error = new DatasetFormatError("Invalid dataset: 1 issue(s)", ["0.name: Required"]);
    expect(error.issues).toEqual(["0.name: Required"]);
    expect(error.context).toEqual({ issues: ["0.name: Required"] });
  });

  it("should recognise only its own errors", () => {
    expect(isPyShapeError(new ExtractionCancelledError())).toBe(true);
    expect(isPyShapeError(new Error("plain"))).toBe(false);
    expect(new ExtractionCancelledError().message).toBe("Extraction cancelled");
  });
});
