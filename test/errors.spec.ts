import vm from "node:vm";
import { errorMessage, isMissingFileError } from "../src/core/errors";

function foreignError(message: string, code?: string): unknown {
  return vm.runInNewContext("Object.assign(new Error(message), code ? { code } : {})", { message, code });
}

describe("isMissingFileError", () => {
  it("recognizes fs errors raised in another realm", () => {
    const error = foreignError("ENOENT: no such file or directory, stat 'xml/PMC1.xml'", "ENOENT");

    expect(error instanceof Error).toBe(false);
    expect(isMissingFileError(error)).toBe(true);
    expect(isMissingFileError(foreignError("not a directory", "ENOTDIR"))).toBe(true);
  });

  it("rejects other codes and values without a code", () => {
    expect(isMissingFileError(foreignError("permission denied", "EACCES"))).toBe(false);
    expect(isMissingFileError(new Error("plain"))).toBe(false);
    expect(isMissingFileError("ENOENT")).toBe(false);
    expect(isMissingFileError(null)).toBe(false);
  });
});

describe("errorMessage", () => {
  it("reads the message of an error from another realm", () => {
    expect(errorMessage(foreignError("disk full", "ENOSPC"))).toBe("disk full");
  });

  it("stringifies values that are not errors", () => {
    expect(errorMessage(42)).toBe("42");
  });
});
