import { describe, it, expect } from "vitest";
import {
  ConverterError,
  IOError,
  NotFoundError,
  ParseError,
  ValidationError,
  errorMessage,
  exitCodeFor,
} from "../src/errors.js";

describe("error kinds", () => {
  it("carries an exit code per kind", () => {
    expect(new ValidationError("bad").exitCode).toBe(2);
    expect(new NotFoundError("missing").exitCode).toBe(3);
    expect(new IOError("disk").exitCode).toBe(4);
    expect(new ParseError("f.json", 0, "bad").exitCode).toBe(1);
  });

  it("names each error after its class", () => {
    expect(new ValidationError("bad").name).toBe("ValidationError");
    expect(new IOError("disk").name).toBe("IOError");
  });

  it("is an instance of ConverterError and Error", () => {
    const err = new NotFoundError("missing");
    expect(err).toBeInstanceOf(ConverterError);
    expect(err).toBeInstanceOf(Error);
  });

  it("prefixes parse errors with file and index", () => {
    const err = new ParseError("sleep-2023-01-01.json", 3, "efficiency: Required");
    expect(err.message).toBe("sleep-2023-01-01.json [3]: efficiency: Required");
    expect(err.file).toBe("sleep-2023-01-01.json");
    expect(err.index).toBe(3);
  });

  it("keeps the cause", () => {
    const cause = new Error("EACCES");
    expect(new IOError("disk", { cause }).cause).toBe(cause);
  });
});

describe("exitCodeFor", () => {
  it("uses the error's code", () => {
    expect(exitCodeFor(new IOError("disk"))).toBe(4);
  });

  it("falls back to 1 for anything else", () => {
    expect(exitCodeFor(new TypeError("boom"))).toBe(1);
    expect(exitCodeFor("boom")).toBe(1);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies the rest", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
