import { describe, it, expect } from "vitest";
import { InvalidNameError } from "../errors/catalog.js";
import {
  isHiddenName,
  isReservedName,
  UPLOAD_TEMP_PREFIX,
  validateEntryName,
} from "./names.js";

describe("validateEntryName", () => {
  it("accepts ordinary names", () => {
    expect(validateEntryName("report 2024.pdf")).toBe("report 2024.pdf");
    expect(validateEntryName(".bashrc")).toBe(".bashrc");
  });

  it.each([undefined, "", "   ", ".", "..", "a/b", "a\\b", "a\0b"])(
    "rejects %j",
    (name) => {
      expect(() => validateEntryName(name)).toThrow(InvalidNameError);
    },
  );

  it("rejects names longer than 255 bytes", () => {
    expect(() => validateEntryName("x".repeat(256))).toThrow(
      "Name exceeds 255 bytes",
    );
  });

  it("rejects the upload temp prefix", () => {
    expect(() => validateEntryName(`${UPLOAD_TEMP_PREFIX}abc`)).toThrow(
      "Name uses a reserved prefix",
    );
  });
});

describe("name predicates", () => {
  it("detects hidden and reserved names", () => {
    expect(isHiddenName(".git")).toBe(true);
    expect(isHiddenName("git")).toBe(false);
    expect(isReservedName(`${UPLOAD_TEMP_PREFIX}1.part`)).toBe(true);
  });
});
