import { is64Bit } from "./is64Bit";

describe("is64Bit", () => {
  it("should treat machine identifiers containing 64 as 64-bit", () => {
    expect(is64Bit({ machine: "x86_64", system: "Linux" })).toBe(true);
    expect(is64Bit({ machine: "AMD64", system: "Windows" })).toBe(true);
    expect(is64Bit({ machine: "arm64", system: "Darwin" })).toBe(true);
  });

  it("should treat all other machine identifiers as 32-bit", () => {
    expect(is64Bit({ machine: "i686", system: "Linux" })).toBe(false);
    expect(is64Bit({ machine: "x86", system: "Windows" })).toBe(false);
    expect(is64Bit({ machine: "armv7l", system: "Linux" })).toBe(false);
  });
});
