import { UnsupportedPlatformError } from "../errors/UnsupportedPlatformError";
import { getGeckoDriverDownload } from "./getGeckoDriverDownload";

const releases = "https://github.com/mozilla/geckodriver/releases/download";

describe("getGeckoDriverDownload", () => {
  it("should build the macOS download for any architecture", () => {
    expect(getGeckoDriverDownload("0.26.0", { machine: "x86_64", system: "Darwin" })).toEqual({
      archiveKind: "tar.gz",
      url: `${releases}/v0.26.0/geckodriver-v0.26.0-macos.tar.gz`,
    });
    expect(getGeckoDriverDownload("0.26.0", { machine: "i386", system: "Darwin" })).toEqual({
      archiveKind: "tar.gz",
      url: `${releases}/v0.26.0/geckodriver-v0.26.0-macos.tar.gz`,
    });
  });

  it("should pick the Linux archive by architecture", () => {
    expect(getGeckoDriverDownload("0.26.0", { machine: "x86_64", system: "Linux" })).toEqual({
      archiveKind: "tar.gz",
      url: `${releases}/v0.26.0/geckodriver-v0.26.0-linux64.tar.gz`,
    });
    expect(getGeckoDriverDownload("0.26.0", { machine: "i686", system: "Linux" })).toEqual({
      archiveKind: "tar.gz",
      url: `${releases}/v0.26.0/geckodriver-v0.26.0-linux32.tar.gz`,
    });
  });

  it("should pick the Windows archive by architecture", () => {
    expect(getGeckoDriverDownload("0.26.0", { machine: "x86_64", system: "Windows" })).toEqual({
      archiveKind: "zip",
      url: `${releases}/v0.26.0/geckodriver-v0.26.0-win64.zip`,
    });
    expect(getGeckoDriverDownload("0.26.0", { machine: "i686", system: "Windows" })).toEqual({
      archiveKind: "zip",
      url: `${releases}/v0.26.0/geckodriver-v0.26.0-win32.zip`,
    });
  });

  it("should throw for unsupported operating systems", () => {
    expect(() => getGeckoDriverDownload("0.26.0", { machine: "x86_64", system: "AIX" })).toThrow(
      UnsupportedPlatformError
    );
  });
});
