// @vitest-environment node
import { describe, it, expect } from "vitest";
import {
  ServiceError,
  ReleaseCatalogError,
  VersionResolutionError,
  BinaryDownloadError,
  VersionStoreError,
  ProjectDataError,
  ConfigError,
  FileSystemError,
  isServiceError,
  isNotFoundError,
  getErrorMessage,
  type SerializedError,
} from "./errors.js";

describe("ServiceError", () => {
  describe("ReleaseCatalogError", () => {
    it("has correct type", () => {
      const error = new ReleaseCatalogError("Release catalog unavailable");
      expect(error.type).toBe("release-catalog");
    });

    it("defaults to CATALOG_UNAVAILABLE", () => {
      const error = new ReleaseCatalogError("Release catalog unavailable");
      expect(error.code).toBe("CATALOG_UNAVAILABLE");
      expect(error.errorCode).toBe("CATALOG_UNAVAILABLE");
    });

    it("is instanceof Error", () => {
      const error = new ReleaseCatalogError("test");
      expect(error).toBeInstanceOf(Error);
    });

    it("is instanceof ServiceError", () => {
      const error = new ReleaseCatalogError("test");
      expect(error).toBeInstanceOf(ServiceError);
    });

    it("serializes to JSON", () => {
      const error = new ReleaseCatalogError("Release catalog unavailable: HTTP 503");
      const json = error.toJSON();

      expect(json).toEqual({
        type: "release-catalog",
        message: "Release catalog unavailable: HTTP 503",
        code: "CATALOG_UNAVAILABLE",
      });
    });
  });

  describe("VersionResolutionError", () => {
    it("has correct type and name", () => {
      const error = new VersionResolutionError("No release matches 25.12", "NO_MATCHING_VERSION");
      expect(error.type).toBe("version-resolution");
      expect(error.name).toBe("VersionResolutionError");
    });

    it("serializes correctly", () => {
      const error = new VersionResolutionError("Invalid version spec: abc", "INVALID_VERSION_SPEC");

      expect(error.toJSON()).toEqual({
        type: "version-resolution",
        message: "Invalid version spec: abc",
        code: "INVALID_VERSION_SPEC",
      });
    });
  });

  describe("BinaryDownloadError", () => {
    it("has correct type", () => {
      const error = new BinaryDownloadError("Download failed", "DOWNLOAD_FAILED");
      expect(error.type).toBe("binary-download");
    });

    it("preserves message and code", () => {
      const error = new BinaryDownloadError("No space left", "INSUFFICIENT_STORAGE");
      expect(error.message).toBe("No space left");
      expect(error.code).toBe("INSUFFICIENT_STORAGE");
    });
  });

  describe("VersionStoreError", () => {
    it("has correct type", () => {
      const error = new VersionStoreError("Version 25.12.5.44 is not installed", "NOT_INSTALLED");
      expect(error.type).toBe("version-store");
    });

    it("serializes correctly", () => {
      const error = new VersionStoreError("Default points at 1.2.3.4", "CORRUPT_DEFAULT");

      expect(error.toJSON()).toEqual({
        type: "version-store",
        message: "Default points at 1.2.3.4",
        code: "CORRUPT_DEFAULT",
      });
    });
  });

  describe("ProjectDataError", () => {
    it("serializes type and code", () => {
      const error = new ProjectDataError(
        "Project data directory /h/.clickhouse is the version store",
        "PROJECT_IS_STORE"
      );

      expect(error).toBeInstanceOf(ServiceError);
      expect(error.toJSON()).toEqual({
        type: "project-data",
        message: "Project data directory /h/.clickhouse is the version store",
        code: "PROJECT_IS_STORE",
      });
    });
  });

  describe("ConfigError", () => {
    it("defaults to INVALID_CONFIG", () => {
      const error = new ConfigError("Invalid config");
      expect(error.type).toBe("config");
      expect(error.code).toBe("INVALID_CONFIG");
    });
  });

  describe("FileSystemError", () => {
    it("has correct type and codes", () => {
      const error = new FileSystemError(
        "UNKNOWN",
        "/tmp/x",
        "Too many open files",
        undefined,
        "EMFILE"
      );
      expect(error.type).toBe("filesystem");
      expect(error.fsCode).toBe("UNKNOWN");
      expect(error.code).toBe("UNKNOWN");
      expect(error.originalCode).toBe("EMFILE");
    });

    it("keeps the cause", () => {
      const cause = new Error("EACCES: permission denied");
      const error = new FileSystemError("EACCES", "/tmp/x", "denied", cause);
      expect(error.cause).toBe(cause);
    });

    it("serializes with path", () => {
      const error = new FileSystemError("ENOENT", "/home/test/.clickhouse/default", "not found");
      const json: SerializedError = error.toJSON();

      expect(json).toEqual({
        type: "filesystem",
        message: "not found",
        path: "/home/test/.clickhouse/default",
        code: "ENOENT",
      });
    });
  });
});

describe("isServiceError", () => {
  it("returns true for ServiceError instances", () => {
    expect(isServiceError(new ConfigError("test"))).toBe(true);
    expect(isServiceError(new VersionStoreError("test", "NO_DEFAULT_SET"))).toBe(true);
  });

  it("returns false for regular errors and non-errors", () => {
    expect(isServiceError(new Error("test"))).toBe(false);
    expect(isServiceError("error")).toBe(false);
    expect(isServiceError(null)).toBe(false);
  });
});

describe("isNotFoundError", () => {
  it("matches ENOENT filesystem errors only", () => {
    expect(isNotFoundError(new FileSystemError("ENOENT", "/x", "missing"))).toBe(true);
    expect(isNotFoundError(new FileSystemError("EACCES", "/x", "denied"))).toBe(false);
    expect(isNotFoundError(new Error("ENOENT"))).toBe(false);
  });
});

describe("getErrorMessage", () => {
  it("returns the message of an Error", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
  });

  it("stringifies other values", () => {
    expect(getErrorMessage("plain")).toBe("plain");
  });
});
