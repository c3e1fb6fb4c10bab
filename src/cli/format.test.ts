/**
 * Tests for CLI formatting
 */

import { describe, it, expect, beforeAll } from "vitest";
import chalk from "chalk";
import { createPackage } from "../domain/package.js";
import {
  formatDetailResult,
  formatPackageLine,
  formatServiceLine,
  formatSize,
} from "./format.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("formatSize", () => {
  it("should keep bytes whole", () => {
    expect(formatSize(0)).toBe("0 B");
    expect(formatSize(512)).toBe("512 B");
  });

  it("should scale by 1024 with one decimal", () => {
    expect(formatSize(1536)).toBe("1.5 KB");
    expect(formatSize(63124275)).toBe("60.2 MB");
    expect(formatSize(1024 ** 3)).toBe("1.0 GB");
  });
});

describe("formatPackageLine", () => {
  it("should show name and version", () => {
    expect(formatPackageLine(createPackage("wget", "formula", { version: "1.21.4" }))).toBe(
      "wget 1.21.4",
    );
  });

  it("should mark versions still loading or failed", () => {
    expect(formatPackageLine(createPackage("wget", "formula"))).toBe("wget ...");
    expect(formatPackageLine(createPackage("wget", "formula", { versionLoadFailed: true }))).toBe(
      "wget ?",
    );
  });

  it("should add upgrade, type, pin and description", () => {
    const pkg = createPackage("firefox", "cask", {
      version: "120.0",
      availableVersion: "121.0",
      pinned: true,
      description: "Web browser",
    });

    expect(formatPackageLine(pkg)).toBe("firefox 120.0 -> 121.0 (cask) [pinned] - Web browser");
  });
});

describe("formatServiceLine", () => {
  it("should include the user when known", () => {
    expect(formatServiceLine({ name: "postgresql", status: "started", user: "test-user" })).toBe(
      "postgresql started test-user",
    );
    expect(formatServiceLine({ name: "redis", status: "stopped" })).toBe("redis stopped");
  });
});

describe("formatDetailResult", () => {
  it("should print loaded packages as package lines", () => {
    const pkg = createPackage("wget", "formula", { version: "1.24.5" });

    expect(formatDetailResult("wget", { status: "loaded", package: pkg })).toBe("wget 1.24.5");
  });

  it("should print the message of a failed or timed out lookup", () => {
    const pkg = createPackage("slow", "formula", { versionLoadFailed: true });

    expect(
      formatDetailResult("slow", {
        status: "timedOut",
        package: pkg,
        message: "load failed: no answer after 10001ms",
      }),
    ).toBe("slow load failed: no answer after 10001ms");
  });
});
