/**
 * Tests for the cleanup command
 */

import { describe, it, expect, beforeAll, afterEach } from "vitest";
import chalk from "chalk";
import { ProviderError } from "../../utils/errors.js";
import { createTestSession, type TestSession } from "../../../test/mocks/index.js";
import { cleanupOp, runCleanup, runCleanupPreview } from "./cleanup.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("cleanupOp", () => {
  it("should pick the operation from the options", () => {
    expect(cleanupOp({})).toBe("cleanCache");
    expect(cleanupOp({ oldVersions: true })).toBe("cleanupOldVersions");
  });
});

describe("cleanup command", () => {
  let t: TestSession;

  afterEach(async () => {
    await t.session.close();
  });

  describe("runCleanupPreview", () => {
    it("should list what would be removed", async () => {
      t = createTestSession();
      t.provider.cleanupPreview.respond(() => ({
        items: [
          { path: "/cache/downloads/wget--1.21.4.tar.gz", size: 1536 },
          { path: "/cache/downloads/jq--1.7.bottle.tar.gz", size: 512 },
        ],
        totalSize: 2048,
      }));

      const preview = await runCleanupPreview(t.session, "cleanCache");

      expect(preview.totalSize).toBe(2048);
      expect(t.provider.cleanupPreview.callCount).toBe(1);
      expect(t.lastPrinted()).toEqual([
        "/cache/downloads/wget--1.21.4.tar.gz (1.5 KB)",
        "/cache/downloads/jq--1.7.bottle.tar.gz (512 B)",
        "Would free 2.0 KB",
      ]);
    });

    it("should say when there is nothing to remove", async () => {
      t = createTestSession();
      t.provider.cleanupPreview.respond(() => ({ items: [], totalSize: 0 }));

      await runCleanupPreview(t.session, "cleanupOldVersions");

      expect(t.lastPrinted()).toEqual(["Nothing to clean up"]);
    });
  });

  describe("runCleanup", () => {
    it("should report success", async () => {
      t = createTestSession();
      t.provider.maintenance.respond(() => undefined);

      const completion = await runCleanup(t.session, "cleanCache");

      expect(completion).toEqual({
        kind: "maintenance",
        op: "cleanCache",
        success: true,
        message: "Cache cleaned successfully",
      });
      expect(t.lastPrinted()).toEqual(["✔ Cache cleaned successfully"]);
    });

    it("should report the provider's error", async () => {
      t = createTestSession();
      t.provider.maintenance.respond(() =>
        Promise.reject(
          new ProviderError("brew cleanup --prune=all failed", {
            command: "brew cleanup --prune=all",
            stderr: "Error: Permission denied",
          }),
        ),
      );

      const completion = await runCleanup(t.session, "cleanupOldVersions");

      expect(completion?.success).toBe(false);
      expect(t.lastPrinted()).toEqual(["✖ Error: Permission denied"]);
    });
  });
});
