/**
 * Tests for the services command
 */

import { describe, it, expect, beforeAll, afterEach } from "vitest";
import chalk from "chalk";
import { ProviderError } from "../../utils/errors.js";
import { createTestSession, type TestSession } from "../../../test/mocks/index.js";
import { isServiceAction, runServiceAction, runServices } from "./services.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("isServiceAction", () => {
  it("should accept start, stop and restart only", () => {
    expect(isServiceAction("start")).toBe(true);
    expect(isServiceAction("restart")).toBe(true);
    expect(isServiceAction("enable")).toBe(false);
  });
});

describe("services command", () => {
  let t: TestSession;

  afterEach(async () => {
    await t.session.close();
  });

  it("should list services", async () => {
    t = createTestSession();
    t.provider.services.respond(() => [
      { name: "postgresql@16", status: "started", user: "test-user" },
      { name: "redis", status: "stopped" },
    ]);

    const services = await runServices(t.session);

    expect(services).toHaveLength(2);
    expect(t.lastPrinted()).toEqual(["postgresql@16 started test-user", "redis stopped"]);
  });

  it("should say when there are no services", async () => {
    t = createTestSession();
    t.provider.services.respond(() => []);

    await runServices(t.session);

    expect(t.lastPrinted()).toEqual(["No services found"]);
  });

  it("should run an action and report it", async () => {
    t = createTestSession();
    t.provider.serviceAction.respond(() => undefined);

    const completion = await runServiceAction(t.session, "restart", "redis");

    expect(completion).toEqual({
      kind: "serviceAction",
      action: "restart",
      serviceName: "redis",
      success: true,
      message: "redis restarted successfully",
    });
    expect(t.lastPrinted()).toEqual(["✔ redis restarted successfully"]);
  });

  it("should report a failed action", async () => {
    t = createTestSession();
    t.provider.serviceAction.respond(() =>
      Promise.reject(
        new ProviderError("brew services stop redis failed", {
          command: "brew services stop redis",
          stderr: "Error: Service `redis` is not started.",
        }),
      ),
    );

    const completion = await runServiceAction(t.session, "stop", "redis");

    expect(completion?.success).toBe(false);
    expect(t.lastPrinted()).toEqual(["✖ Error: Service `redis` is not started."]);
  });
});
