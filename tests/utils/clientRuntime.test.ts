import { describe, it, expect } from "vitest";
import { UnknownOrgError } from "../../src/utils/errorHandler.js";
import { createTestRuntime } from "../tools/testRuntime.js";

describe("ClientRuntime", () => {
  it("hands out one client per org, the default org when no alias is given", () => {
    const { runtime } = createTestRuntime();

    const byDefault = runtime.client();
    const prod = runtime.client("prod");
    const sandbox = runtime.client("sandbox");

    expect(byDefault).toBe(prod);
    expect(prod.org.alias).toBe("prod");
    expect(sandbox).not.toBe(prod);
    expect(sandbox.org).toBe(runtime.registry.resolve("sandbox"));
  });

  it("registers every configured org on one dispatcher", () => {
    const { runtime } = createTestRuntime();

    expect(runtime.registry.aliases()).toEqual(["prod", "sandbox", "web"]);
    expect(runtime.dispatcher.registry).toBe(runtime.registry);
    expect(runtime.dispatcher.retry.baseBackoffMs).toBe(1);
    expect(() => runtime.client("qa")).toThrow(UnknownOrgError);
  });
});
