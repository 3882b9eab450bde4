import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("should use defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({ defaultZ0: 50, debug: false });
  });

  it("should read values from the environment", () => {
    expect(loadConfig({ NETBIND_Z0: "75", NETBIND_DEBUG: "true" })).toEqual({
      defaultZ0: 75,
      debug: true,
    });
  });

  it("should accept 1 and 0 for debug", () => {
    expect(loadConfig({ NETBIND_DEBUG: "1" }).debug).toBe(true);
    expect(loadConfig({ NETBIND_DEBUG: "0" }).debug).toBe(false);
    expect(loadConfig({ NETBIND_DEBUG: "TRUE" }).debug).toBe(true);
  });

  it("should treat an empty impedance as unset", () => {
    expect(loadConfig({ NETBIND_Z0: "" }).defaultZ0).toBe(50);
  });

  it("should reject impedances that are not positive numbers", () => {
    expect(() => loadConfig({ NETBIND_Z0: "abc" })).toThrow(/^Invalid configuration: NETBIND_Z0/);
    expect(() => loadConfig({ NETBIND_Z0: "-5" })).toThrow(/^Invalid configuration: NETBIND_Z0/);
  });
});
