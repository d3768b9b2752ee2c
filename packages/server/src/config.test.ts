import { describe, it, expect } from "vitest";
import { readServerConfig } from "./config.js";

describe("readServerConfig", () => {
  it("defaults to port 3000 and no overrides", () => {
    expect(readServerConfig({})).toEqual({
      port: 3000,
      profileName: undefined,
      networkFile: undefined,
    });
  });

  it("reads every variable", () => {
    expect(
      readServerConfig({ PORT: "8080", PLANNER_PROFILE: "strict", NETWORK_FILE: "/tmp/net.json" }),
    ).toEqual({ port: 8080, profileName: "strict", networkFile: "/tmp/net.json" });
  });

  it("treats empty variables as unset", () => {
    expect(readServerConfig({ PLANNER_PROFILE: "" }).profileName).toBeUndefined();
  });

  it("rejects a non-numeric port", () => {
    expect(() => readServerConfig({ PORT: "abc" })).toThrow('Invalid PORT "abc"');
  });
});
