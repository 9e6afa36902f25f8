import { describe, expect, it } from "vitest";
import "../adapters/index";
import { registry } from "./registry";

describe("registry", () => {
  it("holds each adapter once, in registration order", () => {
    expect(registry.getAll().map((a) => [a.id, a.role])).toEqual([
      ["aqs", "PRIMARY"],
      ["envista", "SECONDARY"],
    ]);
    expect(registry.size).toBe(2);
    expect(registry.get("envista")?.role).toBe("SECONDARY");
    expect(registry.get("nope")).toBeUndefined();
  });

  it("rejects a second adapter with a taken id", () => {
    const aqs = registry.get("aqs");
    expect(aqs).toBeDefined();
    if (!aqs) return;
    expect(() => registry.register(aqs)).toThrow('Adapter "aqs" is already registered.');
    expect(registry.size).toBe(2);
  });
});
