/**
 * Identity pool tests
 */

import { describe, it, expect } from "vitest";
import { BROWSER_PROFILES, IdentityPool } from "./identity-pool.js";

describe("IdentityPool", () => {
  it("should create the first identity on demand", () => {
    const pool = new IdentityPool(BROWSER_PROFILES, () => 0);
    expect(pool.size).toBe(0);
    const identity = pool.current();
    expect(pool.size).toBe(1);
    expect(identity.profile.name).toBe("chrome131-windows");
    expect(identity.headers["User-Agent"]).toBe(BROWSER_PROFILES[0].userAgent);
    expect(identity.headers["Accept-Language"]).toBe("en-US,en;q=0.9");
  });

  it("should rotate through acquired identities", () => {
    const values = [0, 0, 0.99, 0.5];
    const pool = new IdentityPool(BROWSER_PROFILES, () => values.shift() ?? 0);
    const first = pool.acquireFresh();
    const second = pool.acquireFresh();

    expect(first.profile.name).toBe("chrome131-windows");
    expect(second.profile.name).toBe("chrome142-windows");
    expect(second.headers["Accept-Language"]).toBe("en-GB,en;q=0.9");

    expect(pool.current()).toBe(first);
    expect(pool.current()).toBe(second);
    expect(pool.current()).toBe(first);
  });

  it("should reject an empty profile list", () => {
    expect(() => new IdentityPool([])).toThrow("at least one browser profile");
  });
});
