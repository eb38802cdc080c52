import { describe, it, expect } from "vitest";
import { newId, sequenceIds } from "./ids.js";

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("ids", () => {
  it("should generate distinct v4 UUIDs", () => {
    const a = newId();
    const b = newId();

    expect(a).toMatch(UUID_V4);
    expect(a).not.toBe(b);
  });

  it("should replay a sequence, then fall back to random ids", () => {
    const next = sequenceIds(["a1", "a2"]);

    expect(next()).toBe("a1");
    expect(next()).toBe("a2");
    expect(next()).toMatch(UUID_V4);
  });
});
