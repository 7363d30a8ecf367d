import { describe, it, expect } from "vitest";
import { ALLOWED_TRANSITIONS, canTransition, validateTransition } from "../../src/domain/rotation-state-machine";
import type { RotationPhase } from "../../src/domain/rotation-state-machine";

describe("Rotation state machine", () => {
  describe("canTransition", () => {
    it("should allow activating the first account", () => {
      expect(canTransition("no_active_account", "active")).toBe(true);
    });

    it("should allow staying active across selections", () => {
      expect(canTransition("active", "active")).toBe(true);
    });

    it("should allow dropping the active account", () => {
      expect(canTransition("active", "no_active_account")).toBe(true);
    });

    it("should allow recovering from exhaustion when quota frees up", () => {
      expect(canTransition("exhausted", "active")).toBe(true);
    });

    it("should reject leaving exhaustion without an account", () => {
      expect(canTransition("exhausted", "no_active_account")).toBe(false);
      expect(canTransition("no_active_account", "no_active_account")).toBe(false);
    });
  });

  describe("validateTransition", () => {
    it("should not throw for valid transitions", () => {
      expect(() => validateTransition("no_active_account", "exhausted")).not.toThrow();
      expect(() => validateTransition("active", "exhausted")).not.toThrow();
    });

    it("should throw for invalid transitions", () => {
      expect(() => validateTransition("exhausted", "no_active_account")).toThrow(
        "Invalid rotation state transition: exhausted -> no_active_account. Allowed: active, exhausted"
      );
    });
  });

  it("should define transitions for every phase", () => {
    const phases: RotationPhase[] = ["no_active_account", "active", "exhausted"];
    for (const phase of phases) {
      expect(ALLOWED_TRANSITIONS.has(phase)).toBe(true);
      expect(canTransition(phase, "exhausted")).toBe(true);
    }
  });
});
