import { describe, it, expect } from "vitest";
import { RULES_REGISTRY, describeRules } from "../rules-registry";
import { DEFAULT_CONFIG } from "../constants";

describe("RULES_REGISTRY", () => {
  it("describes each alert kind under its own key", () => {
    for (const [kind, rule] of Object.entries(RULES_REGISTRY)) {
      expect(rule.kind).toBe(kind);
      expect(rule.mitreTechnique).toMatch(/^T1110/);
    }
  });

  it("states triggers from the effective configuration", () => {
    const config = { ...DEFAULT_CONFIG, timeWindowThreshold: 8, timeWindowMinutes: 2 };
    expect(RULES_REGISTRY.TIME_WINDOW_BRUTE_FORCE.trigger(config)).toBe(
      ">= 8 failures within 2 minutes"
    );
    expect(RULES_REGISTRY.THRESHOLD_BRUTE_FORCE.trigger(config)).toBe(">= 3 failures");
    expect(RULES_REGISTRY.MULTIPLE_USERNAMES.trigger(config)).toBe(
      ">= 3 distinct usernames"
    );
  });
});

describe("describeRules", () => {
  it("lists rules in report order followed by the keywords", () => {
    const lines = describeRules(DEFAULT_CONFIG).split("\n");
    expect(lines[0]).toBe("Time-Window Brute Force Attacks [HIGH]");
    expect(lines[1]).toBe("  Trigger: >= 5 failures within 5 minutes");
    expect(lines[5]).toBe("Multiple Username Attempts [CRITICAL]");
    expect(lines[10]).toBe("Brute Force Attacks (Threshold) [HIGH]");
    expect(lines[lines.length - 1]).toBe(
      "Failure keywords: failed password, invalid user, authentication failure, 401, 403, unauthorized"
    );
  });
});
