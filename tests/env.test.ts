import { afterEach, describe, expect, test, vi } from "vitest";
import { isEnabled, readEnv } from "../src/utils/env";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("Environment helpers", () => {
  test("isEnabled recognizes truthy values in any case", () => {
    for (const value of ["1", "true", "TRUE", "yes", "On", "enable", "enabled", " yes "]) {
      expect(isEnabled(value)).toBe(true);
    }
  });

  test("isEnabled rejects everything else", () => {
    for (const value of ["0", "false", "no", "off", "", "random", "2", undefined]) {
      expect(isEnabled(value)).toBe(false);
    }
  });

  test("readEnv treats blank values as unset", () => {
    vi.stubEnv("ASKSHELL_TEST_VALUE", "   ");
    expect(readEnv("ASKSHELL_TEST_VALUE")).toBeUndefined();
  });

  test("readEnv trims values", () => {
    vi.stubEnv("ASKSHELL_TEST_VALUE", "  ollama ");
    expect(readEnv("ASKSHELL_TEST_VALUE")).toBe("ollama");
  });
});
