import { afterEach, describe, expect, it, vi } from "vitest";
import { main, parseArgs } from "./cli";

describe("parseArgs", () => {
  it("reads the command and its options", () => {
    expect(parseArgs(["weekly", "--station", "Jódar", "--chat", "-100123"])).toEqual({
      command: "weekly",
      station: "Jódar",
      chatId: "-100123",
    });
  });

  it("accepts no arguments", () => {
    expect(parseArgs([])).toEqual({ command: undefined });
  });

  it("rejects unknown or incomplete options", () => {
    expect(() => parseArgs(["daily", "--verbose"])).toThrow("Unknown or incomplete option: --verbose");
    expect(() => parseArgs(["daily", "--chat"])).toThrow("Unknown or incomplete option: --chat");
    expect(() => parseArgs(["daily", "--station", "--chat", "1"])).toThrow("Unknown or incomplete option: --station");
  });
});

describe("main", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints usage and fails on an unknown command", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await expect(main(["monthly"])).resolves.toBe(1);
    expect(log).toHaveBeenCalledWith("SAIH Rainfall Reporter");
  });
});
