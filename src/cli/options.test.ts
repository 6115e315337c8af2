import { InvalidArgumentError } from "commander";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { logger } from "../logger";
import { loadSettings, parseIntegerOption, parseRatioOption } from "./options";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
  configureLogger: vi.fn(),
}));

const tempDirs: string[] = [];

function writeConfig(raw: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "chat-budget-cli-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "config.jsonc");
  fs.writeFileSync(configPath, raw, "utf-8");
  return configPath;
}

afterEach(() => {
  vi.clearAllMocks();
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("parseIntegerOption", () => {
  it("parses integers", () => {
    expect(parseIntegerOption("12")).toBe(12);
    expect(parseIntegerOption(" -4 ")).toBe(-4);
  });

  it("rejects non-integers", () => {
    expect(() => parseIntegerOption("1.5")).toThrow(InvalidArgumentError);
    expect(() => parseIntegerOption("abc")).toThrow("Not an integer: abc");
  });
});

describe("parseRatioOption", () => {
  it("parses decimals", () => {
    expect(parseRatioOption("0.5")).toBe(0.5);
    expect(parseRatioOption("1")).toBe(1);
  });

  it("rejects non-numbers", () => {
    expect(() => parseRatioOption("")).toThrow(InvalidArgumentError);
    expect(() => parseRatioOption("half")).toThrow("Not a number: half");
  });
});

describe("loadSettings", () => {
  it("layers flags over the config file", () => {
    const configPath = writeConfig(
      `{ "budget": { "charLimit": 500, "safetyRatio": 0.5 }, "selection": { "keepLastNSystem": 2 } }`,
    );

    const settings = loadSettings({ config: configPath, safetyRatio: 1, truncate: true });

    expect(settings).toEqual({
      budget: { charLimit: 500, safetyRatio: 1, extraOverhead: 0, truncateLastIfNeeded: true },
      keepLastNSystem: 2,
      rollupKeepLastN: 6,
    });
  });

  it("maps --no-truncate to a disabled truncation flag", () => {
    const configPath = writeConfig("{}");

    const settings = loadSettings({ config: configPath, truncate: false, keepSystem: 0 });

    expect(settings?.budget.truncateLastIfNeeded).toBe(false);
    expect(settings?.keepLastNSystem).toBe(0);
  });

  it("logs and returns undefined when the config is invalid", () => {
    const configPath = writeConfig(`{ "budget": { "charLimit": -1 } }`);

    expect(loadSettings({ config: configPath })).toBeUndefined();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
