import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { logger } from "../../logger";
import { documentCommand } from "./document";

vi.mock("../../logger", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
  configureLogger: vi.fn(),
}));

const tempDirs: string[] = [];

function writeTempFile(name: string, contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "chat-budget-document-"));
  tempDirs.push(dir);
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, contents, "utf-8");
  return filePath;
}

afterEach(() => {
  process.exitCode = undefined;
  vi.clearAllMocks();
  vi.restoreAllMocks();
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("documentCommand", () => {
  const budgetConfig = `{ "budget": { "charLimit": 7, "safetyRatio": 1 } }`;

  it("prints the document truncated to the effective budget", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const config = writeTempFile("config.jsonc", budgetConfig);
    const input = writeTempFile("doc.txt", "HELLOWORLD");

    await documentCommand(input, { config });

    expect(write).toHaveBeenCalledWith("HELLOW…");
    expect(logger.info).toHaveBeenCalledWith(
      { charsBefore: 10, charsAfter: 7, effectiveBudget: 7 },
      "Truncated document",
    );
    expect(process.exitCode).toBeUndefined();
  });

  it("prints short documents unchanged without logging", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const config = writeTempFile("config.jsonc", budgetConfig);
    const input = writeTempFile("doc.txt", "HELLO");

    await documentCommand(input, { config });

    expect(write).toHaveBeenCalledWith("HELLO");
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("fails when the explicit config file is missing", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const input = writeTempFile("doc.txt", "HELLOWORLD");
    const config = path.join(path.dirname(input), "missing.jsonc");

    await documentCommand(input, { config });

    expect(process.exitCode).toBe(1);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(write).not.toHaveBeenCalled();
  });

  it("fails when the input file cannot be read", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const config = writeTempFile("config.jsonc", budgetConfig);
    const input = path.join(path.dirname(config), "missing.txt");

    await documentCommand(input, { config });

    expect(process.exitCode).toBe(1);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(write).not.toHaveBeenCalled();
  });
});
