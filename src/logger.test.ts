import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { PassThrough } from "node:stream";
import { createAppLogger, createStreamLogger, formatLine, type LogEntry } from "./logger.js";

describe("AppLogger", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "trustgate-log-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("writes structured JSONL records", () => {
    const logger = createAppLogger(tempDir);
    const err = new Error("boom");

    logger.info("startup", { profile: "default" });
    logger.error("failed", err);

    const today = new Date().toISOString().split("T")[0] ?? "";
    const logPath = path.join(tempDir, "logs", `${today}.jsonl`);
    expect(fs.existsSync(logPath)).toBe(true);

    const lines = fs.readFileSync(logPath, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);

    const first: LogEntry = JSON.parse(lines[0] ?? "");
    expect(first.timestamp).toBeDefined();
    expect(first.level).toBe("info");
    expect(first.message).toBe("startup");
    expect(first.args).toEqual([{ profile: "default" }]);

    const second: LogEntry = JSON.parse(lines[1] ?? "");
    expect(second.level).toBe("error");
    expect(second.message).toBe("failed");
    expect(second.args?.[0]).toMatchObject({ name: "Error", message: "boom" });
  });

  it("omits args when there are none", () => {
    createAppLogger(tempDir).warn("plain");

    const [file] = fs.readdirSync(path.join(tempDir, "logs"));
    const entry: unknown = JSON.parse(fs.readFileSync(path.join(tempDir, "logs", file ?? ""), "utf-8"));
    expect(entry).not.toHaveProperty("args");
  });
});

describe("formatLine", () => {
  const now = new Date("2026-03-01T09:15:30.123Z");

  it("prints plain lines off a TTY", () => {
    expect(formatLine("warn", "careful", false, now)).toBe("2026-03-01 09:15:30 [WRN] careful");
  });

  it("colours the level on a TTY", () => {
    expect(formatLine("error", "broken", true, now)).toBe(
      "\x1b[2m2026-03-01 09:15:30\x1b[0m \x1b[31m[ERR]\x1b[0m broken",
    );
  });
});

describe("createStreamLogger", () => {
  it("drops lines below the minimum level", async () => {
    const stream = new PassThrough();
    const chunks: string[] = [];
    stream.on("data", (chunk: Buffer) => chunks.push(chunk.toString("utf-8")));

    const logger = createStreamLogger(stream, "warn");
    logger.info("hidden");
    logger.warn("shown %d", 2);
    await new Promise((resolve) => setImmediate(resolve));

    const output = chunks.join("");
    expect(output).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[WRN\] shown 2\n$/);
  });
});
