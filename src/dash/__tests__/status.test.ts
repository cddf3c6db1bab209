import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeLogger } from "../../__tests__/helpers.js";
import { createPortResolver } from "../status.js";

describe("createPortResolver", () => {
  let dir: string;
  let statusFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "dash-status-"));
    statusFile = path.join(dir, "status.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const resolveWith = async (contents: string) => {
    await fs.writeFile(statusFile, contents, "utf-8");
    return createPortResolver(statusFile, makeLogger()).resolvePort();
  };

  it("returns the port from a valid status record", async () => {
    await expect(resolveWith(JSON.stringify({ port: 54321, pid: 42 }))).resolves.toBe(54321);
  });

  it("returns undefined when the file is missing", async () => {
    const logger = makeLogger();
    await expect(createPortResolver(statusFile, logger).resolvePort()).resolves.toBeUndefined();
    expect(logger.debug).toHaveBeenCalledWith(`Status file ${statusFile} not readable (ENOENT)`);
  });

  it("returns undefined for malformed JSON", async () => {
    await expect(resolveWith("{not json")).resolves.toBeUndefined();
  });

  it("returns undefined when the port field is absent or not a usable port", async () => {
    await expect(resolveWith(JSON.stringify({ pid: 42 }))).resolves.toBeUndefined();
    await expect(resolveWith(JSON.stringify({ port: "8080" }))).resolves.toBeUndefined();
    await expect(resolveWith(JSON.stringify({ port: 0 }))).resolves.toBeUndefined();
    await expect(resolveWith(JSON.stringify({ port: 70000 }))).resolves.toBeUndefined();
    await expect(resolveWith(JSON.stringify({ port: 80.5 }))).resolves.toBeUndefined();
  });

  it("returns undefined when the record is not an object", async () => {
    await expect(resolveWith("5")).resolves.toBeUndefined();
    await expect(resolveWith("null")).resolves.toBeUndefined();
  });

  it("reads the file fresh on every call", async () => {
    const resolver = createPortResolver(statusFile, makeLogger());
    await fs.writeFile(statusFile, JSON.stringify({ port: 6000 }), "utf-8");
    await expect(resolver.resolvePort()).resolves.toBe(6000);
    await fs.writeFile(statusFile, JSON.stringify({ port: 6001 }), "utf-8");
    await expect(resolver.resolvePort()).resolves.toBe(6001);
  });
});
