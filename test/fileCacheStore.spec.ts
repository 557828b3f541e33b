import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { promises } from "node:fs";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { FileCacheStore } from "../src/cache/fileCacheStore";
import { CacheReadError, ConfigurationError } from "../src/errors";

describe("FileCacheStore", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "auth-cache-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("refuses a cache directory that does not exist", async () => {
    const missing = path.join(root, "nope");

    await expect(FileCacheStore.open(missing, "auth.json")).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("refuses a cache directory that is a file", async () => {
    const file = path.join(root, "plain-file");
    await writeFile(file, "x");

    await expect(FileCacheStore.open(file, "auth.json")).rejects.toThrow("is not a directory");
  });

  it("returns undefined before anything is written", async () => {
    const store = await FileCacheStore.open(root, "auth.json");

    expect(await store.get("access_token")).toBeUndefined();
  });

  it("persists entries across store instances", async () => {
    const writer = await FileCacheStore.open(root, "auth.json");
    await writer.put("access_token", '{"v":1}');
    await writer.put("client_secret", '{"v":2}');

    const reader = await FileCacheStore.open(root, "auth.json");

    expect(await reader.get("access_token")).toBe('{"v":1}');
    expect(await reader.get("client_secret")).toBe('{"v":2}');
  });

  it("overwrites the previous value for a key", async () => {
    const store = await FileCacheStore.open(root, "auth.json");
    await store.put("access_token", "old");
    await store.put("access_token", "new");

    const document = JSON.parse(await readFile(path.join(root, "auth.json"), "utf8"));
    expect(document).toEqual({ access_token: "new" });
  });

  it("reports a corrupt document on read and replaces it on write", async () => {
    await writeFile(path.join(root, "auth.json"), "{corrupt");
    const store = await FileCacheStore.open(root, "auth.json");

    await expect(store.get("access_token")).rejects.toBeInstanceOf(CacheReadError);

    await store.put("access_token", "fresh");
    expect(await store.get("access_token")).toBe("fresh");
  });

  it("removes its temp file when the write cannot be completed", async () => {
    const store = await FileCacheStore.open(root, "auth.json");
    vi.spyOn(promises, "rename").mockRejectedValueOnce(new Error("EXDEV"));

    await expect(store.put("access_token", "value")).rejects.toThrow("EXDEV");

    expect(await readdir(root)).toEqual([]);
  });
});
