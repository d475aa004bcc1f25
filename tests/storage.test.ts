import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ArtifactStorage } from "../browser/artifacts/storage/storage.js";

describe("ArtifactStorage", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "punchclock-storage-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes artifacts under their group", async () => {
    const storage = new ArtifactStorage(dir);

    const path = await storage.store({
      id: "run-1-1",
      group: "screenshots",
      format: "png",
      data: Buffer.from("image"),
      createdAt: 0,
    });

    expect(path).toBe(join(dir, "screenshots", "run-1-1.png"));
    expect(await readFile(path, "utf-8")).toBe("image");
    expect(await storage.list("screenshots")).toEqual(["run-1-1.png"]);
  });

  it("lists nothing for a group that was never written", async () => {
    expect(await new ArtifactStorage(dir).list("screenshots")).toEqual([]);
  });
});
