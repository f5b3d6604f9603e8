import { promises as fs } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { makeTempDir, removeTempDirs } from "./helpers";

describe("temp dir helpers", () => {
  it("removes every directory they created", async () => {
    const first = await makeTempDir();
    const second = await makeTempDir();
    await fs.writeFile(path.join(first, "out.txt"), "x", "utf8");

    await removeTempDirs();

    await expect(fs.access(first)).rejects.toThrow();
    await expect(fs.access(second)).rejects.toThrow();
  });
});
