import { promises as fs } from "fs";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { FieldStore, fieldStorePath } from "../src/output/fieldStore";
import { makeTempDir, readLines, removeTempDirs } from "./helpers";

afterEach(removeTempDirs);

describe("FieldStore", () => {
  it("creates its directory lazily", async () => {
    const dir = path.join(await makeTempDir(), "fields");
    const store = new FieldStore(dir, ["URL"]);
    await expect(fs.access(dir)).rejects.toThrow();

    await store.store({ url: "http://x/a" });
    expect(await readLines(fieldStorePath(dir, "URL"))).toEqual(["http://x/a"]);
  });

  it("appends one line per result to each field file", async () => {
    const dir = await makeTempDir();
    const store = new FieldStore(dir, ["URL", "Tag"]);
    await store.store({ url: "http://x/a", tag: "a" });
    await store.store({ url: "http://x/img.png", tag: "img" });

    expect(await readLines(path.join(dir, "URL.txt"))).toEqual(["http://x/a", "http://x/img.png"]);
    expect(await readLines(path.join(dir, "Tag.txt"))).toEqual(["a", "img"]);
  });

  it("writes an empty line for an unset field", async () => {
    const dir = await makeTempDir();
    const store = new FieldStore(dir, ["Source"]);
    await store.store({ url: "http://x/a" });

    expect(await fs.readFile(path.join(dir, "Source.txt"), "utf8")).toBe("\n");
  });

  it("keeps concurrent appends whole", async () => {
    const dir = await makeTempDir();
    const store = new FieldStore(dir, ["URL"]);
    const urls = Array.from({ length: 40 }, (_, i) => `http://x/page/${i}`);
    await Promise.all(urls.map((url) => store.store({ url })));

    const lines = await readLines(path.join(dir, "URL.txt"));
    expect(lines.slice().sort()).toEqual(urls.slice().sort());
  });
});
