import { describe, expect, it } from "vitest";
import { decolorize } from "../src/output/decolorize";
import { createPalette } from "../src/output/format";

describe("decolorize", () => {
  it("strips SGR sequences", () => {
    expect(decolorize("\u001b[34mGET\u001b[39m http://x/a")).toBe("GET http://x/a");
    expect(decolorize("\u001b[1;31mbold red\u001b[0m")).toBe("bold red");
  });

  it("strips other CSI sequences ending in a letter", () => {
    expect(decolorize("\u001b[2Kline\u001b[1A")).toBe("line");
  });

  it("strips sequences exposed by an earlier removal", () => {
    expect(decolorize("\u001b[\u001b[31mm")).toBe("");
  });

  it("leaves plain text untouched", () => {
    expect(decolorize("[GET] http://x/a [body]")).toBe("[GET] http://x/a [body]");
  });

  it("is idempotent", () => {
    const palette = createPalette(true);
    const samples = [
      `${palette.blue("GET")} ${palette.yellow("body")}`,
      "\u001b[33m\u001b[1mnested\u001b[22m\u001b[39m",
      "\u001b[\u001b[31mm",
      "no escapes"
    ];
    for (const sample of samples) {
      const once = decolorize(sample);
      expect(decolorize(once)).toBe(once);
    }
  });
});
