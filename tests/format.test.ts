import { describe, expect, it } from "vitest";
import { FormatError } from "../src/output/errors";
import { createFormatter, createPalette, formatJson, formatScreen } from "../src/output/format";
import { Result } from "../src/types/result";

const anchor: Result = {
  method: "GET",
  url: "http://x/a",
  source: "body",
  tag: "a",
  attribute: "href"
};

describe("structured encoding", () => {
  it("omits default fields", () => {
    expect(formatJson(anchor)).toBe(
      '{"method":"GET","endpoint":"http://x/a","source":"body","tag":"a","attribute":"href"}'
    );
  });

  it("suppresses results with every field at its default", () => {
    expect(formatJson({})).toBe("");
    expect(formatJson({ method: "", url: "", timestamp: new Date(0) })).toBe("");
  });

  it("keeps only the configured fields in schema order", () => {
    expect(formatJson(anchor, ["Tag", "URL"])).toBe('{"endpoint":"http://x/a","tag":"a"}');
    expect(formatJson({ url: "http://x/a" }, ["Tag"])).toBe("");
  });

  it("serializes timestamps as ISO strings", () => {
    const result: Result = { timestamp: new Date("2024-05-01T10:00:00Z"), url: "http://x/a" };
    expect(JSON.parse(formatJson(result))).toEqual({
      timestamp: "2024-05-01T10:00:00.000Z",
      endpoint: "http://x/a"
    });
  });

  it("fails with FormatError on an invalid timestamp", () => {
    expect(() => formatJson({ timestamp: new Date("not a date") })).toThrow(FormatError);
  });
});

describe("screen encoding", () => {
  const plain = createPalette(false);

  it("renders the default fields on one line", () => {
    expect(formatScreen(anchor, { palette: plain })).toBe("[GET] http://x/a [body] [a] [href]");
  });

  it("adds timestamp and body when verbose", () => {
    const result: Result = {
      ...anchor,
      timestamp: new Date("2024-05-01T10:00:00Z"),
      body: "q=1"
    };
    expect(formatScreen(result, { palette: plain, verbose: true })).toBe(
      "[2024-05-01T10:00:00.000Z] [GET] http://x/a [body] [a] [href] [q=1]"
    );
    expect(formatScreen(result, { palette: plain })).toBe("[GET] http://x/a [body] [a] [href]");
  });

  it("renders only the requested fields in the requested order", () => {
    expect(formatScreen(anchor, { palette: plain, fields: ["URL", "Method"] })).toBe(
      "http://x/a [GET]"
    );
  });

  it("skips empty fields", () => {
    expect(formatScreen({ url: "http://x/b", tag: "img" }, { palette: plain })).toBe(
      "http://x/b [img]"
    );
    expect(formatScreen({}, { palette: plain })).toBe("");
  });

  it("decorates fields with colors when enabled", () => {
    expect(formatScreen(anchor, { palette: createPalette(true) })).toBe(
      "[\u001b[34mGET\u001b[39m] http://x/a [\u001b[33mbody\u001b[39m] " +
        "[\u001b[32ma\u001b[39m] [\u001b[36mhref\u001b[39m]"
    );
  });
});

describe("createFormatter", () => {
  it("selects the encoding from the options", () => {
    const json = createFormatter({ json: true, colors: true, verbose: false });
    const text = createFormatter({ json: false, colors: false, verbose: false, fields: ["URL"] });
    expect(json(anchor)).not.toContain("\u001b[");
    expect(JSON.parse(json(anchor))).toEqual({
      method: "GET",
      endpoint: "http://x/a",
      source: "body",
      tag: "a",
      attribute: "href"
    });
    expect(text(anchor)).toBe("http://x/a");
  });
});
