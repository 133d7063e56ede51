import { describe, expect, it } from "vitest";
import { expandRange, parseTargets } from "../utils/targets";

describe("targets", () => {
  it("should expand a numbered range with a query string", () => {
    expect(
      expandRange({ baseUrl: "https://meta.test/c/", from: 1, to: 3, query: { gatewayToken: "test-token" } })
    ).toEqual([
      { url: "https://meta.test/c/1.json?gatewayToken=test-token", id: 1 },
      { url: "https://meta.test/c/2.json?gatewayToken=test-token", id: 2 },
      { url: "https://meta.test/c/3.json?gatewayToken=test-token", id: 3 },
    ]);
  });

  it("should expand a range without query or extension", () => {
    expect(expandRange({ baseUrl: "https://meta.test/", from: 5, to: 5, extension: "" })).toEqual([
      { url: "https://meta.test/5", id: 5 },
    ]);
  });

  it("should accept a list of urls and target objects", () => {
    expect(
      parseTargets(["https://meta.test/a.json", { url: "https://meta.test/b.json", id: "b" }, { url: "https://meta.test/c.json", id: true }])
    ).toEqual([
      "https://meta.test/a.json",
      { url: "https://meta.test/b.json", id: "b" },
      { url: "https://meta.test/c.json" },
    ]);
  });

  it("should parse a range object", () => {
    expect(parseTargets({ baseUrl: "https://meta.test/", from: 1, to: 2 })).toHaveLength(2);
  });

  it("should reject entries without a url", () => {
    expect(() => parseTargets([{ id: 1 }])).toThrow("Target at position 0 has no url");
    expect(() => parseTargets("https://meta.test/a.json")).toThrow(
      "Targets must be an array or a { baseUrl, from, to } range"
    );
  });
});
