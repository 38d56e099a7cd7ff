import { describe, it, expect } from "vitest";
import {
  decodePathData,
  entryOptions,
  serializeAcl,
  toPathOptions,
} from "../src/token/acl.js";
import { TokenError } from "../src/errors/error.js";
import type { PathData, PathOptions } from "../src/token/types.js";

describe("decodePathData", () => {
  it("decodes bare paths", () => {
    expect(decodePathData(["/a/**", "/b/**"])).toEqual([
      { kind: "bare", path: "/a/**" },
      { kind: "bare", path: "/b/**" },
    ]);
  });

  it("decodes bare and keyed entries in order", () => {
    expect(
      decodePathData([
        "/a/**",
        { "/b/**": { methods: ["GET"] }, "/c/**": {} },
      ]),
    ).toEqual([
      { kind: "bare", path: "/a/**" },
      { kind: "withOptions", path: "/b/**", options: { methods: ["GET"] } },
      { kind: "withOptions", path: "/c/**", options: {} },
    ]);
  });

  it("decodes a single path-to-options map", () => {
    expect(decodePathData({ "/v1/**": { methods: ["POST"], rate: 5 } })).toEqual(
      [
        {
          kind: "withOptions",
          path: "/v1/**",
          options: { methods: ["POST"], rate: 5 },
        },
      ],
    );
  });

  it("rejects an empty path", () => {
    expect(() => decodePathData([""])).toThrow(
      "ACL path must be a non-empty string",
    );
  });

  it("rejects entries that are neither a path nor a map", () => {
    const bad: PathData = JSON.parse('[["/a/**"]]');
    expect(() => decodePathData(bad)).toThrow(TokenError);
  });

  it("rejects options that are not an object", () => {
    const bad: PathData = JSON.parse('[{"/a/**": true}]');
    expect(() => decodePathData(bad)).toThrow(
      'Options for ACL path "/a/**" must be an object',
    );
  });

  it("rejects methods that are not a list of strings", () => {
    const bad: PathData = JSON.parse('{"/a/**": {"methods": "GET"}}');

    let caught: unknown;
    try {
      decodePathData(bad);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(TokenError);
    expect(caught).toMatchObject({
      code: "TOKEN_INVALID_INPUT",
      details: { path: "/a/**", methods: "GET" },
    });
  });
});

describe("toPathOptions", () => {
  it("copies options and the methods list", () => {
    const methods = ["GET"];
    const source: PathOptions = { methods, scope: "read" };
    const copy = toPathOptions("/a", source);

    methods.push("DELETE");
    expect(copy).toEqual({ methods: ["GET"], scope: "read" });
  });
});

describe("serializeAcl", () => {
  it("renders every path as an object keyed by path", () => {
    const paths = new Map<string, PathOptions>([
      ["/a/**", entryOptions({ kind: "bare", path: "/a/**" })],
      ["/b/**", { methods: ["GET", "PUT"] }],
    ]);

    expect(serializeAcl(paths)).toEqual({
      paths: { "/a/**": {}, "/b/**": { methods: ["GET", "PUT"] } },
    });
  });
});
