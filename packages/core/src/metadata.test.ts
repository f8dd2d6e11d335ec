import { describe, it, expect } from "vitest";
import {
  applySystemMetadata,
  sanitizeMetadata,
  stripUntrustedMetadata,
  systemMetadataFor,
} from "./metadata.js";

describe("sanitizeMetadata", () => {
  it("ignores reserved keys supplied by the user", () => {
    const result = sanitizeMetadata(
      { project_id: "evil", file_id: "evil", user_id: "evil", page: 2 },
      { project_id: "p-1", file_id: "f-1" },
    );

    expect(result).toEqual({ page: 2, project_id: "p-1", file_id: "f-1" });
  });

  it("keeps user keys that are not reserved", () => {
    expect(sanitizeMetadata({ file_title: "notes.txt" })).toEqual({ file_title: "notes.txt" });
  });
});

describe("systemMetadataFor", () => {
  it("forces the tenant id to the namespace", () => {
    expect(systemMetadataFor("u1", { project_id: "p-1", user_id: "someone-else" })).toEqual({
      project_id: "p-1",
      user_id: "u1",
    });
  });
});

describe("applySystemMetadata", () => {
  it("returns copies and leaves the input untouched", () => {
    const input = [{ content: "a", metadata: { user_id: "evil", tag: "x" } }];
    const output = applySystemMetadata(input, { user_id: "u1" });

    expect(output).toEqual([{ content: "a", metadata: { tag: "x", user_id: "u1" } }]);
    expect(input[0]?.metadata).toEqual({ user_id: "evil", tag: "x" });
  });
});

describe("stripUntrustedMetadata", () => {
  it("removes reserved values that differ from the trusted ones", () => {
    const [doc] = stripUntrustedMetadata(
      [{ id: "1", content: "a", metadata: { user_id: "intruder", file_id: "f-1", tag: "x" } }],
      { user_id: "u1" },
    );

    expect(doc?.metadata).toEqual({ file_id: "f-1", tag: "x" });
  });

  it("keeps reserved values equal to the trusted ones", () => {
    const [doc] = stripUntrustedMetadata([{ content: "a", metadata: { user_id: "u1" } }], {
      user_id: "u1",
    });

    expect(doc?.metadata).toEqual({ user_id: "u1" });
  });
});
