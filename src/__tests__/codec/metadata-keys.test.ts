import { describe, it, expect } from "@jest/globals";
import {
  escapeMetadataKey,
  unescapeMetadataKey,
} from "../../codec/metadata-keys";

describe("metadata key escapes", () => {
  it("prefixes keys that read back as metadata", () => {
    expect(escapeMetadataKey("$id")).toBe("$$id");
    expect(escapeMetadataKey("$ref")).toBe("$$ref");
    expect(escapeMetadataKey("$values")).toBe("$$values");
    expect(escapeMetadataKey("$$id")).toBe("$$$id");
  });

  it("leaves every other key unchanged", () => {
    expect(escapeMetadataKey("id")).toBe("id");
    expect(escapeMetadataKey("$type")).toBe("$type");
    expect(escapeMetadataKey("$idx")).toBe("$idx");
  });

  it("strips exactly one prefix on the way back", () => {
    expect(unescapeMetadataKey("$$id")).toBe("$id");
    expect(unescapeMetadataKey("$$$ref")).toBe("$$ref");
    expect(unescapeMetadataKey("$id")).toBe("$id");
    expect(unescapeMetadataKey("$$type")).toBe("$$type");
  });
});
