import { describe, expect, it } from "@jest/globals";
import { decodeBuffer } from "@/lib/ingestion/encoding";

describe("decodeBuffer", () => {
  it("prefers utf-8 for valid utf-8 bytes", () => {
    const decoded = decodeBuffer(Buffer.from("銘柄名,評価額\n", "utf-8"));
    expect(decoded).toEqual({ text: "銘柄名,評価額\n", encoding: "utf-8" });
  });

  it("drops a leading byte order mark", () => {
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("Symbol\n")]);
    expect(decodeBuffer(bytes)?.text).toBe("Symbol\n");
  });

  it("falls back to shift_jis when utf-8 rejects the bytes", () => {
    // "テスト" in Shift_JIS
    const bytes = Buffer.from([0x83, 0x65, 0x83, 0x58, 0x83, 0x67]);
    expect(decodeBuffer(bytes)).toEqual({ text: "テスト", encoding: "shift_jis" });
  });

  it("skips labels the runtime does not know", () => {
    expect(decodeBuffer(Buffer.from("abc"), ["no-such-encoding", "utf-8"])).toEqual({
      text: "abc",
      encoding: "utf-8",
    });
  });

  it("returns null when no candidate decodes the bytes", () => {
    expect(decodeBuffer(Buffer.from([0xff, 0xfe, 0x41]), ["utf-8"])).toBeNull();
  });
});
