import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import { countHeaderMatches, detectFormat, detectLayout } from "@/lib/ingestion/detect";
import { createDefaultRegistry, LayoutRegistry } from "@/lib/ingestion/layouts";
import { makeTempDir, removeDir, writeFixture } from "./helpers";

const RAKUTEN_HEADER = ["商品コード", "商品名", "保有口数", "評価金額"];

describe("detectLayout", () => {
  const registry = createDefaultRegistry();

  it("matches on the file name before looking at headers", () => {
    const detection = detectLayout("/tmp/x/AssetBalance_20240105.csv", RAKUTEN_HEADER, registry);
    expect(detection?.layout.name).toBe("sbi_portfolio");
    expect(detection?.source).toBe("filename");
  });

  it("matches file names case-insensitively and in Japanese", () => {
    expect(detectLayout("SBI_Trading.csv", null, registry)?.layout.name).toBe("sbi_trading");
    expect(detectLayout("保有商品一覧.csv", null, registry)?.layout.name).toBe("rakuten_portfolio");
  });

  it("falls back to header aliases", () => {
    const detection = detectLayout("download.csv", RAKUTEN_HEADER, registry);
    expect(detection?.layout.name).toBe("rakuten_portfolio");
    expect(detection?.source).toBe("header");
    expect(detection?.matches).toBe(4);
  });

  it("accepts exactly three matched columns", () => {
    const detection = detectLayout("export.csv", ["約定日", "売買", "銘柄", "金額"], registry);
    expect(detection?.layout.name).toBe("sbi_trading");
    expect(detection?.matches).toBe(3);
  });

  it("takes the first adequate layout in registration order", () => {
    const headers = ["Date", "Symbol", "Security Name", "Quantity", "Unit Price", "Amount"];
    const trading = registry.get("sbi_trading");
    expect(trading && countHeaderMatches(trading, headers)).toBe(5);
    expect(detectLayout("history.csv", headers, registry)?.layout.name).toBe("sbi_portfolio");
  });

  it("returns null below the threshold", () => {
    expect(detectLayout("memo.csv", ["銘柄コード", "銘柄名", "備考"], registry)).toBeNull();
    expect(detectLayout("memo.csv", null, registry)).toBeNull();
  });
});

describe("LayoutRegistry", () => {
  it("rejects a duplicate layout name", () => {
    const registry = createDefaultRegistry();
    const existing = registry.get("sbi_portfolio");
    expect(existing).toBeDefined();
    if (existing) {
      expect(() => registry.register(existing)).toThrow("Layout sbi_portfolio is already registered");
    }
  });

  it("lets a caller add a layout after the built-ins", () => {
    const registry = new LayoutRegistry();
    registry.register({
      name: "custom",
      label: "Custom",
      kind: "holdings",
      pattern: /custom_export/,
      columns: [{ column: "symbol", aliases: ["Ticker"] }],
    });
    expect(detectLayout("Custom_Export.csv", null, registry)?.layout.name).toBe("custom");
  });

  it("matches a global file-name pattern on every call", () => {
    const registry = new LayoutRegistry();
    registry.register({
      name: "sticky",
      label: "Sticky",
      kind: "trades",
      pattern: /sticky/g,
      columns: [{ column: "symbol", aliases: ["Ticker"] }],
    });
    expect(detectLayout("sticky.csv", null, registry)?.layout.name).toBe("sticky");
    expect(detectLayout("sticky.csv", null, registry)?.layout.name).toBe("sticky");
  });
});

describe("detectFormat", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("detects from the header of an unnamed export", async () => {
    const file = writeFixture(dir, "download.csv", `${RAKUTEN_HEADER.join(",")}\n0331418A,Fund,1,100\n`);
    await expect(detectFormat(file)).resolves.toEqual({ ok: true, value: "rakuten_portfolio" });
  });

  it("does not read the file when the name already decides", async () => {
    const file = writeFixture(dir, "assetbalance.csv", Buffer.from([0xff]));
    await expect(detectFormat(file, { encodings: ["utf-8"] })).resolves.toEqual({ ok: true, value: "sbi_portfolio" });
  });

  it("reports an unknown layout", async () => {
    const file = writeFixture(dir, "notes.csv", "Foo,Bar\n1,2\n");
    const result = await detectFormat(file);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("unknown_format");
  });

  it("reports undecodable bytes", async () => {
    const file = writeFixture(dir, "mystery.csv", Buffer.from([0xff, 0xfe, 0x41]));
    const result = await detectFormat(file, { encodings: ["utf-8"] });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("encoding_failure");
      expect(result.error.message).toBe("None of utf-8 decoded the file");
    }
  });

  it("reports a missing file as an I/O failure", async () => {
    const result = await detectFormat(`${dir}/absent.csv`);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("io_failure");
  });
});
