import fs from "fs";
import os from "os";
import path from "path";

export function makeTempDir(prefix = "ledger-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFixture(dir: string, name: string, content: string | Buffer): string {
  const full = path.join(dir, name);
  fs.writeFileSync(full, content);
  return full;
}

/** A clock that stays put until moved. */
export function fixedClock(year: number, month: number, day: number) {
  let current = new Date(year, month - 1, day, 10, 0, 0);
  return {
    now: () => current,
    set(y: number, m: number, d: number) {
      current = new Date(y, m - 1, d, 10, 0, 0);
    },
  };
}

export const SBI_HOLDINGS_CSV = [
  "評価日,銘柄コード,銘柄名,保有数量,基準価格,評価額,評価損益,評価損益率",
  '2024/01/05,7203,トヨタ自動車,100,"2,500",¥250000,"+12,000",5.04%',
  "2024/01/05,6758,ソニーグループ,50,\"13,000\",N/A,-3000,-4.41%",
  "",
].join("\n");

export const SBI_TRADES_CSV = [
  "約定日,売買,銘柄コード,銘柄名,数量,単価,約定代金",
  '2024/02/01,買,7203,トヨタ自動車,100,"2,450","245,000"',
  '2024/02/02,売,6758,ソニーグループ,10,"13,100","131,000"',
  "",
].join("\n");
