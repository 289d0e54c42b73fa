/**
 * Broker export layouts: filename patterns and canonical column aliases
 */

import { LayoutName, LayoutSpec } from '../types/ledger';

export const BUILTIN_LAYOUTS: readonly LayoutSpec[] = [
  {
    name: 'sbi_portfolio',
    label: 'SBI Securities asset balance',
    kind: 'holdings',
    pattern: /(assetbalance|資産残高)/,
    columns: [
      { column: 'date', aliases: ['評価日', 'Date', '日付'] },
      { column: 'symbol', aliases: ['銘柄コード', 'Symbol', 'Code'] },
      { column: 'name', aliases: ['銘柄名', 'Name', '商品名'] },
      { column: 'quantity', aliases: ['保有数量', 'Quantity', '数量'] },
      { column: 'unit_price', aliases: ['基準価格', 'Price', '単価'] },
      { column: 'market_value', aliases: ['評価額', 'Market Value', '時価評価額'] },
      { column: 'gain_loss', aliases: ['評価損益', 'Gain/Loss', '損益'] },
      { column: 'gain_loss_rate', aliases: ['評価損益率', 'Return Rate', '損益率'] },
    ],
  },
  {
    name: 'sbi_trading',
    label: 'SBI Securities trade history',
    kind: 'trades',
    pattern: /(trading|取引履歴)/,
    columns: [
      { column: 'date', aliases: ['約定日', 'Settlement Date', '取引日'] },
      { column: 'type', aliases: ['売買', 'Transaction Type', '取引種別'] },
      { column: 'symbol', aliases: ['銘柄コード', 'Symbol'] },
      { column: 'name', aliases: ['銘柄名', 'Security Name'] },
      { column: 'quantity', aliases: ['数量', 'Quantity'] },
      { column: 'price', aliases: ['単価', 'Unit Price'] },
      { column: 'amount', aliases: ['金額', 'Amount', '約定代金'] },
    ],
  },
  {
    name: 'rakuten_portfolio',
    label: 'Rakuten Securities holdings',
    kind: 'holdings',
    pattern: /(保有商品|portfolio)/,
    columns: [
      { column: 'symbol', aliases: ['商品コード', 'Product Code'] },
      { column: 'name', aliases: ['商品名', 'Product Name'] },
      { column: 'quantity', aliases: ['保有口数', 'Units Held'] },
      { column: 'avg_price', aliases: ['平均取得価額', 'Average Cost'] },
      { column: 'current_price', aliases: ['基準価額', 'Current Price'] },
      { column: 'market_value', aliases: ['評価金額', 'Market Value'] },
      { column: 'gain_loss', aliases: ['評価損益', 'Unrealized P&L'] },
    ],
  },
];

/**
 * Layouts in registration order. Detection scans them in that order and
 * the first adequate match wins, so order is part of the contract.
 */
export class LayoutRegistry {
  private layouts: LayoutSpec[] = [];

  constructor(layouts: readonly LayoutSpec[] = []) {
    layouts.forEach(layout => this.register(layout));
  }

  register(layout: LayoutSpec): void {
    if (this.layouts.some(l => l.name === layout.name)) {
      throw new Error(`Layout ${layout.name} is already registered`);
    }
    this.layouts.push(layout);
  }

  get(name: LayoutName): LayoutSpec | undefined {
    return this.layouts.find(l => l.name === name);
  }

  list(): readonly LayoutSpec[] {
    return this.layouts;
  }
}

export function createDefaultRegistry(): LayoutRegistry {
  return new LayoutRegistry(BUILTIN_LAYOUTS);
}
