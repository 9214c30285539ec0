/**
 * Hold list persistence
 * One upper-cased ticker per line, kept sorted and unique.
 */

import * as fs from "fs";
import * as path from "path";

export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

export interface HoldListChange {
  changed: string[];    // Tickers actually added or removed
  unchanged: string[];  // Already present (add) or absent (remove)
}

export class HoldList {
  private filePath: string;

  constructor(filePath: string = "hold_list.txt") {
    this.filePath = filePath;
  }

  /**
   * Current tickers, empty when the file does not exist yet
   */
  load(): string[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }
    const lines = fs.readFileSync(this.filePath, "utf-8").split(/\r?\n/);
    return normalize(lines);
  }

  add(tickers: string[]): HoldListChange {
    const current = new Set(this.load());
    const change: HoldListChange = { changed: [], unchanged: [] };

    for (const ticker of normalize(tickers)) {
      if (current.has(ticker)) {
        change.unchanged.push(ticker);
      } else {
        current.add(ticker);
        change.changed.push(ticker);
      }
    }

    this.save([...current]);
    return change;
  }

  remove(tickers: string[]): HoldListChange {
    const current = new Set(this.load());
    const change: HoldListChange = { changed: [], unchanged: [] };

    for (const ticker of normalize(tickers)) {
      if (current.delete(ticker)) {
        change.changed.push(ticker);
      } else {
        change.unchanged.push(ticker);
      }
    }

    this.save([...current]);
    return change;
  }

  private save(tickers: string[]): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const sorted = normalize(tickers);
    fs.writeFileSync(this.filePath, sorted.length > 0 ? `${sorted.join("\n")}\n` : "", "utf-8");
  }
}

function normalize(tickers: string[]): string[] {
  const unique = new Set(tickers.map(normalizeTicker).filter((t) => t.length > 0));
  return [...unique].sort();
}
