import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { HoldList, normalizeTicker } from "../holdList";

describe("HoldList", () => {
  let dir: string;
  let filePath: string;
  let list: HoldList;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "hold-"));
    filePath = path.join(dir, "hold_list.txt");
    list = new HoldList(filePath);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should normalize tickers", () => {
    expect(normalizeTicker("  voo ")).toBe("VOO");
  });

  it("should be empty before the file exists", () => {
    expect(list.load()).toEqual([]);
  });

  it("should add tickers sorted, upper-cased and unique", () => {
    const change = list.add(["qqq", "0050.tw", "QQQ"]);

    expect(change).toEqual({ changed: ["0050.TW", "QQQ"], unchanged: [] });
    expect(fs.readFileSync(filePath, "utf-8")).toBe("0050.TW\nQQQ\n");
    expect(list.add(["QQQ", "AAPL"])).toEqual({ changed: ["AAPL"], unchanged: ["QQQ"] });
    expect(list.load()).toEqual(["0050.TW", "AAPL", "QQQ"]);
  });

  it("should remove tickers and report absent ones", () => {
    list.add(["VOO", "QQQ"]);

    expect(list.remove(["voo", "MSFT"])).toEqual({ changed: ["VOO"], unchanged: ["MSFT"] });
    expect(list.load()).toEqual(["QQQ"]);

    list.remove(["QQQ"]);
    expect(fs.readFileSync(filePath, "utf-8")).toBe("");
  });

  it("should read hand-edited files with blank lines and CRLF endings", () => {
    fs.writeFileSync(filePath, "voo\r\n\r\n 2330.tw\r\nVOO\r\n", "utf-8");
    expect(list.load()).toEqual(["2330.TW", "VOO"]);
  });
});
