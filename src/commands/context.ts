/**
 * Collaborators every command needs, swappable in tests
 */

import { GlobalConfig, globalConfig } from "../config/globalConfig";
import { MarketDataProvider } from "../data/fetcher";
import { HoldList } from "../data/holdList";
import { createDefaultProvider } from "../services/dataService";

export interface CommandContext {
  provider: MarketDataProvider;
  holdList: HoldList;
  settings: GlobalConfig;
  // Report sink; console.log in production
  print: (line: string) => void;
}

export function createDefaultContext(): CommandContext {
  return {
    provider: createDefaultProvider(),
    holdList: new HoldList(globalConfig.holdList.file),
    settings: globalConfig,
    print: (line: string) => console.log(line),
  };
}
