export { FileFillQuery } from "./file-fill-query.js";
export { FileMarketData, type Quote } from "./file-market-data.js";
export { callWithTimeout } from "./timeout.js";
export type { BrokerFillQuery, MarketDataProvider } from "./types.js";
