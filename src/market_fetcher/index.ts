/**
 * Market fetcher module — thin facade over markets/yahoo_provider.
 */
export { YahooMarketDataProvider } from "../markets/yahoo_provider";
