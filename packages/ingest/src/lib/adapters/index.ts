import type { StrategyConfig } from "../sources-config";
import { HtmlListAdapter } from "./html";
import { JsonListAdapter } from "./json";
import { RssFeedAdapter } from "./rss";
import type { AdapterContext, SourceAdapter } from "./types";

export type { AdapterContext, ParsedPage, SourceAdapter } from "./types";

export const createAdapter = (strategy: StrategyConfig, ctx: AdapterContext): SourceAdapter => {
  switch (strategy.collector_type) {
    case "procurement_json":
      return new JsonListAdapter(ctx, strategy.extraction);
    case "procurement_html":
    case "generic_html":
      return new HtmlListAdapter(strategy.collector_type, ctx, strategy.extraction);
    case "rss":
      return new RssFeedAdapter(ctx, strategy.extraction);
  }
};
