import { TransportError } from "../shared/errors.js";
import { logger as rootLogger, type ILogger } from "../shared/logger.js";
import { mergeBySymbol, toCodeRecord, type CodeRecord } from "../shared/record.js";
import { decodeBody, type Fetcher } from "./fetcher.js";
import { parseListingTable } from "./parser.js";
import { SOURCES, type Source, type SourceUrls } from "./sources.js";

export type SourceAggregatorOptions = {
  fetcher: Fetcher;
  urls: SourceUrls;
  logger?: ILogger;
};

export class SourceAggregator {
  private readonly fetcher: Fetcher;
  private readonly urls: SourceUrls;
  private readonly logger: ILogger;

  constructor(options: SourceAggregatorOptions) {
    this.fetcher = options.fetcher;
    this.urls = options.urls;
    this.logger = options.logger ?? rootLogger.child("aggregator");
  }

  async fetchSource(source: Source): Promise<CodeRecord[]> {
    const url = this.urls[source];
    const response = await this.fetcher.fetch(url);
    if (response.statusCode !== 200) {
      throw new TransportError(url, `Download request failed (${response.statusCode}) for ${source}`, {
        statusCode: response.statusCode
      });
    }
    const html = decodeBody(response.body, response.contentType);
    const records = parseListingTable(html, source).map(toCodeRecord);
    this.logger.info("Parsed listing page", { source, rows: records.length });
    return records;
  }

  /**
   * Fetches every source in order and merges them by symbol. Any failing
   * source fails the whole call: a dataset with a gap is never returned.
   */
  async fetchAll(): Promise<CodeRecord[]> {
    const collected: CodeRecord[] = [];
    for (const source of SOURCES) {
      collected.push(...(await this.fetchSource(source)));
    }
    const { records, overridden } = mergeBySymbol(collected);
    if (overridden.length > 0) {
      this.logger.debug("Duplicate symbols replaced by later source", { symbols: overridden });
    }
    this.logger.info("Fetched listing codes", { total: records.length });
    return records;
  }
}
