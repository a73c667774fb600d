export const SOURCES = ["LISTED", "OTC", "FUTURES_INDEX"] as const;

export type Source = (typeof SOURCES)[number];

export type SourceUrls = Record<Source, string>;

/** Only the futures/index page lacks interstitial category headers. */
export const hasCategoryHeaders = (source: Source) => source !== "FUTURES_INDEX";
