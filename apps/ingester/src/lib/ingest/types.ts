/** One URL pulled out of a dropped file. */
export interface UrlItem {
  rawUrl: string;
  /** Originating file name, for diagnostics only. */
  sourceFile?: string;
  site?: string;
  normalizedUrl?: string;
}

/** What a destination receives once the URL has been classified. */
export interface ClassifiedUrl {
  rawUrl: string;
  site: string;
  normalizedUrl: string;
}

export interface UrlSink {
  enqueue(item: ClassifiedUrl): void | Promise<void>;
  /** Pending item count, when the sink can report one. */
  readonly size?: number;
}

/** Site identifier to sink. `other` is the fallback key. */
export type DestinationMap = ReadonlyMap<string, UrlSink>;

export interface Notifier {
  notify(title: string, body: string, tag: string): void | Promise<void>;
}
