export type SiteDefinition = {
  /** Site identifier used as the destination key. */
  id: string;
  /** Host names without a `www.` or `m.` prefix. */
  hosts: string[];
  /** Matched against the URL pathname; groups feed `canonicalUrl`. */
  storyPattern: RegExp;
  canonicalUrl: (match: RegExpMatchArray) => string;
};
