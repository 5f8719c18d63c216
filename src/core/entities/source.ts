export type SourceKind = "feed" | "listing";

export type SourceDescriptor = {
  readonly name: string;
  readonly kind: SourceKind;
  readonly url: string;
};

/**
 * A discovered link that has not been filtered or fetched yet.
 * `published` is whatever the source reported, possibly empty.
 */
export type Candidate = {
  title: string;
  url: string;
  published: string;
};
