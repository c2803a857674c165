/**
 * One independently-compressed run of bytes found inside a container.
 */
export interface Segment {
  /** Absolute byte offset in the container where decompression succeeded */
  offset: number;

  /** Decompressed bytes */
  payload: Buffer;

  /** Number of compressed bytes the decoder consumed starting at `offset` */
  consumed: number;
}

/**
 * A headword and its raw markup, as split out of a segment payload.
 */
export interface EntryRecord {
  key: string;
  content: string;
}

/**
 * Result of splitting one decompressed payload into entries.
 */
export interface SplitResult {
  entries: EntryRecord[];

  /** True when the terminal sentinel was seen and no further segments should be read */
  stop: boolean;
}

/**
 * Result of parsing a whole container.
 */
export interface ParseResult {
  /** All entries in container order, duplicates included */
  entries: EntryRecord[];

  /** Number of segments that were decompressed */
  segmentCount: number;

  /** Whether parsing ended at the sentinel rather than at the end of the buffer */
  stoppedAtSentinel: boolean;
}

/**
 * Word occurrence counts, keyed by dictionary-resolvable form.
 */
export type WordCounts = Map<string, number>;

/**
 * Word-to-canonical-word mapping.
 */
export type LinkMap = Map<string, string>;

/**
 * The document stored as master.json inside an export archive.
 */
export interface FilteredExport {
  /** Word -> raw entry markup */
  definitions: Record<string, string>;

  /** Word -> canonical word whose definition it uses */
  links: Record<string, string>;

  /** Word -> rarity score (lower is rarer) */
  scores: Record<string, number>;

  /** Processed source text, stored beside master.json as fulltext.txt */
  text?: string;
}
