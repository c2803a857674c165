/**
 * Layout constants of a concatenated-segment dictionary container.
 *
 * None of these are self-describing in the file; they were observed on
 * Body.data containers and must match the target format exactly.
 */
export interface ContainerFormat {
  /** Bytes skipped unconditionally at the start of the file */
  headerSize: number;

  /** Bytes at the start of every decompressed payload that precede the first entry */
  segmentPrefixSize: number;

  /** Bytes between an entry's terminating newline and the next entry */
  entryGapSize: number;

  /** Marker whose presence in an entry ends all further parsing */
  sentinel: string;

  /** How many leading characters of an entry are searched for the sentinel */
  sentinelWindow: number;

  /** Local name of the root element of every entry */
  rootTag: string;

  /** Local name of the namespaced attribute holding the headword */
  titleAttribute: string;
}

export const BODY_DATA_FORMAT: ContainerFormat = {
  headerSize: 100,
  segmentPrefixSize: 4,
  entryGapSize: 4,
  sentinel: 'fbm_AdvisoryBoard',
  sentinelWindow: 1000,
  rootTag: 'entry',
  titleAttribute: 'title'
};

/** File name every container path must end with */
export const CONTAINER_FILE_NAME = 'Body.data';
