import * as cheerio from 'cheerio';
import registerDebug from 'debug';
import { EntryRecord, ParseResult, SplitResult } from './types.js';
import { BODY_DATA_FORMAT, ContainerFormat } from './format.js';
import { readSegments } from './segments.js';
import { CorruptContainerError } from './errors.js';

const debug = registerDebug('wordhoard:parser');

const NEWLINE = 0x0a;

// Matches the opening of a namespaced root tag: "<d:entry " or "<d:entry>"
// Group 1: namespace prefix
// Group 2: local name
const ROOT_TAG_PATTERN = /^<([A-Za-z_][\w.-]*):([A-Za-z_][\w.-]*)[\s>]/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Shorten entry markup for error messages
 */
function excerpt(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function decodeEntry(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new CorruptContainerError(`Entry is not valid UTF-8: ${err}`);
  }
}

/**
 * Read the headword from an entry fragment.
 *
 * The title attribute lives in whatever namespace the root element's prefix
 * is bound to, so the binding is looked up in the fragment's own declarations.
 */
export function readEntryKey(text: string, format: ContainerFormat = BODY_DATA_FORMAT): string {
  const match = text.match(ROOT_TAG_PATTERN);
  if (!match || match[2] !== format.rootTag) {
    throw new CorruptContainerError(`Entry does not start with a <prefix:${format.rootTag}> tag: ${excerpt(text)}`);
  }

  const prefix = match[1];
  const closing = `</${prefix}:${format.rootTag}>`;
  if (!text.endsWith(closing)) {
    throw new CorruptContainerError(`Entry does not end with ${closing}: ${excerpt(text)}`);
  }

  const $ = cheerio.load(text, { xml: true });
  const root = $.root().children().toArray()[0];
  if (!root) {
    throw new CorruptContainerError(`Entry has no root element: ${excerpt(text)}`);
  }

  const namespaceUri = root.attribs[`xmlns:${prefix}`];
  if (!namespaceUri) {
    throw new CorruptContainerError(`Entry declares no namespace for prefix "${prefix}": ${excerpt(text)}`);
  }

  const key = root.attribs[`${prefix}:${format.titleAttribute}`];
  if (key === undefined) {
    throw new CorruptContainerError(
      `Entry has no ${format.titleAttribute} attribute in namespace ${namespaceUri}: ${excerpt(text)}`
    );
  }
  return key;
}

/** The first `count` code points of `text`; surrogate pairs count once */
function leadingCodePoints(text: string, count: number): string {
  let end = 0;
  let seen = 0;
  for (const char of text) {
    if (seen === count) break;
    end += char.length;
    seen += 1;
  }
  return text.slice(0, end);
}

/**
 * Split one decompressed payload into newline-delimited entries.
 *
 * Layout: a fixed prefix, then repeated {entry markup, newline, fixed gap}.
 * Whatever follows the last newline is trailer data and is ignored.
 */
export function splitEntries(payload: Uint8Array, format: ContainerFormat = BODY_DATA_FORMAT): SplitResult {
  const entries: EntryRecord[] = [];
  let rest = payload.subarray(format.segmentPrefixSize);

  while (true) {
    const end = rest.indexOf(NEWLINE);
    if (end === -1) break;

    const text = decodeEntry(rest.subarray(0, end));

    if (leadingCodePoints(text, format.sentinelWindow).includes(format.sentinel)) {
      debug('%s detected, stopping', format.sentinel);
      return { entries, stop: true };
    }

    entries.push({ key: readEntryKey(text, format), content: text });

    rest = rest.subarray(end + 1 + format.entryGapSize);
  }

  return { entries, stop: false };
}

/**
 * Parse a whole container into entry records, in container order.
 */
export function parseContainer(bytes: Uint8Array, format: ContainerFormat = BODY_DATA_FORMAT): ParseResult {
  const entries: EntryRecord[] = [];
  let segmentCount = 0;

  for (const segment of readSegments(bytes, format)) {
    const { entries: found, stop } = splitEntries(segment.payload, format);
    entries.push(...found);
    segmentCount++;

    if (stop) {
      return { entries, segmentCount, stoppedAtSentinel: true };
    }

    if (segmentCount % 10 === 0 && entries.length > 0) {
      const progress = (segment.offset + segment.consumed) / bytes.length;
      debug(
        '%s%% // %d entries parsed // latest entry: %s',
        (progress * 100).toFixed(1),
        entries.length,
        entries[entries.length - 1].key
      );
    }
  }

  return { entries, segmentCount, stoppedAtSentinel: false };
}
