import fs from 'fs-extra';
import * as path from 'node:path';
import JSZip from 'jszip';
import { z } from 'zod';
import { Dictionary } from './dictionary.js';
import { FilteredExport, LinkMap, WordCounts } from './types.js';
import { ConfigurationError, CorruptContainerError, InputNotFoundError } from './errors.js';

export const MASTER_FILE = 'master.json';
export const FULLTEXT_FILE = 'fulltext.txt';

const MasterSchema = z.object({
  definitions: z.record(z.string()),
  links: z.record(z.string()),
  scores: z.record(z.number())
});

/**
 * Inputs for building an export
 */
export interface ExportOptions {
  dictionary: Dictionary;
  /** Words to export; only the keys are used */
  counts: WordCounts;
  scores: Map<string, number>;
  /** Extra word -> dictionary form links, e.g. from vocabulary extraction */
  links?: LinkMap;
  /** Source text to bundle */
  text?: string;
}

/**
 * Project the dictionary onto the counted words.
 * @throws WordNotFoundError if any counted word does not resolve
 */
export function buildExport(options: ExportOptions): FilteredExport {
  const { dictionary, counts, scores, links, text } = options;
  const filtered = dictionary.filtered(counts.keys());

  const definitions: Record<string, string> = Object.fromEntries(
    Array.from(filtered.entries, ([word, entry]): [string, string] => [word, entry.content])
  );

  const merged: LinkMap = new Map(filtered.links);
  for (const [word, target] of links ?? []) {
    if (!filtered.entries.has(target) || filtered.entries.has(word) || merged.has(word)) continue;
    // Point at the canonical key, never at another link
    const canonical = dictionary.resolve(target);
    if (canonical !== undefined) {
      merged.set(word, canonical);
    }
  }

  const exported: FilteredExport = {
    definitions,
    links: Object.fromEntries(merged),
    scores: Object.fromEntries(scores)
  };
  if (text !== undefined) {
    exported.text = text;
  }
  return exported;
}

/**
 * Make sure an archive can be written to `outputPath`, creating its directory.
 */
export function checkOutputPath(outputPath: string): void {
  if (!outputPath.endsWith('.zip')) {
    throw new ConfigurationError(`Output path should end in .zip, got ${outputPath}`);
  }
  checkOutputDirectory(outputPath);
}

/**
 * Create the directory `outputPath` will be written to and check it is writable.
 */
export function checkOutputDirectory(outputPath: string): void {
  const dir = path.dirname(path.resolve(outputPath));
  try {
    fs.ensureDirSync(dir);
    fs.accessSync(dir, fs.constants.W_OK);
  } catch (err) {
    throw new ConfigurationError(`Output directory ${dir} is not writable: ${err}`);
  }
}

export async function packExport(exported: FilteredExport): Promise<Buffer> {
  const { text, ...master } = exported;
  const zip = new JSZip();
  zip.file(MASTER_FILE, JSON.stringify(master));
  if (text !== undefined) {
    zip.file(FULLTEXT_FILE, text);
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

/**
 * @throws CorruptContainerError when the archive lacks master.json or it does not validate
 */
export async function unpackExport(archive: Buffer): Promise<FilteredExport> {
  const zip = await JSZip.loadAsync(archive);

  const masterFile = zip.file(MASTER_FILE);
  if (!masterFile) {
    throw new CorruptContainerError(`Export archive has no ${MASTER_FILE}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await masterFile.async('string'));
  } catch (err) {
    throw new CorruptContainerError(`${MASTER_FILE} is not valid JSON: ${err}`);
  }

  const parsed = MasterSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptContainerError(`${MASTER_FILE} does not match the export format: ${parsed.error.message}`);
  }

  const exported: FilteredExport = parsed.data;
  const textFile = zip.file(FULLTEXT_FILE);
  if (textFile) {
    exported.text = await textFile.async('string');
  }
  return exported;
}

export async function writeExportArchive(exported: FilteredExport, outputPath: string): Promise<void> {
  checkOutputPath(outputPath);
  await fs.writeFile(outputPath, await packExport(exported));
}

export async function readExportArchive(archivePath: string): Promise<FilteredExport> {
  if (!(await fs.pathExists(archivePath))) {
    throw new InputNotFoundError(archivePath);
  }
  return unpackExport(await fs.readFile(archivePath));
}
