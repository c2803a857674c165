import fs from 'fs-extra';
import * as path from 'node:path';
import { format } from 'prettier';
import { Dictionary } from './dictionary.js';
import { Entry } from './entry.js';
import { CONTAINER_FILE_NAME } from './format.js';
import { KeyValueStore } from './cache.js';
import { checkOutputDirectory } from './exporter.js';
import { ParsedDictionary, checkContainerPath, loadDictionary } from './loader.js';

export const DEFAULT_STYLESHEET = 'DefaultStyle.css';
export const CUSTOM_STYLESHEET = 'CustomStyle.css';

export const REPORT_HEADER = `<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Words</title>
  <link rel="stylesheet" href="${DEFAULT_STYLESHEET}">
  <link rel="stylesheet" href="${CUSTOM_STYLESHEET}">
</head>
`;

export const CUSTOM_CSS = `.div-entry {
    border-top: 2px solid black;
    padding-bottom: 50px;
}
`;

/**
 * Pretty-print an entry's markup as an HTML fragment
 */
export async function renderEntryHtml(entry: Entry): Promise<string> {
  return format(entry.content, { parser: 'html' });
}

/**
 * Render the entries for `words` into one HTML document.
 * Every word must resolve; the first that does not aborts the whole report.
 * @throws WordNotFoundError
 */
export async function renderLookupReport(dictionary: Dictionary, words: string[]): Promise<string> {
  // Resolve everything before rendering anything
  const entries = words.map(word => dictionary.get(word));

  const parts = [REPORT_HEADER, '<body>'];
  for (const entry of entries) {
    parts.push('<div class="div-entry">', await renderEntryHtml(entry), '</div>');
  }
  parts.push('</body>', '</html>\n');

  return parts.join('');
}

/**
 * Options for saving a lookup report
 */
export interface SaveReportOptions {
  /** Container the dictionary came from; its DefaultStyle.css is copied */
  dictionaryPath: string;
  dictionary: Dictionary;
  words: string[];
  /** Where to write the .html file */
  outputPath: string;
}

/**
 * Write a lookup report plus the stylesheets it links to.
 * @returns Warnings, e.g. a missing default stylesheet
 */
export async function saveLookupReport(options: SaveReportOptions): Promise<string[]> {
  const { dictionaryPath, dictionary, words, outputPath } = options;
  const warnings: string[] = [];

  const html = await renderLookupReport(dictionary, words);
  const outputDir = path.dirname(outputPath);
  await fs.ensureDir(outputDir);
  await fs.writeFile(outputPath, html, 'utf-8');

  const cssPath = path.join(
    path.dirname(dictionaryPath),
    path.basename(dictionaryPath).replace(CONTAINER_FILE_NAME, DEFAULT_STYLESHEET)
  );
  if (await fs.pathExists(cssPath)) {
    await fs.copy(cssPath, path.join(outputDir, DEFAULT_STYLESHEET));
  } else {
    warnings.push(`CSS not found at expected path ${cssPath}`);
  }

  await fs.writeFile(path.join(outputDir, CUSTOM_STYLESHEET), CUSTOM_CSS, 'utf-8');

  return warnings;
}

/**
 * Options for a lookup run against a container on disk
 */
export interface LookupOptions {
  dictionaryPath: string;
  words: string[];
  outputPath: string;
  /** Memoization for the parsed container */
  store?: KeyValueStore<ParsedDictionary>;
}

/**
 * Load a container and save a lookup report for `words`.
 * Both paths are checked before the container is parsed.
 */
export async function lookupToFile(options: LookupOptions): Promise<{ dictionary: Dictionary; warnings: string[] }> {
  const { dictionaryPath, words, outputPath, store } = options;

  checkOutputDirectory(outputPath);
  checkContainerPath(dictionaryPath);

  const dictionary = loadDictionary({ dictionaryPath, store });
  const warnings = await saveLookupReport({ dictionaryPath, dictionary, words, outputPath });
  return { dictionary, warnings };
}
