import fs from 'fs-extra';
import registerDebug from 'debug';
import { KeyValueStore } from './cache.js';
import { buildExport, checkOutputPath, writeExportArchive } from './exporter.js';
import { ParsedDictionary, checkContainerPath, loadDictionary, readText } from './loader.js';
import { LanguageTools, createEnglishTools } from './nlp.js';
import { computeScores } from './scores.js';
import { extractVocabulary } from './vocabulary.js';
import { InputNotFoundError } from './errors.js';

const debug = registerDebug('wordhoard:extract');

/**
 * Options for extracting a book's vocabulary
 */
export interface ExtractOptions {
  /** Text file holding the book */
  inputPath: string;
  /** .zip archive to write */
  outputPath: string;
  /** Body.data container to resolve words against */
  dictionaryPath: string;
  /** Encodings to try on the input, in order (default: DEFAULT_INPUT_ENCODINGS) */
  inputEncodings?: readonly string[];
  /** Tokenizer/lemmatizer (default: English) */
  tools?: LanguageTools;
  /** Memoization for the parsed container */
  store?: KeyValueStore<ParsedDictionary>;
}

/**
 * Read a book, find the words the dictionary defines, and write their
 * definitions, links and scores plus the text into an archive.
 *
 * All paths are checked before the container is parsed.
 * @returns The exported words
 */
export async function extractDefinitionsFromText(options: ExtractOptions): Promise<string[]> {
  const { inputPath, outputPath, dictionaryPath, inputEncodings, store } = options;

  if (!(await fs.pathExists(inputPath))) {
    throw new InputNotFoundError(inputPath);
  }
  checkOutputPath(outputPath);
  checkContainerPath(dictionaryPath);

  const dictionary = loadDictionary({ dictionaryPath, store });
  debug(dictionary.describe());

  const text = readText(inputPath, inputEncodings);
  const { counts, links } = extractVocabulary(text, dictionary, options.tools ?? createEnglishTools());
  dictionary.addLinks(links);

  const scores = computeScores(counts, dictionary);
  const exported = buildExport({ dictionary, counts, scores, links, text });
  await writeExportArchive(exported, outputPath);

  return Array.from(counts.keys());
}
