#!/usr/bin/env node
import * as path from 'node:path';
import { loadConfig, inputEncodingsFor, AppConfig } from './config.js';
import { JsonFileStore, KeyValueStore } from './cache.js';
import { ParsedDictionary, ParsedDictionarySchema, loadDictionary } from './loader.js';
import { extractDefinitionsFromText } from './extract.js';
import { lookupToFile } from './renderer.js';
import { startServer } from './server.js';
import { Command, USAGE, UsageError, parseArgs } from './args.js';
import { isKnownError } from './errors.js';

function openStore(config: AppConfig): KeyValueStore<ParsedDictionary> | undefined {
  if (!config.cacheFile) return undefined;
  return new JsonFileStore(path.resolve(config.cacheFile), ParsedDictionarySchema);
}

async function run(command: Command, config: AppConfig): Promise<void> {
  const dictionaryPath = command.dictionaryPath ?? config.dictionaryPath;
  const store = openStore(config);

  switch (command.command) {
    case 'extract': {
      const words = await extractDefinitionsFromText({
        inputPath: command.inputPath,
        outputPath: command.outputPath,
        dictionaryPath,
        inputEncodings: inputEncodingsFor(config, command.inputEncoding),
        store
      });
      console.log(`Exported ${words.length} words to ${command.outputPath}`);
      return;
    }

    case 'lookup': {
      console.log(`Parsing ${dictionaryPath}...`);
      const { dictionary, warnings } = await lookupToFile({
        dictionaryPath,
        words: command.words,
        outputPath: command.outputPath,
        store
      });
      console.log(dictionary.describe());
      for (const warning of warnings) {
        console.warn(`WARN: ${warning}`);
      }
      console.log(`Saved ${command.words.length} definitions at ${command.outputPath}.`);
      return;
    }

    case 'serve': {
      console.log(`Loading dictionary from: ${dictionaryPath}`);
      const dictionary = loadDictionary({ dictionaryPath, store });
      console.log(`Loaded ${dictionary.describe()}`);
      startServer(dictionary, command.port ?? config.port);
      return;
    }
  }
}

async function main(): Promise<void> {
  let command: Command;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      console.error(USAGE);
      process.exit(1);
    }
    throw err;
  }

  try {
    await run(command, await loadConfig());
  } catch (err) {
    if (isKnownError(err)) {
      console.error(`${err.name}: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
