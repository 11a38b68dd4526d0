// apps/server/src/lexiconFile.ts
//
// Reads the word list from disk and builds the scored lexicon once.

import { promises as fs } from 'node:fs';
import { buildLexicon, type Lexicon } from '@daily-starter/lexicon';
import { LexiconLoadError, errorMessage } from './errors.js';

export async function loadLexicon(filePath: string): Promise<Lexicon> {
  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new LexiconLoadError(`Failed to read lexicon ${filePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  const lexicon = buildLexicon(source);
  if (lexicon.size === 0) {
    throw new LexiconLoadError(`Lexicon ${filePath} has no 5-letter words`);
  }
  return lexicon;
}
