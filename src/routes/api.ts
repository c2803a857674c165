import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { Dictionary } from '../dictionary.js';
import { searchWords, SearchOptions } from '../loader.js';
import { renderEntryHtml, renderLookupReport } from '../renderer.js';
import { extractVocabulary } from '../vocabulary.js';
import { computeScores } from '../scores.js';
import { LanguageTools } from '../nlp.js';

const LookupBody = z.object({
  words: z.array(z.string()).min(1)
});

const VocabularyBody = z.object({
  text: z.string()
});

function parseLimit(limit: unknown): number | undefined {
  if (limit && typeof limit === 'string') {
    const n = parseInt(limit, 10);
    if (!isNaN(n) && n > 0) {
      return n;
    }
  }
  return undefined;
}

/**
 * Create API routes for dictionary access
 */
export function createApiRoutes(dictionary: Dictionary, tools: LanguageTools): Router {
  const router = Router();

  /**
   * GET /api/words
   * List headwords
   * Query params: ?limit=10
   */
  router.get('/words', (req: Request, res: Response) => {
    let words = Array.from(dictionary.entries.keys());

    const limit = parseLimit(req.query.limit);
    if (limit) {
      words = words.slice(0, limit);
    }

    res.json(words);
  });

  /**
   * GET /api/entry/:word
   * Get the entry a word resolves to, following links
   */
  router.get('/entry/:word', (req: Request, res: Response) => {
    const { word } = req.params;
    const entry = dictionary.get(word);

    res.json({
      word,
      key: entry.key,
      linked: entry.key !== word,
      content: entry.content,
      info: Array.from(entry.info),
      relatedWords: Array.from(entry.relatedWords)
    });
  });

  /**
   * GET /api/search
   * Search headwords and links
   * Query params: ?q=hous&limit=20
   */
  router.get('/search', (req: Request, res: Response) => {
    const { q } = req.query;

    if (!q || typeof q !== 'string') {
      res.status(400).json({ error: 'Query parameter "q" is required' });
      return;
    }

    const options: SearchOptions = { limit: parseLimit(req.query.limit) };
    res.json(searchWords(q, dictionary, options));
  });

  /**
   * GET /api/render/:word
   * Render a word's entry as pretty-printed HTML
   */
  router.get('/render/:word', (req: Request, res: Response, next: NextFunction) => {
    renderEntryHtml(dictionary.get(req.params.word))
      .then(html => {
        res.type('text/html').send(html);
      })
      .catch(next);
  });

  /**
   * POST /api/lookup
   * Render a report for several words; fails if any is missing
   * Body: { "words": ["vital", "house"] }
   */
  router.post('/lookup', (req: Request, res: Response, next: NextFunction) => {
    const body = LookupBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Body must be { "words": [string, ...] }' });
      return;
    }

    renderLookupReport(dictionary, body.data.words)
      .then(html => {
        res.type('text/html').send(html);
      })
      .catch(next);
  });

  /**
   * POST /api/vocabulary
   * Count and score the dictionary words of a text
   * Body: { "text": "..." }
   */
  router.post('/vocabulary', (req: Request, res: Response) => {
    const body = VocabularyBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Body must be { "text": string }' });
      return;
    }

    const { counts, links } = extractVocabulary(body.data.text, dictionary, tools);
    const scores = computeScores(counts, dictionary);

    res.json({
      counts: Object.fromEntries(counts),
      links: Object.fromEntries(links),
      scores: Object.fromEntries(scores)
    });
  });

  return router;
}
