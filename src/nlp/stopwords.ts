import { z } from 'zod';
import { readDataFile } from '../utils/data.js';

/**
 * English stopword list with generic academic filler words.
 * No stemming; matching is exact on lowercase tokens.
 */
export const STOPWORDS: ReadonlySet<string> = new Set(readDataFile('stopwords.json', z.array(z.string())));
