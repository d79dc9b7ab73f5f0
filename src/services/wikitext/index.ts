/**
 * Wikitext tokenizing
 *
 * @module services/wikitext
 */

export * from './tokenizer.js';
export {
  findClosing,
  parseTagAttributes,
  sanitizeWikitext,
  splitTemplateParams,
  stripMarkup,
  trimListNoise,
  type ParamSegment,
} from './markup.js';
