/**
 * Tokenization and TF-IDF over a candidate set
 */

import { NewsRecord } from '../../database/models';

// Word characters, whitespace and Hangul survive; everything else splits
const NON_WORD = /[^\w\s가-힣]/g;

export const tokenize = (text: string): string[] =>
  text
    .toLowerCase()
    .replace(NON_WORD, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 1);

export const documentText = (record: NewsRecord): string =>
  [record.title, record.summary, record.content, record.keywords.join(' ')].join(
    ' ',
  );

/**
 * Builds a web-search style full-text query: every term quoted, OR-joined.
 * Operator characters are dropped and quotes doubled.
 */
export const buildFullTextQuery = (query: string): string =>
  query
    .replace(/[*:]/g, '')
    .replace(/"/g, '""')
    .split(/\s+/)
    .filter((term) => term.length > 0)
    .map((term) => `"${term}"`)
    .join(' OR ');

export class TfIdfIndex {
  private readonly documents: Map<string, string[]>;
  private readonly documentFrequency = new Map<string, number>();

  constructor(candidates: NewsRecord[]) {
    this.documents = new Map(
      candidates.map((record) => [record.id, tokenize(documentText(record))]),
    );

    for (const terms of this.documents.values()) {
      for (const term of new Set(terms)) {
        this.documentFrequency.set(
          term,
          (this.documentFrequency.get(term) ?? 0) + 1,
        );
      }
    }
  }

  get size(): number {
    return this.documents.size;
  }

  /**
   * Mean of tf * idf over the query terms. tf is normalized by document
   * length; idf = ln(N / df) with df counted over the candidates.
   */
  score(record: NewsRecord, queryTerms: string[]): number {
    if (queryTerms.length === 0) return 0;

    const terms = this.documents.get(record.id) ?? tokenize(documentText(record));
    if (terms.length === 0) return 0;

    let total = 0;
    for (const queryTerm of queryTerms) {
      const count = terms.filter((term) => term === queryTerm).length;
      const tf = count / terms.length;
      const df = this.documentFrequency.get(queryTerm) || 1;
      const idf = Math.log(this.size / df);
      total += tf * idf;
    }

    return total / queryTerms.length;
  }
}
