import type { Listing, Query, QueryResult } from '../types.js';
import type { RentalConfig } from './config.js';
import { QueryEngine } from './engine.js';
import { MALFORMED_INPUT_MESSAGE, formatAnswer } from './format.js';
import { QueryInterpreter } from './interpret.js';
import { ListingNormalizer, type Rejection } from './normalize.js';
import { ListingStore } from './store.js';

export interface IngestSummary {
  added: Listing[];
  rejected: Rejection[];
}

export type AskResult =
  | { ok: true; query: Query; result: QueryResult; answer: string }
  | { ok: false; answer: string };

/**
 * Everything one scrape-then-ask session needs, wired from a single config.
 * The store is filled by `ingest`, or refilled by `rebuild`, before questions are asked.
 */
export class RentalSession {
  readonly config: RentalConfig;
  readonly store = new ListingStore();
  readonly normalizer: ListingNormalizer;
  readonly interpreter: QueryInterpreter;
  readonly engine: QueryEngine;

  constructor(config: RentalConfig) {
    this.config = config;
    this.normalizer = new ListingNormalizer(config);
    this.interpreter = new QueryInterpreter(config);
    this.engine = new QueryEngine(config);
  }

  ingest(records: readonly unknown[]): IngestSummary {
    const { listings, rejected } = this.normalizer.normalizeBatch(records);
    this.store.addMany(listings);
    return { added: listings, rejected };
  }

  /** Replaces the store's contents with a fresh scrape. */
  rebuild(records: readonly unknown[]): IngestSummary {
    this.store.clear();
    return this.ingest(records);
  }

  ask(utterance: string): AskResult {
    if (!utterance.trim()) {
      return { ok: false, answer: MALFORMED_INPUT_MESSAGE };
    }
    const query = this.interpreter.interpret(utterance);
    const result = this.engine.execute(query, this.store);
    return { ok: true, query, result, answer: formatAnswer(query, result) };
  }

  answer(utterance: string): string {
    return this.ask(utterance).answer;
  }
}
