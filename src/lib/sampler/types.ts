/**
 * Sampler module types
 */

export interface SampleDocument {
  /** Raw JSON text of one document */
  text: string;
  /** File path, or `-` for stdin */
  source: string;
  /** 1-based line number for line-delimited sources */
  line?: number;
}

export interface SamplerOptions {
  /** Treat every non-`.ndjson`/`.jsonl` file as line-delimited too */
  ndjson: boolean;
}

export interface SamplerResult {
  documents: SampleDocument[];
  metadata: {
    totalSampled: number;
    sources: string[];
  };
}
