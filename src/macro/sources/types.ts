import type { AutoFactorName } from "../factors.js";

export type QuoteFetchParams = {
  factor: AutoFactorName;
  timeoutMs: number;
};

/**
 * Supplies recent daily closes for one auto factor, oldest first. Returns null when the
 * source has nothing for the factor.
 */
export type QuoteSource = {
  name: string;
  fetchCloses: (params: QuoteFetchParams) => Promise<number[] | null>;
};
