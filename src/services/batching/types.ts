import type { FilePatch, Language } from "../../types/patch.js";

/**
 * Language → FIFO queue of patches.
 *
 * Map iteration follows insertion order, so buckets are visited in the
 * order their language was first seen. The scheduler drains the queues in
 * place.
 */
export type LanguageBuckets = Map<Language, FilePatch[]>;

/**
 * Result of organizing a long change set.
 */
export interface OrganizedPatches {
  /** Main group: patches that fit the primary budget, by language */
  buckets: LanguageBuckets;
  /** Patches that did not fit, in the order they were rejected */
  overflow: FilePatch[];
  /** Tokens assigned to the main group */
  mainTokens: number;
}
