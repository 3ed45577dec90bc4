import type { TargetLanguage } from "@pali-corpus/corpus-types";

import type { ProviderError } from "../../../errors";

export interface TranslationRequest {
  text: string;
  targetLanguage: TargetLanguage;
  /** Representative location key, passed to the model as a hint. */
  context: string | null;
}

export type ProviderResult = { ok: true; text: string } | { ok: false; error: ProviderError };

/**
 * An external translator. Expected failures (rate limits, outages, quota) come back as
 * results; anything thrown is treated as unrecoverable by the session driver.
 */
export interface TranslationProvider {
  readonly name: string;
  translate(request: TranslationRequest): Promise<ProviderResult>;
}
