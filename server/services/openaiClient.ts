import { OpenAI } from "openai";

import { ConfigurationError } from "../errors";
import { env } from "../config/env";

let cachedClient: OpenAI | null = null;

export const getOpenAIClient = (): OpenAI => {
  if (cachedClient) {
    return cachedClient;
  }

  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is not configured");
  }

  // Retries belong to the session driver, which knows about quota pauses.
  cachedClient = new OpenAI({
    apiKey,
    maxRetries: 0,
  });

  return cachedClient;
};
