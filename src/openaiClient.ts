import OpenAI from "openai";
import { logWarn } from "./logger";

let warned = false;
let client: OpenAI | null = null;

/** Shared client, or null when no API key is configured (references are then stored unsummarized). */
export function getOpenAIClient(apiKey: string | null | undefined = process.env.OPENAI_API_KEY): OpenAI | null {
  if (client) return client;
  if (!apiKey) {
    if (!warned) {
      logWarn("[case-gateway] OPENAI_API_KEY is not set. Reference texts are stored without summary.");
      warned = true;
    }
    return null;
  }
  client = new OpenAI({ apiKey });
  return client;
}
