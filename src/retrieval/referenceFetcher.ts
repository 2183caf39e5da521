import type OpenAI from "openai";
import { FetchError, describeError } from "../errors";
import { scopedLogger } from "../logger";
import type { McpKnowledgeSource } from "./knowledgeSource";

const logger = scopedLogger("reference");

export type ReferenceSubject = {
  name: string;
  age: number | null;
};

/** Produces the auxiliary reference text for one scenario. */
export interface ReferenceFetcher {
  /** @throws FetchError when no text could be obtained */
  fetch(subject: ReferenceSubject): Promise<string>;
}

export interface ReferenceSummarizer {
  summarize(subject: ReferenceSubject, rawText: string): Promise<string>;
}

export function buildSummaryPrompt(subject: ReferenceSubject, rawText: string): string {
  const ageHint = subject.age !== null ? ` Alter = ${subject.age} Jahre.` : "";
  return [
    "Fasse die folgenden Nachschlagetexte für eine digitale Prüfungsinstanz zusammen.",
    "Behalte anamnestische, diagnostische und therapeutische Kernaussagen sowie die wichtigsten Differentialdiagnosen bei.",
    "",
    `Fallkontext (nur zur Einordnung, nicht wiedergeben): Szenario = ${subject.name}.${ageHint}`,
    "",
    "Gliedere die Antwort in vier Abschnitte mit fett gesetzten Überschriften:",
    "1. Anamnese & Klinik",
    "2. Diagnostik",
    "3. Therapie",
    "4. Differentialdiagnosen",
    "Schreibe in Stichpunkten oder verdichteten Sätzen.",
    "",
    "Nachschlagetexte:",
    rawText,
  ].join("\n");
}

export class OpenAIReferenceSummarizer implements ReferenceSummarizer {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async summarize(subject: ReferenceSubject, rawText: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: buildSummaryPrompt(subject, rawText) }],
      temperature: 0.2,
    });
    const summary = completion.choices?.[0]?.message?.content?.trim() ?? "";
    if (!summary) throw new Error("Empty summary");
    return summary;
  }
}

/**
 * Knowledge-base search followed by an optional summary. A failed summary
 * falls back to the rendered search result.
 */
export class KnowledgeReferenceFetcher implements ReferenceFetcher {
  constructor(
    private readonly source: Pick<McpKnowledgeSource, "search"> | null,
    private readonly summarizer: ReferenceSummarizer | null,
    private readonly language: string
  ) {}

  get configured(): boolean {
    return this.source !== null;
  }

  async fetch(subject: ReferenceSubject): Promise<string> {
    if (!this.source) throw new FetchError("Knowledge source is not configured");
    const rawText = await this.source.search({ query: subject.name, language: this.language });
    if (!this.summarizer) return rawText;
    try {
      return await this.summarizer.summarize(subject, rawText);
    } catch (err) {
      logger.warn("Summary failed, storing search result as is", subject.name, describeError(err));
      return rawText;
    }
  }
}
