/**
 * Client for the medical knowledge-base MCP endpoint.
 *
 * One JSON-RPC `tools/call` to `search_article_sections` per fetch. The server
 * answers either with plain JSON or as an SSE stream whose `data:` lines
 * together form the JSON-RPC response.
 */

import { z } from "zod";
import { FetchError } from "../errors";

export type SearchRequest = {
  query: string;
  language: string;
};

export type KnowledgeSourceOptions = {
  url: string;
  token: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

const rpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0").optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number().optional(), message: z.string() }).optional(),
});

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  isError: z.boolean().optional(),
});

export function buildSearchPayload({ query, language }: SearchRequest) {
  return {
    jsonrpc: "2.0",
    id: "1",
    method: "tools/call",
    params: {
      name: "search_article_sections",
      arguments: { query, language },
    },
  };
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Decode a response body as JSON or, failing the content type check, as SSE. */
export function parseMcpBody(contentType: string, body: string): unknown {
  if (contentType.includes("application/json")) {
    const parsed = tryParseJson(body);
    if (parsed === undefined) throw new FetchError("Knowledge source returned malformed JSON");
    return parsed;
  }
  const payload = body
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith("data:"))
    .map((line) => line.slice("data:".length).trim())
    .join("");
  const parsed = tryParseJson(payload);
  if (parsed === undefined) throw new FetchError("Could not extract JSON from SSE response");
  return parsed;
}

/**
 * Turn a JSON-RPC response into plain text: the tool's text blocks joined by
 * blank lines, or the raw result as JSON when it has no text blocks.
 */
export function renderSearchResult(response: unknown): string {
  const rpc = rpcResponseSchema.safeParse(response);
  if (!rpc.success) throw new FetchError("Knowledge source response is not JSON-RPC");
  if (rpc.data.error) throw new FetchError(`Knowledge source error: ${rpc.data.error.message}`);

  const tool = toolResultSchema.safeParse(rpc.data.result);
  if (tool.success) {
    if (tool.data.isError) throw new FetchError("Knowledge source tool reported an error");
    const text = tool.data.content
      .map((block) => block.text?.trim() ?? "")
      .filter((block) => block.length > 0)
      .join("\n\n");
    if (text) return text;
  }
  if (rpc.data.result === undefined || rpc.data.result === null) {
    throw new FetchError("Knowledge source returned no result");
  }
  return JSON.stringify(rpc.data.result);
}

export class McpKnowledgeSource {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: KnowledgeSourceOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /** @throws FetchError on transport failure, timeout, HTTP error or unreadable body */
  async search(request: SearchRequest): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          "Content-Type": "application/json",
          Accept: "application/json, text/event-stream",
        },
        body: JSON.stringify(buildSearchPayload(request)),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === "TimeoutError";
      throw new FetchError(timedOut ? "Knowledge source timed out" : "Knowledge source unreachable", err);
    }

    if (!response.ok) {
      throw new FetchError(`Knowledge source responded with HTTP ${response.status}`);
    }
    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      throw new FetchError("Knowledge source response was interrupted", err);
    }
    return renderSearchResult(parseMcpBody(response.headers.get("content-type") ?? "", body));
  }
}
