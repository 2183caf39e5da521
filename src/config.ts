import { z } from "zod";

export const RETRIEVAL_MODES = ["always-refresh", "if-empty", "probabilistic"] as const;
export type RetrievalMode = (typeof RETRIEVAL_MODES)[number];

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8082),
  NODE_ENV: z.string().default("development"),
  ADMIN_CODE: z.string().optional(),
  RETRIEVAL_DEFAULT_MODE: z.enum(RETRIEVAL_MODES).default("if-empty"),
  RETRIEVAL_PROBABILITY: z.coerce.number().min(0).max(1).default(0.2),
  RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  KNOWLEDGE_MCP_URL: z.string().url().optional(),
  KNOWLEDGE_MCP_TOKEN: z.string().optional(),
  KNOWLEDGE_LANGUAGE: z.string().min(2).default("de"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  ROTATION_STORE: z.enum(["memory", "firestore"]).default("memory"),
  DEBUG_SNAPSHOTS: booleanFlag,
  SESSION_IDLE_TTL_MS: z.coerce.number().int().nonnegative().default(30 * 60_000),
  LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  MAX_WS_PAYLOAD_BYTES: z.coerce.number().int().positive().default(262_144),
});

export type GatewayConfig = {
  port: number;
  isProduction: boolean;
  adminCode: string | null;
  retrieval: {
    defaultMode: RetrievalMode;
    probability: number;
    timeoutMs: number;
  };
  knowledge: {
    url: string | null;
    token: string | null;
    language: string;
  };
  openai: {
    apiKey: string | null;
    model: string;
  };
  rotationStore: "memory" | "firestore";
  debugSnapshots: boolean;
  sessionIdleTtlMs: number;
  lockTimeoutMs: number;
  maxPayloadBytes: number;
};

/**
 * Build the gateway configuration from environment variables.
 * Empty strings count as unset.
 * Throws with every offending variable listed when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim() !== "") cleaned[key] = value.trim();
  }
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid gateway configuration: ${problems.join(", ")}`);
  }
  const e = parsed.data;
  const isProduction = e.NODE_ENV === "production";
  return {
    port: e.PORT,
    isProduction,
    adminCode: e.ADMIN_CODE ?? null,
    retrieval: {
      defaultMode: e.RETRIEVAL_DEFAULT_MODE,
      probability: e.RETRIEVAL_PROBABILITY,
      timeoutMs: e.RETRIEVAL_TIMEOUT_MS,
    },
    knowledge: {
      url: e.KNOWLEDGE_MCP_URL ?? null,
      token: e.KNOWLEDGE_MCP_TOKEN ?? null,
      language: e.KNOWLEDGE_LANGUAGE,
    },
    openai: {
      apiKey: e.OPENAI_API_KEY ?? null,
      model: e.OPENAI_MODEL,
    },
    rotationStore: e.ROTATION_STORE,
    // Snapshots stay off in production regardless of the flag.
    debugSnapshots: e.DEBUG_SNAPSHOTS && !isProduction,
    sessionIdleTtlMs: e.SESSION_IDLE_TTL_MS,
    lockTimeoutMs: e.LOCK_TIMEOUT_MS,
    maxPayloadBytes: e.MAX_WS_PAYLOAD_BYTES,
  };
}
