import type {
  CompiledPrompt,
  GenerationConfig,
  HintResult,
} from "../types/homework";
import {
  buildGenerateContentUrl,
  getConfiguredApiKey,
  resolveGeminiModel,
} from "../config/gemini-config";
import {
  InvalidUpstreamResponseError,
  ModelJsonParseError,
  ServiceNotConfiguredError,
  UpstreamHttpError,
  UpstreamUnavailableError,
} from "../utils/http-errors";

export interface GeminiTokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface GeminiCallMetrics {
  model: string;
  llmLatencyMs: number;
  usage: GeminiTokenUsage;
}

export interface GeminiPart {
  text?: string;
}

export interface GeminiCandidate {
  content?: { parts?: GeminiPart[] };
}

/** The subset of the generateContent response this service reads */
export interface GeminiResponse {
  candidates?: GeminiCandidate[];
}

export interface GeminiCallResult {
  response: GeminiResponse;
  metrics: GeminiCallMetrics;
}

/** Parsed JSON for structured tasks, `{ text }` for plain-text ones */
export type NormalizedGeneration = unknown;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNonNegativeNumber(value: unknown): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) return 0;
  return Math.floor(n);
}

function buildUsage(usageMetadata: unknown): GeminiTokenUsage {
  const usage: Record<string, unknown> = isRecord(usageMetadata)
    ? usageMetadata
    : {};
  const inputTokens = toNonNegativeNumber(usage.promptTokenCount);
  const outputTokens = toNonNegativeNumber(usage.candidatesTokenCount);
  const explicitTotal = toNonNegativeNumber(usage.totalTokenCount);
  return {
    inputTokens,
    outputTokens,
    totalTokens: explicitTotal > 0 ? explicitTotal : inputTokens + outputTokens,
  };
}

/** Keep only the fields this service reads; candidates are checked later */
function toGeminiResponse(body: Record<string, unknown>): GeminiResponse {
  const response: GeminiResponse = {};
  if (Array.isArray(body.candidates)) response.candidates = body.candidates;
  return response;
}

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```")) return trimmed;
  return trimmed
    .replace(/^```[a-zA-Z]*\n?/, "")
    .replace(/```$/, "")
    .trim();
}

/**
 * One generateContent call: the prompt is the only content part, and the
 * schema (when present) goes in as generationConfig. No retries.
 */
export async function callGemini(
  prompt: string,
  generationConfig?: GenerationConfig,
): Promise<GeminiCallResult> {
  const apiKey = getConfiguredApiKey();
  if (!apiKey) throw new ServiceNotConfiguredError();

  const descriptor = resolveGeminiModel();
  const payload: {
    contents: { parts: GeminiPart[] }[];
    generationConfig?: GenerationConfig;
  } = { contents: [{ parts: [{ text: prompt }] }] };
  if (generationConfig) payload.generationConfig = generationConfig;

  const startedAt = Date.now();
  let res: Response;
  try {
    res = await fetch(buildGenerateContentUrl(descriptor, apiKey), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
    });
  } catch (error) {
    throw new UpstreamUnavailableError(error);
  }

  const rawBody = await res.text();
  const completedAt = Date.now();

  if (!res.ok) {
    throw new UpstreamHttpError(res.status, rawBody);
  }

  let body: unknown;
  try {
    body = JSON.parse(rawBody);
  } catch {
    console.error("[homework-ai] Gemini response body is not JSON:", rawBody);
    throw new InvalidUpstreamResponseError();
  }
  if (!isRecord(body)) {
    throw new InvalidUpstreamResponseError();
  }

  return {
    response: toGeminiResponse(body),
    metrics: {
      model: descriptor.model,
      llmLatencyMs: completedAt - startedAt,
      usage: buildUsage(body.usageMetadata),
    },
  };
}

/** Concatenated text of the first candidate, or null when there is none */
export function extractCandidateText(response: GeminiResponse): string | null {
  const parts = response.candidates?.[0]?.content?.parts;
  if (!Array.isArray(parts)) return null;

  const texts = parts
    .map((p) => (typeof p?.text === "string" ? p.text : ""))
    .filter((t) => t.length > 0);
  return texts.length > 0 ? texts.join("\n") : null;
}

/**
 * Validate the upstream body and reshape it for the client:
 * structured tasks must yield JSON, plain tasks are wrapped as `{ text }`.
 */
export function normalizeGeneration(
  response: GeminiResponse,
  generationConfig?: GenerationConfig,
  logTag = "[homework-ai]",
): NormalizedGeneration {
  if (!Array.isArray(response.candidates) || response.candidates.length === 0) {
    console.error(
      `${logTag} Gemini response missing 'candidates':`,
      JSON.stringify(response),
    );
    throw new InvalidUpstreamResponseError();
  }

  const text = extractCandidateText(response);
  if (text === null) {
    console.error(
      `${logTag} Gemini candidate has no text parts:`,
      JSON.stringify(response.candidates[0]),
    );
    throw new InvalidUpstreamResponseError();
  }

  if (generationConfig?.responseMimeType !== "application/json") {
    const plain: HintResult = { text };
    return plain;
  }

  try {
    return JSON.parse(stripCodeFences(text));
  } catch (error) {
    console.error(`${logTag} Failed to parse LLM JSON response:`, error);
    console.error(`${logTag} Content was:`, text);
    throw new ModelJsonParseError(error);
  }
}

/** Upstream call plus normalization for one compiled prompt */
export async function generateFromPrompt(
  compiled: CompiledPrompt,
  logTag = "[homework-ai]",
): Promise<NormalizedGeneration> {
  const { response, metrics } = await callGemini(
    compiled.prompt,
    compiled.generationConfig,
  );
  console.log(
    `${logTag} ${metrics.model} responded in ${metrics.llmLatencyMs}ms (tokens: ${metrics.usage.totalTokens})`,
  );
  return normalizeGeneration(response, compiled.generationConfig, logTag);
}
