export interface GeminiModelDescriptor {
  model: string;
  baseUrl: string;
}

const API_KEY_ENV_NAMES = ["GOOGLE_API_KEY", "GEMINI_API_KEY"];

const DEFAULT_MODEL = "gemini-2.0-flash";
const DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

/**
 * Read on every call rather than cached, so a key added to the environment
 * takes effect without touching module state.
 */
export function getConfiguredApiKey(): string | null {
  for (const envName of API_KEY_ENV_NAMES) {
    const key = process.env[envName];
    if (key && key.trim().length > 0) return key.trim();
  }
  return null;
}

export function resolveGeminiModel(): GeminiModelDescriptor {
  const model = process.env.GEMINI_MODEL?.trim() || DEFAULT_MODEL;
  const baseUrl = (
    process.env.GEMINI_API_BASE_URL?.trim() || DEFAULT_BASE_URL
  ).replace(/\/+$/, "");
  return { model, baseUrl };
}

export function buildGenerateContentUrl(
  descriptor: GeminiModelDescriptor,
  apiKey: string,
): string {
  return `${descriptor.baseUrl}/models/${encodeURIComponent(descriptor.model)}:generateContent?key=${encodeURIComponent(apiKey)}`;
}
