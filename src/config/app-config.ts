/** Process-level settings for the HTTP layer */

export function getPort(): number {
  const port = parseInt(process.env.PORT || "5001", 10);
  return Number.isFinite(port) && port > 0 ? port : 5001;
}

/** CORS_ORIGINS="https://a.example,https://b.example"; unset or "*" allows all */
export function getCorsOrigins(): string[] | "*" {
  const raw = process.env.CORS_ORIGINS?.trim();
  if (!raw || raw === "*") return "*";
  const origins = raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return origins.length > 0 ? origins : "*";
}

export function getSharedSecret(): string | null {
  const secret = process.env.PROXY_SHARED_SECRET?.trim();
  return secret ? secret : null;
}

export function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}
