export type RetryOptions = {
  retries: number;
  delaysMs: number[];
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; error: unknown; delayMs: number }) => void;
};

export const DEFAULT_RETRY_DELAYS_MS = [500, 1000, 2000];

const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504]);
const TRANSIENT_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN"]);

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function retryAsync<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { retries, delaysMs, shouldRetry, onRetry } = options;
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      attempt += 1;
      const canRetry = attempt <= retries && shouldRetry(err);
      if (!canRetry) throw err;
      const delayMs = delaysMs[Math.min(attempt - 1, delaysMs.length - 1)] ?? 0;
      if (onRetry) onRetry({ attempt, error: err, delayMs });
      if (delayMs > 0) await sleep(delayMs);
    }
  }
}

function readStatus(err: object): number | null {
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("response" in err && err.response && typeof err.response === "object") {
    const response = err.response;
    if ("status" in response && typeof response.status === "number") return response.status;
  }
  return null;
}

export function isTransientGoogleError(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  const status = readStatus(err);
  if (status !== null && TRANSIENT_STATUSES.has(status)) return true;
  if ("code" in err && typeof err.code === "string" && TRANSIENT_CODES.has(err.code)) return true;
  const msg = String("message" in err ? err.message : "").toLowerCase();
  if (msg.includes("timeout")) return true;
  if (msg.includes("timed out")) return true;
  if (msg.includes("socket hang up")) return true;
  if (msg.includes("fetch failed")) return true;
  if (msg.includes("econnreset") || msg.includes("econnrefused")) return true;
  return false;
}

export function formatRetryError(err: unknown): string {
  if (!err || typeof err !== "object") return String(err);
  const status = readStatus(err);
  const message = "message" in err && typeof err.message === "string" ? err.message : "";
  return [status ? `status ${status}` : "", message].filter(Boolean).join(" ").trim() || "unknown error";
}
