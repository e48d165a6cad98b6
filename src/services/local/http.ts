interface RequestOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  /** Caller-side cancellation, combined with the timeout. */
  signal?: AbortSignal;
}

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

export async function requestText(url: string, options: RequestOptions): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  const onAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await fetch(url, {
      method: "GET",
      headers: options.headers ?? {},
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new Error(`Request failed: ${response.status}`);
    }
    const text = await response.text();
    if (!text.trim()) {
      throw new Error("Empty response");
    }
    return text;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onAbort);
  }
}

export async function requestJson<T>(url: string, options: RequestOptions): Promise<T> {
  const text = await requestText(url, options);
  return JSON.parse(text) as T;
}

export function ensureAbsoluteUrl(url: string | undefined, fallbackBase: string): string | undefined {
  if (!url) {
    return undefined;
  }
  try {
    return new URL(url, fallbackBase).toString();
  } catch {
    return undefined;
  }
}
