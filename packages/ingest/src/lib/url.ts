const TRACKING_PARAMS = new Set([
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "utm_term",
  "utm_content",
  "utm_id",
  "fbclid",
  "gclid",
  "mc_cid",
  "mc_eid",
  "spm",
  "from",
  "isappinstalled",
]);

const TRACKING_PREFIXES = ["utm_"];

const isTrackingParam = (key: string) => {
  if (TRACKING_PARAMS.has(key)) {
    return true;
  }
  return TRACKING_PREFIXES.some((prefix) => key.startsWith(prefix));
};

export const resolveUrl = (input: string, base?: string | null): string | null => {
  const trimmed = input.trim();
  if (!trimmed || trimmed.startsWith("javascript:") || trimmed.startsWith("mailto:")) {
    return null;
  }
  try {
    const url = base ? new URL(trimmed, base) : new URL(trimmed);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return null;
    }
    return url.toString();
  } catch {
    return null;
  }
};

export const normalizeUrl = (input: string, base?: string | null): string | null => {
  const resolved = resolveUrl(input, base);
  if (!resolved) {
    return null;
  }
  const url = new URL(resolved);
  url.hash = "";
  url.hostname = url.hostname.toLowerCase();

  const cleaned = new URLSearchParams();
  for (const [key, value] of url.searchParams.entries()) {
    if (!isTrackingParam(key)) {
      cleaned.append(key, value);
    }
  }
  const cleanedParams = cleaned.toString();
  url.search = cleanedParams ? `?${cleanedParams}` : "";

  if (url.pathname.endsWith("/") && url.pathname !== "/") {
    url.pathname = url.pathname.slice(0, -1);
  }

  return url.toString();
};
