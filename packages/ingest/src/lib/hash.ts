import { createHash } from "crypto";
import { compactText } from "./normalize";
import { normalizeUrl } from "./url";

const FIELD_SEPARATOR = "␟";

const sha256 = (value: string) => createHash("sha256").update(value, "utf8").digest("hex");

export const canonicalUrl = (url: string) => normalizeUrl(url) ?? url.trim();

export const hashUrl = (url: string) => sha256(canonicalUrl(url));

export const hashContent = (fields: {
  title: string | null;
  summary: string | null;
  contentHtml: string | null;
}) =>
  sha256(
    [fields.title, fields.summary, fields.contentHtml].map((value) => compactText(value)).join(FIELD_SEPARATOR),
  );
