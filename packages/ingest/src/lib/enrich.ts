import type { CategoryClassifier } from "./classifier";
import type { CompanyMatcher } from "./company-matcher";
import { htmlToText } from "./sanitize";
import type { EnrichedRecord, RawRecord } from "./types";

export type Enrichers = {
  matcher: CompanyMatcher;
  classifier: CategoryClassifier;
};

export const enrichRecord = (record: RawRecord, { matcher, classifier }: Enrichers): EnrichedRecord => {
  const content = htmlToText(record.contentHtml);
  const companies = matcher.match(
    { title: record.title, summary: record.summary, content },
    record.rawMetadata,
  );
  const category = classifier.classify({
    sourceId: record.sourceId,
    title: record.title,
    summary: record.summary,
    content,
    metadata: record.rawMetadata,
  });

  return Object.freeze({
    ...record,
    rawMetadata: Object.freeze({ ...record.rawMetadata }),
    companies: Object.freeze([...companies]),
    category,
  });
};

export const enrichRecords = (records: RawRecord[], enrichers: Enrichers): EnrichedRecord[] =>
  records.map((record) => enrichRecord(record, enrichers));
