import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigError } from "./errors";
import { partialRatio, ratio } from "./fuzzy";
import { asStringList, normalizeName, uniqueStrings } from "./normalize";
import type { CompanyEntry, RawMetadata } from "./types";

export type MatchStrategy = "override" | "hint" | "exact" | "alias" | "keyword" | "fuzzy";

export type CompanyMatch = {
  company: string;
  strategy: MatchStrategy;
  matchedText: string;
  score: number;
};

export type MatchInput = {
  title?: string | null;
  summary?: string | null;
  content?: string | null;
};

export type CompanyMatcherOptions = {
  fuzzyThreshold?: number;
  partialThreshold?: number;
  minKeywordMatches?: number;
  patternOverrides?: Record<string, string>;
  companyBlacklist?: string[];
  blacklistTerms?: string[];
};

const CLAUSE_SPLIT = /[，。、；：！？“”‘’《》（）【】,.:;!?()[\]{}"'|/]+/u;
const MIN_SEGMENT_LENGTH = 2;
const MAX_SEGMENT_LENGTH = 48;
const MIN_PARTIAL_TERM_LENGTH = 4;
const LATIN_TERM = /^[\x20-\x7e]+$/;

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

// Latin terms must stand alone; CJK text has no word boundaries.
const termMatcher = (term: string): ((text: string) => boolean) => {
  if (!LATIN_TERM.test(term)) {
    return (text) => text.includes(term);
  }
  const pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(term)}(?![a-z0-9])`);
  return (text) => pattern.test(text);
};

const companyEntrySchema = z.object({
  name: z.string().trim().min(1, "canonical name is required"),
  english_name: z.string().trim().min(1).nullish(),
  external_id: z.string().trim().min(1).nullish(),
  aliases: z.array(z.string().trim().min(1)).default([]),
  keywords: z.array(z.string().trim().min(1)).default([]),
});

const companyFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ companies: z.array(z.unknown()) }).transform((file) => file.companies),
]);

export const parseCompanyDataset = (input: unknown): CompanyEntry[] => {
  const file = companyFileSchema.safeParse(input);
  if (!file.success) {
    throw new ConfigError("Company dataset must be an array or an object with a companies array");
  }

  const seen = new Set<string>();
  return file.data.map((raw, index) => {
    const parsed = companyEntrySchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(entry)"}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`Malformed company entry #${index}: ${issues}`, { details: { index } });
    }
    const key = normalizeName(parsed.data.name);
    if (seen.has(key)) {
      throw new ConfigError(`Duplicate company name in dataset: ${parsed.data.name}`, { details: { index } });
    }
    seen.add(key);
    return {
      name: parsed.data.name,
      englishName: parsed.data.english_name ?? null,
      externalId: parsed.data.external_id ?? null,
      aliases: uniqueStrings(parsed.data.aliases),
      keywords: uniqueStrings(parsed.data.keywords),
    };
  });
};

export const loadCompanyDataset = (filePath: string): CompanyEntry[] => {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Unable to read company dataset at ${filePath}`, { cause: error });
  }
  return parseCompanyDataset(raw);
};

export class CompanyMatcher {
  private readonly companies: CompanyEntry[];
  private readonly order = new Map<string, number>();
  private readonly nameLookup = new Map<string, string>();
  private readonly aliasLookup = new Map<string, string>();
  private readonly keywordLookup = new Map<string, { owners: string[]; test: (text: string) => boolean }>();
  private readonly fuzzyTerms: Array<{ term: string; company: string }> = [];
  private readonly fuzzyThreshold: number;
  private readonly partialThreshold: number;
  private readonly minKeywordMatches: number;
  private readonly patternOverrides: Map<string, string>;
  private readonly companyBlacklist: Set<string>;
  private readonly blacklistTerms: string[];

  constructor(companies: CompanyEntry[], options: CompanyMatcherOptions = {}) {
    this.companies = companies;
    this.fuzzyThreshold = options.fuzzyThreshold ?? 90;
    this.partialThreshold = options.partialThreshold ?? 85;
    this.minKeywordMatches = Math.max(1, options.minKeywordMatches ?? 2);

    companies.forEach((company, index) => {
      this.order.set(company.name, index);
      for (const name of [company.name, company.englishName ?? ""]) {
        const key = normalizeName(name);
        if (key && !this.nameLookup.has(key)) {
          this.nameLookup.set(key, company.name);
          this.fuzzyTerms.push({ term: key, company: company.name });
        }
      }
      for (const alias of company.aliases) {
        const key = normalizeName(alias);
        if (key && !this.nameLookup.has(key) && !this.aliasLookup.has(key)) {
          this.aliasLookup.set(key, company.name);
          this.fuzzyTerms.push({ term: key, company: company.name });
        }
      }
      for (const keyword of company.keywords) {
        const key = normalizeName(keyword);
        if (!key) {
          continue;
        }
        const entry = this.keywordLookup.get(key) ?? { owners: [], test: termMatcher(key) };
        if (!entry.owners.includes(company.name)) {
          entry.owners.push(company.name);
        }
        this.keywordLookup.set(key, entry);
      }
    });

    this.patternOverrides = this.buildPatternOverrides(options.patternOverrides ?? {});
    this.companyBlacklist = new Set(
      (options.companyBlacklist ?? []).map((name) => this.canonicalize(name) ?? name),
    );
    this.blacklistTerms = (options.blacklistTerms ?? []).map(normalizeName).filter(Boolean);
  }

  get size() {
    return this.companies.length;
  }

  getCompany(name: string): CompanyEntry | null {
    const canonical = this.canonicalize(name);
    return this.companies.find((company) => company.name === canonical) ?? null;
  }

  canonicalize(name: string): string | null {
    const key = normalizeName(name);
    if (!key) {
      return null;
    }
    return this.nameLookup.get(key) ?? this.aliasLookup.get(key) ?? null;
  }

  /** Maps each name to its canonical form, keeping unknown names as given. */
  normalizeNames(names: string[]): string[] {
    return uniqueStrings(names.map((name) => this.canonicalize(name) ?? name.trim()));
  }

  match(input: MatchInput, metadata: RawMetadata = {}): string[] {
    return this.explain(input, metadata).map((match) => match.company);
  }

  explain(input: MatchInput, metadata: RawMetadata = {}): CompanyMatch[] {
    const override = metadata.companies_override;
    if (Array.isArray(override)) {
      return this.normalizeNames(asStringList(override)).map(
        (company): CompanyMatch => ({
          company,
          strategy: "override",
          matchedText: company,
          score: 100,
        }),
      );
    }

    const text = [input.title, input.summary, input.content].filter(Boolean).join(" ");
    const lowered = normalizeName(text);
    const found: CompanyMatch[] = [];
    const add = (match: CompanyMatch) => {
      if (!found.some((item) => item.company === match.company)) {
        found.push(match);
      }
    };

    const overrides = new Map(this.patternOverrides);
    const recordOverrides = metadata.company_overrides;
    if (recordOverrides && typeof recordOverrides === "object" && !Array.isArray(recordOverrides)) {
      for (const [pattern, company] of Object.entries(recordOverrides)) {
        if (typeof company === "string" && normalizeName(pattern)) {
          overrides.set(normalizeName(pattern), this.canonicalize(company) ?? company.trim());
        }
      }
    }
    if (lowered) {
      for (const [pattern, company] of overrides) {
        if (lowered.includes(pattern)) {
          add({ company, strategy: "override", matchedText: pattern, score: 100 });
        }
      }
    }

    for (const hint of asStringList(metadata.company_hints)) {
      const company = this.canonicalize(hint);
      if (company) {
        add({ company, strategy: "hint", matchedText: hint, score: 100 });
      }
    }

    if (lowered) {
      this.byDatasetOrder(this.substringMatches(lowered, this.nameLookup, "exact", 100)).forEach(add);
      this.byDatasetOrder(this.substringMatches(lowered, this.aliasLookup, "alias", 95)).forEach(add);
      this.byDatasetOrder(this.keywordMatches(lowered)).forEach(add);
      this.fuzzyMatches(lowered, new Set(found.map((match) => match.company))).forEach(add);
    }

    const companyBlacklist = new Set(this.companyBlacklist);
    for (const name of asStringList(metadata.company_blacklist)) {
      companyBlacklist.add(this.canonicalize(name) ?? name.trim());
    }
    const blacklistTerms = [
      ...this.blacklistTerms,
      ...asStringList(metadata.company_blacklist_terms).map(normalizeName).filter(Boolean),
    ];

    return found.filter(
      (match) =>
        !companyBlacklist.has(match.company) &&
        !blacklistTerms.some((term) => normalizeName(match.matchedText).includes(term)),
    );
  }

  private buildPatternOverrides(patterns: Record<string, string>) {
    const overrides = new Map<string, string>();
    for (const [pattern, company] of Object.entries(patterns)) {
      const key = normalizeName(pattern);
      if (key) {
        overrides.set(key, this.canonicalize(company) ?? company.trim());
      }
    }
    return overrides;
  }

  private byDatasetOrder(matches: CompanyMatch[]) {
    const rank = (company: string) => this.order.get(company) ?? Number.MAX_SAFE_INTEGER;
    return [...matches].sort((a, b) => rank(a.company) - rank(b.company));
  }

  private substringMatches(
    text: string,
    lookup: Map<string, string>,
    strategy: "exact" | "alias",
    score: number,
  ): CompanyMatch[] {
    const matches: CompanyMatch[] = [];
    for (const [term, company] of lookup) {
      if (text.includes(term)) {
        matches.push({ company, strategy, matchedText: term, score });
      }
    }
    return matches;
  }

  private keywordMatches(text: string): CompanyMatch[] {
    const hits = new Map<string, string[]>();
    for (const [keyword, { owners, test }] of this.keywordLookup) {
      if (!test(text)) {
        continue;
      }
      for (const company of owners) {
        const list = hits.get(company) ?? [];
        list.push(keyword);
        hits.set(company, list);
      }
    }
    const matches: CompanyMatch[] = [];
    for (const [company, keywords] of hits) {
      if (keywords.length >= this.minKeywordMatches) {
        matches.push({
          company,
          strategy: "keyword",
          matchedText: keywords.join(" "),
          score: Math.min(70 + keywords.length * 5, 90),
        });
      }
    }
    return matches;
  }

  private fuzzyMatches(text: string, exclude: Set<string>): CompanyMatch[] {
    const clauses = text
      .split(CLAUSE_SPLIT)
      .map((clause) => clause.split(" ").filter(Boolean))
      .filter((tokens) => tokens.length > 0);
    const matches: CompanyMatch[] = [];
    const claimed = new Set(exclude);

    for (const { term, company } of this.fuzzyTerms) {
      if (claimed.has(company)) {
        continue;
      }
      const termLength = Array.from(term).length;
      const width = term.split(" ").length;
      let best: CompanyMatch | null = null;

      for (const tokens of clauses) {
        for (let start = 0; start + width <= tokens.length; start += 1) {
          const window = tokens.slice(start, start + width).join(" ");
          const windowLength = Array.from(window).length;
          if (windowLength < MIN_SEGMENT_LENGTH || windowLength > MAX_SEGMENT_LENGTH) {
            continue;
          }
          let score = ratio(window, term);
          if (score < this.fuzzyThreshold) {
            const partial =
              termLength >= MIN_PARTIAL_TERM_LENGTH && windowLength > termLength ? partialRatio(term, window) : 0;
            score = partial >= this.partialThreshold ? partial : 0;
          }
          if (score > 0 && (!best || score > best.score)) {
            best = { company, strategy: "fuzzy", matchedText: window, score };
          }
        }
      }

      if (best) {
        claimed.add(company);
        matches.push(best);
      }
    }
    return matches;
  }
}
