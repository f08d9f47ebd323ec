/**
 * Multi-Entity Extraction
 *
 * Some prompts ask the model to list every matching organization, and the
 * answer comes back as prose split into "Entity 1:", "Entity 2:" sections
 * (or 公司1：, 公司2：). This path is lossy: each section is scanned with a
 * fixed label table and sections with no extractable name are dropped.
 */

import type { EntityRecord, MultiEntityResult } from "../types.js";

/** Value tokens meaning "the model did not know". */
export const UNKNOWN_TOKENS = ["N/A", "无", "未知", "暂无"];

const NOT_AVAILABLE = "N/A";
const SEP = "\\s*[:：]\\s*";

// ============================================
// DETECTION
// ============================================

const COUNT_MARKERS = [
  /【发现\s*\d+\s*家匹配公司】/,
  /\b\d+\s+matching entities found\b/i,
];

const SECTION_HEADER = /(?:Entity|公司)\s*\d+\s*[:：]/g;

export function countSectionHeaders(text: string): number {
  return text.match(SECTION_HEADER)?.length ?? 0;
}

export function hasMultipleEntities(text: string): boolean {
  return COUNT_MARKERS.some(marker => marker.test(text)) || countSectionHeaders(text) >= 2;
}

// ============================================
// FIELD TABLE
// ============================================

type TextField = "fullName" | "registrationId" | "legalRepresentative" | "address"
  | "entityType" | "industry" | "capital" | "employeeCount" | "foundingDate";

interface TextFieldRule {
  field: TextField;
  labels: string[];
  /** Capture pattern for the value; defaults to the rest of the line */
  value?: string;
}

const REST_OF_LINE = "([^\\n]+?)(?:\\n|$)";

const TEXT_FIELD_RULES: TextFieldRule[] = [
  { field: "fullName", labels: ["公司全名", "Full Name"] },
  { field: "registrationId", labels: ["统一社会信用代码", "Registration ID"], value: "([A-Z0-9]{15,18}|[^\\n]+?)(?:\\n|$)" },
  { field: "legalRepresentative", labels: ["法定代表人", "Legal Representative"] },
  { field: "address", labels: ["注册地址", "Registered Address"] },
  { field: "entityType", labels: ["公司类型", "Company Type"] },
  { field: "industry", labels: ["所属行业", "Industry"] },
  { field: "capital", labels: ["注册资金[（(]亿元[)）]", "Registered Capital"], value: "([0-9.]+)" },
  { field: "employeeCount", labels: ["员工人数", "Employee Count"], value: "([0-9,]+)" },
  { field: "foundingDate", labels: ["成立时间", "Founding Date"], value: "([0-9]{4}[-年/][0-9]{1,2}[-月/]?[0-9]{1,2}日?)" },
];

const TEXT_FIELD_PATTERNS = TEXT_FIELD_RULES.map(rule => ({
  field: rule.field,
  pattern: new RegExp(`(?:${rule.labels.join("|")})${SEP}${rule.value ?? REST_OF_LINE}`),
}));

const FLAG_PATTERNS = {
  isListed: new RegExp(`(?:是否上市|Listed)${SEP}(是|否|yes|no)`, "i"),
  isRanked: new RegExp(`(?:是否为中国企业500强|Top 500|Ranked)${SEP}(是|否|yes|no)`, "i"),
};

const YEAR_VALUE = `(-?[0-9.]+|${UNKNOWN_TOKENS.map(t => t.replace("/", "\\/")).join("|")})`;

const YEAR_PATTERNS = {
  revenue: new RegExp(`([0-9]{4})年营业额[（(]亿元[)）][:：]\\s*${YEAR_VALUE}`, "g"),
  netProfit: new RegExp(`([0-9]{4})年净利润[（(]亿元[)）][:：]\\s*${YEAR_VALUE}`, "g"),
};

// ============================================
// EXTRACTION
// ============================================

function emptyEntity(): EntityRecord {
  return {
    fullName: NOT_AVAILABLE,
    registrationId: NOT_AVAILABLE,
    legalRepresentative: NOT_AVAILABLE,
    address: NOT_AVAILABLE,
    entityType: NOT_AVAILABLE,
    industry: NOT_AVAILABLE,
    capital: NOT_AVAILABLE,
    employeeCount: NOT_AVAILABLE,
    foundingDate: NOT_AVAILABLE,
    isListed: false,
    isRanked: false,
    revenue: {},
    netProfit: {},
  };
}

function isUnknown(value: string): boolean {
  return UNKNOWN_TOKENS.includes(value);
}

/** yes/是 -> true; no/否, absent or anything else -> false. */
function readFlag(pattern: RegExp, text: string): boolean {
  const token = pattern.exec(text)?.[1];
  return token === "是" || token?.toLowerCase() === "yes";
}

function readYearMap(pattern: RegExp, text: string): Record<number, number> {
  const values: Record<number, number> = {};
  for (const match of text.matchAll(pattern)) {
    const [, year, token] = match;
    if (year === undefined || token === undefined || isUnknown(token)) continue;
    const value = Number(token);
    if (Number.isFinite(value)) {
      values[Number(year)] = value;
    }
  }
  return values;
}

/** Run the field table over one section of text. */
export function extractEntity(section: string): EntityRecord {
  const entity = emptyEntity();

  for (const { field, pattern } of TEXT_FIELD_PATTERNS) {
    const value = pattern.exec(section)?.[1]?.trim();
    if (value && !isUnknown(value)) {
      entity[field] = value;
    }
  }

  entity.isListed = readFlag(FLAG_PATTERNS.isListed, section);
  entity.isRanked = readFlag(FLAG_PATTERNS.isRanked, section);
  entity.revenue = readYearMap(YEAR_PATTERNS.revenue, section);
  entity.netProfit = readYearMap(YEAR_PATTERNS.netProfit, section);

  return entity;
}

/**
 * Split on section headers and extract each section. Text before the first
 * header is preamble and ignored; nameless sections are dropped.
 */
export function extractEntities(text: string): MultiEntityResult {
  const sections = text.split(new RegExp(SECTION_HEADER.source)).slice(1);
  const entities = sections
    .filter(section => section.trim().length > 0)
    .map(extractEntity)
    .filter(entity => entity.fullName !== NOT_AVAILABLE);

  return { multipleEntities: true, entities, count: entities.length };
}
