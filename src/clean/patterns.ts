import type { SectionName } from '../types.js';

const EMPLOYMENT_LABEL =
  '(?:full[\\s-]?time|part[\\s-]?time|contract(?:or)?|permanent|temporary|internship|freelance|hybrid|remote|on[\\s-]?site)';

/**
 * Page chrome removed from job descriptions, applied in order. Patterns that
 * could clip real sentences are anchored to whole lines.
 */
export const NOISE_PATTERNS: readonly RegExp[] = [
  /\bbe careful[\s\S]*?report this job\b/gi,
  /\bemail to yourself[\s\S]*?send to another email\b/gi,
  /\brelated job searches[\s\S]*?\bjobs\b/gi,
  /\bdo you want to receive recommendations[\s\S]*?unsubscribe anytime\.?/gi,
  /\bby creating an email alert[\s\S]*?privacy policy\.?/gi,
  /\bsearch jobs?\b/gi,
  /\bbegin typing for results?\b/gi,
  /\bapply on company (?:site|website)\b/gi,
  /\bsign in to (?:start saving|save|apply|view)[^\n]*/gi,
  /\bforgot your password\??/gi,
  /\bdon['’]t have an account\??/gi,
  /^[ \t]*(?:email address|password|log ?in|sign ?in|sign ?up|register with|continue with (?:google|apple|facebook|linkedin))[ \t]*$/gim,
  /^[ \t]*(?:facebook|apple|google|linkedin|twitter)[ \t]*$/gim,
  /\bapply(?:[ \t]+for[ \t]+this[ \t]+(?:job|position|role))?[ \t]+now\b/gi,
  /^[ \t]*(?:easy[ \t]+)?apply[ \t]*$/gim,
  /\bsave (?:this )?job\b/gi,
  /\bshare this (?:job|position)\b/gi,
  /\breport this job\b/gi,
  /\b(?:re)?posted[ \t]+\d+\+?[ \t]*(?:minutes?|hours?|days?|weeks?|months?)[ \t]+ago\b/gi,
  /^[ \t]*\d+\+?[ \t]*[dhw][ \t]+ago\b,?/gim,
  /\b(?:over[ \t]+)?\d[\d,]*\+?[ \t]+applicants?\b/gi,
  /^[ \t]*\$[\d,.]+[kK]?[ \t]*[-–][ \t]*\$?[\d,.]+[kK]?(?:[ \t]*(?:a|per)[ \t]+(?:year|hour|month)|[ \t]*annually)?[ \t]*$/gim,
  new RegExp(`^[ \\t]*${EMPLOYMENT_LABEL}(?:[ \\t]*[,·|•/][ \\t]*${EMPLOYMENT_LABEL})*[ \\t]*$`, 'gim'),
  /\b\d+\+?(?:[ \t]*-[ \t]*\d+)?[ \t]*years?[ \t]+(?:of[ \t]+)?experience\b/gi,
];

/** Lines that are entirely one of these words are buttons or labels. */
export const UI_LABELS: ReadonlySet<string> = new Set([
  'search',
  'apply',
  'save',
  'share',
  'report',
  'back',
  'next',
  'submit',
]);

export const MIN_LINE_LENGTH = 3;

/** Longest line still treated as a possible section header. */
export const MAX_HEADER_LENGTH = 60;

export interface SectionHeader {
  section: SectionName;
  pattern: RegExp;
}

const HEADER_PREFIX = '^[\\s#*•·\\-–—]*';

/** Words that often lead a header, as in "Your Responsibilities" or "Job Requirements". */
const HEADER_LEAD = '(?:(?:your|our|the|job|role|desired|key|additional)\\s+)?';

function header(section: SectionName, body: string): SectionHeader {
  return { section, pattern: new RegExp(`${HEADER_PREFIX}${HEADER_LEAD}(?:${body})\\b`, 'i') };
}

export const SECTION_HEADERS: readonly SectionHeader[] = [
  header('role_overview', 'about\\s+(?:the\\s+)?(?:role|position|job)|job\\s+description|(?:the|your)\\s+role|position\\s+overview|role\\s+overview'),
  header('responsibilities', "(?:key\\s+)?responsibilit(?:y|ies)|what\\s+you['’]ll\\s+do|duties"),
  header(
    'requirements',
    "requirements?|(?:minimum|preferred|basic)\\s+qualifications?|qualifications?|what\\s+you['’]ll\\s+bring|what\\s+we['’]re\\s+looking\\s+for|skills?\\s*(?:&|and)\\s*experience",
  ),
  header('benefits', "what\\s+we\\s+offer|(?:what['’]s\\s+)?(?:on\\s+)?offer|benefits?|perks?|compensation"),
  header('company_info', 'about\\s+(?:the\\s+)?company|about\\s+us|who\\s+we\\s+are'),
];

export interface CleaningTables {
  noisePatterns: readonly RegExp[];
  uiLabels: ReadonlySet<string>;
  minLineLength: number;
  sectionHeaders: readonly SectionHeader[];
  maxHeaderLength: number;
}

export const DEFAULT_CLEANING_TABLES: CleaningTables = {
  noisePatterns: NOISE_PATTERNS,
  uiLabels: UI_LABELS,
  minLineLength: MIN_LINE_LENGTH,
  sectionHeaders: SECTION_HEADERS,
  maxHeaderLength: MAX_HEADER_LENGTH,
};
