/**
 * Closed vocabularies for skills and seniority, and the normalizers that map
 * free-form model output onto them. None of these functions reject input:
 * anything unrecognised lands on a catch-all.
 */

import {
  EXPERIENCE_LEVELS,
  PROFICIENCY_LEVELS,
  SKILL_CATEGORIES,
  type ExperienceLevel,
  type Proficiency,
  type SkillCategory,
} from './types.js';

const CATEGORY_ALIASES: Readonly<Record<string, SkillCategory>> = {
  // AI / data → domain knowledge
  ai: 'domain_knowledge',
  ml: 'domain_knowledge',
  ai_ml: 'domain_knowledge',
  nlp: 'domain_knowledge',
  ai_machine_learning: 'domain_knowledge',
  machine_learning: 'domain_knowledge',
  artificial_intelligence: 'domain_knowledge',
  data_science: 'domain_knowledge',
  data_analytics: 'domain_knowledge',
  computer_vision: 'domain_knowledge',
  domain: 'domain_knowledge',
  // Frameworks and libraries
  framework_library: 'library',
  frameworks_libraries: 'library',
  libraries: 'library',
  frameworks: 'framework',
  web_development: 'framework',
  web_framework: 'framework',
  frontend: 'framework',
  backend: 'framework',
  web: 'framework',
  // Tools and platforms
  tool_platform: 'tool',
  tools_platforms: 'tool',
  tools: 'tool',
  api: 'tool',
  version_control: 'tool',
  platforms: 'platform',
  // Languages
  language: 'programming_language',
  languages: 'programming_language',
  programming: 'programming_language',
  programming_languages: 'programming_language',
  // Practices
  testing: 'methodology',
  agile: 'methodology',
  scrum: 'methodology',
  process: 'methodology',
  // Ops
  containerization: 'devops',
  orchestration: 'devops',
  ci_cd: 'devops',
  infrastructure: 'cloud',
  cloud_computing: 'cloud',
  databases: 'database',
  soft_skills: 'soft_skill',
  interpersonal: 'soft_skill',
  leadership: 'soft_skill',
};

function isMember<T extends string>(values: readonly T[], candidate: string): candidate is T {
  return values.some((value) => value === candidate);
}

function canonicalKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s/-]+/g, '_');
}

/** Map any category string onto the closed set. Unknown values become `other`. */
export function normalizeSkillCategory(raw: unknown): SkillCategory {
  if (typeof raw !== 'string') return 'other';
  const key = canonicalKey(raw);
  if (isMember(SKILL_CATEGORIES, key)) return key;
  return Object.hasOwn(CATEGORY_ALIASES, key) ? CATEGORY_ALIASES[key] : 'other';
}

/** Lowercased proficiency, or undefined when it is not one of the four levels. */
export function normalizeProficiency(raw: unknown): Proficiency | undefined {
  if (typeof raw !== 'string') return undefined;
  const key = raw.trim().toLowerCase();
  return isMember(PROFICIENCY_LEVELS, key) ? key : undefined;
}

/** Seniority implied by total years: <2 entry, 2–5 mid, 5–10 senior, 10+ lead. */
export function levelFromYears(years: number): ExperienceLevel {
  if (years < 2) return 'entry';
  if (years < 5) return 'mid';
  if (years < 10) return 'senior';
  return 'lead';
}

/** Case-insensitive level lookup; undefined for anything outside the ladder. */
export function parseExperienceLevel(raw: unknown): ExperienceLevel | undefined {
  if (typeof raw !== 'string') return undefined;
  const key = raw.trim().toLowerCase();
  return isMember(EXPERIENCE_LEVELS, key) ? key : undefined;
}

/**
 * Accept a level string case-insensitively. Missing or unknown values are
 * inferred from `fallbackYears`.
 */
export function normalizeExperienceLevel(raw: unknown, fallbackYears = 0): ExperienceLevel {
  return parseExperienceLevel(raw) ?? levelFromYears(fallbackYears);
}

/**
 * Signed distance from the required level to the candidate's level.
 * Positive means the candidate is above what the role asks for.
 */
export function experienceLevelDistance(candidate: ExperienceLevel, required: ExperienceLevel): number {
  return EXPERIENCE_LEVELS.indexOf(candidate) - EXPERIENCE_LEVELS.indexOf(required);
}

const TITLE_LEVEL_RULES: ReadonlyArray<[RegExp, ExperienceLevel]> = [
  [/\b(principal|director|head of|vp|vice president)\b/i, 'principal'],
  [/\b(lead|staff|manager)\b/i, 'lead'],
  [/\b(senior|sr\.?)(?=\s|$)/i, 'senior'],
  [/\b(junior|jr\.?)(?=\s|$)/i, 'junior'],
  [/\b(intern|internship|graduate|entry[ -]level|entry)\b/i, 'entry'],
];

/** Seniority implied by a job title; `mid` when the title carries no signal. */
export function inferLevelFromTitle(title: string): ExperienceLevel {
  for (const [pattern, level] of TITLE_LEVEL_RULES) {
    if (pattern.test(title)) return level;
  }
  return 'mid';
}
