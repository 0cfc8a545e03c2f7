/**
 * Stage 1: Profile Extraction
 *
 * Turns raw résumé text into a CandidateProfile with one generation call.
 * There is no fallback: without a profile nothing downstream can run, so
 * every failure surfaces as a StageError.
 */

import {
  DomainValidationError,
  StageError,
  StructuredOutputError,
} from '../lib/errors.js';
import { parseGenerated } from '../lib/structured-output.js';
import { createCandidateProfile } from './domain.js';
import { ProfileExtractionOutputSchema } from './schemas/profile-schemas.js';
import { SKILL_CATEGORIES, type CandidateProfile, type ProfileExtractionInput, type StageContext } from './types.js';

const SYSTEM_PROMPT = `You are a senior résumé analyst with fifteen years of recruiting experience across industries. You extract precise, structured facts from résumés. You identify explicit and implied skills, map job titles to seniority, and estimate years of experience from work history. You never invent information that is not in the text.`;

export function buildProfileExtractionPrompt(resumeText: string): string {
  return `Analyze the following résumé and extract structured information.

RÉSUMÉ TEXT:
${resumeText}

EXTRACTION REQUIREMENTS:

1. SKILLS
   - Identify technical skills (languages, frameworks, tools, platforms, databases, cloud).
   - Identify soft skills (leadership, communication, and so on).
   - Categorize each skill as one of: ${SKILL_CATEGORIES.join(', ')}.
   - Estimate years of experience per skill when the text supports it.

2. EXPERIENCE LEVEL
   - Calculate total years of professional experience.
   - Map total years to a level:
     * 0-2 years: entry or junior
     * 2-5 years: mid
     * 5-10 years: senior
     * 10+ years: lead or principal

3. WORK HISTORY
   - List every previous job title and every employer.

4. EDUCATION
   - List degrees, certifications and other qualifications.

5. SUMMARY
   - Write a 2-3 sentence professional summary of the candidate's core expertise.

Return ONLY valid JSON:
{
  "name": "string or null",
  "email": "string or null",
  "summary": "professional summary",
  "skills": [
    {
      "name": "skill name",
      "category": "programming_language",
      "years_experience": 3,
      "proficiency": "beginner|intermediate|advanced|expert or null"
    }
  ],
  "total_years_experience": 4.5,
  "experience_level": "entry|junior|mid|senior|lead|principal",
  "previous_roles": ["role"],
  "previous_companies": ["company"],
  "education": ["degree"]
}

Every skill needs a name and a category. Use null or empty arrays for anything the résumé does not state.`;
}

export async function runProfileExtraction(
  input: ProfileExtractionInput,
  ctx: StageContext,
): Promise<CandidateProfile> {
  const resumeText = input.resume_text.trim();
  if (!resumeText) {
    throw new StageError('profile_extraction', 'Résumé text is empty');
  }

  const response = await ctx.generator.generate({
    system: SYSTEM_PROMPT,
    prompt: buildProfileExtractionPrompt(resumeText),
    maxTokens: 4096,
    signal: ctx.signal,
  });

  try {
    const output = parseGenerated(response, ProfileExtractionOutputSchema);
    const profile = createCandidateProfile({ ...output, raw_source_text: input.resume_text });
    ctx.log.info(
      {
        stage: 'profile_extraction',
        skills: profile.skills.length,
        experience_level: profile.experience_level,
        total_years: profile.total_years_experience,
      },
      'Profile extracted',
    );
    return profile;
  } catch (err) {
    if (err instanceof StructuredOutputError || err instanceof DomainValidationError) {
      ctx.log.warn(
        { stage: 'profile_extraction', kind: err instanceof StructuredOutputError ? err.kind : 'domain', rawSnippet: response.text.slice(0, 500) },
        'Profile extraction output rejected',
      );
      throw new StageError('profile_extraction', `Failed to build candidate profile: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
