/**
 * Zod schema for the profile-extraction model output.
 *
 * An empty skills list passes here on purpose: the non-empty rule belongs
 * to CandidateProfile construction and reports its own message.
 */

import { z } from 'zod';
import {
  SkillSchema,
  optionalText,
  optionalYears,
  stringList,
} from './domain-schemas.js';

export const ProfileExtractionOutputSchema = z.object({
  name: optionalText,
  email: optionalText,
  summary: z.preprocess((v) => v ?? '', z.string()),
  skills: z.preprocess((v) => v ?? [], z.array(SkillSchema)),
  total_years_experience: optionalYears,
  experience_level: z.unknown(),
  previous_roles: stringList,
  previous_companies: stringList,
  education: stringList,
}).passthrough();
