import { z } from 'zod';

// Models sometimes quote numbers ("0.82"); accept those, reject anything else
function numeric<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    value => (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value)) ? Number(value) : value),
    schema
  );
}

const score = numeric(z.number().min(0).max(1));

export const SkillMatchSchema = z.object({
  skill: z.string(),
  match_score: score,
  evidence: z.string(),
  relevance: z.string().nullish()
});

export const ExperienceMatchSchema = z.object({
  role: z.string(),
  years_experience: numeric(z.number().nonnegative().nullish()),
  match_score: score,
  evidence: z.string()
});

export const EducationMatchSchema = z.object({
  degree: z.string(),
  field: z.string().nullish(),
  match_score: score,
  evidence: z.string()
});

export const AnalysisReportSchema = z.object({
  overall_score: score,
  candidate_name: z.string(),
  summary: z.string(),
  strengths: z.array(z.string()),
  weaknesses: z.array(z.string()),
  skill_matches: z.array(SkillMatchSchema),
  experience_matches: z.array(ExperienceMatchSchema),
  education_matches: z.array(EducationMatchSchema),
  recommendation: z.string(),
  reasoning: z.string(),

  // Stamped on in batch mode, never requested from the model
  document_id: z.string().optional(),
  filename: z.string().optional()
});

/** What the model may return; zod strips any document fields it invents. */
export const ModelReportSchema = AnalysisReportSchema.omit({ document_id: true, filename: true });

export type SkillMatch = z.infer<typeof SkillMatchSchema>;
export type ExperienceMatch = z.infer<typeof ExperienceMatchSchema>;
export type EducationMatch = z.infer<typeof EducationMatchSchema>;
export type AnalysisReport = z.infer<typeof AnalysisReportSchema>;

export type ParsedResponse =
  | { kind: 'parsed'; report: AnalysisReport }
  | { kind: 'unparseable'; raw: string; reason: string };
