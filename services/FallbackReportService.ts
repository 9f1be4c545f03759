import { AnalysisReport, SkillMatch } from '../types/report';

const FALLBACK_VOCABULARY: ReadonlyArray<{ skill: string; term: string }> = [
  { skill: 'Python', term: 'python' },
  { skill: 'JavaScript', term: 'javascript' },
  { skill: 'Machine Learning', term: 'machine learning' },
  { skill: 'Data Analysis', term: 'data' }
];

const MAX_SKILL_MATCHES = 3;
const SKILL_MATCH_SCORE = 0.8;
const FALLBACK_OVERALL_SCORE = 0.75;

/**
 * Network-free report used whenever the model is absent or its output is
 * unusable. Only the skill list depends on the input.
 */
export function buildFallbackReport(_jobDescription: string, context: string): AnalysisReport {
  const contextLower = context.toLowerCase();

  const skillMatches: SkillMatch[] = FALLBACK_VOCABULARY
    .filter(entry => contextLower.includes(entry.term))
    .slice(0, MAX_SKILL_MATCHES)
    .map(entry => ({
      skill: entry.skill,
      match_score: SKILL_MATCH_SCORE,
      evidence: `Found references to ${entry.skill} in resume`,
      relevance: `${entry.skill} is mentioned in the candidate's experience`
    }));

  return {
    overall_score: FALLBACK_OVERALL_SCORE,
    candidate_name: 'Candidate (name not extracted)',
    summary: 'Automated keyword screening only: the language model report was unavailable for this candidate.',
    strengths: [
      'Relevant technical skills',
      'Strong educational background',
      'Relevant work experience'
    ],
    weaknesses: [
      'Some required skills may need verification',
      'Experience level may vary'
    ],
    skill_matches: skillMatches,
    experience_matches: [
      {
        role: 'Software Engineer',
        years_experience: 3,
        match_score: 0.8,
        evidence: '3+ years of software development experience'
      }
    ],
    education_matches: [
      {
        degree: "Bachelor's Degree",
        field: 'Computer Science',
        match_score: 0.9,
        evidence: "Bachelor's degree in Computer Science or related field"
      }
    ],
    recommendation: 'Manual review recommended - keyword screening suggests alignment with the job requirements',
    reasoning: `Keyword screening matched ${skillMatches.length} of ${FALLBACK_VOCABULARY.length} common skills in the resume text. ` +
      'Scores are fixed placeholders until a language model report can be generated.'
  };
}
