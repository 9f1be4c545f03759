import { TextGenerationOracle } from '../types';
import { AnalysisReport } from '../types/report';
import { MalformedResponseError, OracleTimeoutError, OracleUnavailableError, ScreeningError, errorMessage } from '../utils/errors';
import { withTimeout } from '../utils/timeout';
import { buildFallbackReport } from './FallbackReportService';
import { parseReportResponse } from './ReportParser';

export interface ReportGenerator {
  synthesize(jobDescription: string, context: string): Promise<AnalysisReport>;
}

export interface ReportSynthesizerOptions {
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

const DEFAULT_OPTIONS: ReportSynthesizerOptions = {
  temperature: 0.3,
  maxOutputTokens: 8192,
  timeoutMs: 60000
};

export function buildReportPrompt(jobDescription: string, context: string): string {
  return `You are an expert recruiter analyzing resumes against a job description.

Job Description:
${jobDescription}

Resume Context (Retrieved Evidence):
${context}

Analyze the resume evidence against the job description and provide a structured report.
Extract candidate information, evaluate skills, experience, and education matches, and provide a hiring recommendation.

Return your analysis as a single JSON object with exactly these fields:
- overall_score: number between 0 and 1
- candidate_name: string (extract from the resume if available)
- summary: string (executive summary)
- strengths: array of strings
- weaknesses: array of strings
- skill_matches: array of objects { "skill": string, "match_score": number between 0 and 1, "evidence": string, "relevance": string }
- experience_matches: array of objects { "role": string, "years_experience": number or null, "match_score": number between 0 and 1, "evidence": string }
- education_matches: array of objects { "degree": string, "field": string or null, "match_score": number between 0 and 1, "evidence": string }
- recommendation: string (hiring recommendation)
- reasoning: string (detailed reasoning)

IMPORTANT: Return ONLY the JSON object. No markdown, no code blocks, no text before or after it.`;
}

/**
 * Turns a (job description, context) pair into a validated report. Never
 * rejects: every oracle or parsing failure resolves to the keyword fallback.
 */
export class ReportSynthesizer implements ReportGenerator {
  private oracle: TextGenerationOracle | null;
  private options: ReportSynthesizerOptions;

  constructor(oracle: TextGenerationOracle | null, options: Partial<ReportSynthesizerOptions> = {}) {
    this.oracle = oracle;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async synthesize(jobDescription: string, context: string): Promise<AnalysisReport> {
    try {
      return await this.generateReport(jobDescription, context);
    } catch (error) {
      const code = error instanceof ScreeningError ? error.code : 'UNEXPECTED_ERROR';
      console.warn(`[ReportSynthesizer] Using fallback report (${code}): ${errorMessage(error)}`);
      return buildFallbackReport(jobDescription, context);
    }
  }

  private async generateReport(jobDescription: string, context: string): Promise<AnalysisReport> {
    const oracle = this.oracle;
    if (!oracle) {
      throw new OracleUnavailableError('No text-generation oracle is configured');
    }

    const prompt = buildReportPrompt(jobDescription, context);
    const { timeoutMs, temperature, maxOutputTokens } = this.options;
    const raw = await withTimeout(
      oracle.generate(prompt, { temperature, maxOutputTokens }),
      timeoutMs,
      () => new OracleTimeoutError(timeoutMs)
    );

    const parsed = parseReportResponse(raw);
    if (parsed.kind === 'unparseable') {
      console.error(`[ReportSynthesizer] ERROR: Unusable ${oracle.name} response: ${parsed.raw.substring(0, 500)}`);
      throw new MalformedResponseError(parsed.reason);
    }
    return parsed.report;
  }
}
