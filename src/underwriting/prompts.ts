import type { ApplicantProfile } from '../types/models.js';

export const UNAVAILABLE_ASSESSMENT = 'Detailed assessment unavailable';

export function guidelineQuery(policyType: string): string {
  return `Underwriting guidelines for ${policyType} insurance`;
}

export function detailedAssessmentPrompt(
  profile: ApplicantProfile,
  riskScore: number,
  guidelines: string
): string {
  return `You are an expert insurance underwriter. Provide a detailed risk assessment.

APPLICANT DATA:
${JSON.stringify(profile, null, 2)}

RISK SCORE: ${riskScore}/100

POLICY CONTEXT:
${guidelines || 'No underwriting guidelines on file.'}

Provide:
1. Overall risk assessment summary
2. Key risk factors identified
3. Mitigation strategies
4. Pricing rationale
5. Compliance considerations

Be specific, professional, and data-driven. Format as clear sections.`;
}
