import OpenAI from "openai";
import type { ApplicationRecord } from "../modules/types";

export interface RiskAssessor {
  /** Raw assessor output; feed it through normalizeRisk before use. */
  assess(application: ApplicationRecord): Promise<unknown>;
}

export class AssessorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AssessorError";
  }
}

export const ASSESSOR_SYSTEM_PROMPT =
  "You are an expert insurance underwriter for small business policies. " +
  "Evaluate the business risk profile. Always respond with valid JSON.";

export function buildAssessmentPrompt(application: ApplicationRecord) {
  const revenue = application.annualRevenue.toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2
  });

  return [
    "Evaluate the risk profile for this business:",
    "",
    `Business: ${application.businessName}`,
    `Type: ${application.businessType}`,
    `Revenue: $${revenue}`,
    `Employees: ${application.employeeCount}`,
    `Location: ${application.city}, ${application.state}`,
    `Years in Business: ${application.yearsInBusiness}`,
    `Description: ${application.businessDescription}`,
    "",
    "Claims History:",
    JSON.stringify(application.claimsHistory, null, 2),
    "",
    `Additional Notes: ${application.additionalNotes ?? "None"}`,
    "",
    "Respond with a JSON object containing:",
    '1. "risk_profile": one of "low", "medium", "high"',
    '2. "risk_factors": a list of short, specific risk factors',
    '3. "risk_score": a number from 0 to 100'
  ].join("\n");
}

export function createOpenAIRiskAssessor({
  apiKey,
  model
}: {
  apiKey: string;
  model: string;
}): RiskAssessor {
  const openai = new OpenAI({ apiKey });

  return {
    async assess(application) {
      try {
        const response = await openai.chat.completions.create({
          model,
          messages: [
            { role: "system", content: ASSESSOR_SYSTEM_PROMPT },
            { role: "user", content: buildAssessmentPrompt(application) }
          ],
          response_format: { type: "json_object" },
          temperature: 0.2,
          max_tokens: 1000
        });

        return response.choices[0]?.message?.content ?? "";
      } catch (err) {
        throw new AssessorError("Risk assessment request failed", { cause: err });
      }
    }
  };
}
