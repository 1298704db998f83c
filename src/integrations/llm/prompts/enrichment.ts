/**
 * Enrichment Prompts
 *
 * Instructions and tool schema for the applicant enrichment call.
 * The tool's input schema mirrors the fields of an EnrichmentRecord; the
 * reply is still validated on our side since the schema only instructs.
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';

export const SUMMARY_WORD_TARGET = 75;

export function buildEnrichmentSystemPrompt(summaryWordTarget: number = SUMMARY_WORD_TARGET): string {
  return `You are a recruiting analyst evaluating contractor applications.

Analyze the candidate's profile and provide:
1. A concise summary of at most ${summaryWordTarget} words highlighting key strengths and fit
2. An overall quality score: a whole number from 1 to 10 (higher is better)
3. Data gaps or inconsistencies you notice (overlapping dates, missing fields, implausible rates), comma-separated, or "None"
4. Up to 3 follow-up questions that would clarify those gaps, as a bullet list

Focus on technical skills, experience relevance, and professional background.
Record your evaluation by calling the record_applicant_evaluation tool. Do not answer in prose.`;
}

/**
 * The summary limit appears in both the system prompt and the tool schema;
 * build them from the same target.
 */
export function buildEnrichmentTool(summaryWordTarget: number = SUMMARY_WORD_TARGET): Tool {
  return {
    name: 'record_applicant_evaluation',
    description: 'Record the structured evaluation of one contractor applicant.',
    input_schema: {
      type: 'object',
      additionalProperties: false,
      required: ['summary', 'score', 'issues', 'follow_ups'],
      properties: {
        summary: {
          type: 'string',
          description: `Summary of the candidate, at most ${summaryWordTarget} words`,
        },
        score: {
          type: 'integer',
          minimum: 1,
          maximum: 10,
          description: 'Overall candidate quality from 1 to 10',
        },
        issues: {
          type: 'string',
          description: 'Comma-separated data gaps or inconsistencies, or "None"',
        },
        follow_ups: {
          type: 'string',
          description: 'Bullet list of 1-3 follow-up questions',
        },
      },
    },
  };
}

export function buildEnrichmentPrompt(profileJson: string): string {
  return `Evaluate this contractor application:

${profileJson}

Provide your evaluation in the requested format.`;
}
