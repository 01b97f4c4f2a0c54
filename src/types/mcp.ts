/**
 * MCP tool input types for the studio knowledge server
 * Exactly 5 tools: search_best_practices, get_code_snippet, troubleshoot_issue,
 * get_tips_for_feature, check_governance_zone
 */

import { z } from 'zod';

export const OutputFormatSchema = z.enum(['json', 'markdown']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

const optionalText = z.string().optional();
const format = OutputFormatSchema.default('json').describe('Response format');

// ============================================================================
// search_best_practices
// ============================================================================

export const SearchBestPracticesInputSchema = z.object({
  query: optionalText.describe('Text to look for in title, description, rationale and tags'),
  category: optionalText.describe('Category filter, e.g. connectors or security'),
  difficulty: optionalText.describe('Difficulty filter: beginner, intermediate or advanced'),
  format,
});

// ============================================================================
// get_code_snippet
// ============================================================================

export const GetCodeSnippetInputSchema = z.object({
  id: optionalText.describe('Snippet id; when given, the other filters are ignored'),
  query: optionalText.describe('Text to look for in title, description, code and use case'),
  language: optionalText.describe('Language filter: power-fx, yaml, json or any'),
  format,
});

// ============================================================================
// troubleshoot_issue
// ============================================================================

export const TroubleshootIssueInputSchema = z.object({
  issue: optionalText.describe('Description of the problem, matched against titles, symptoms and causes'),
  id: optionalText.describe('Troubleshooting guide id'),
  category: optionalText.describe('Category filter, e.g. authentication or publishing'),
  format,
});

// ============================================================================
// get_tips_for_feature
// ============================================================================

export const GetTipsForFeatureInputSchema = z.object({
  feature: optionalText.describe('Feature area (tip category), e.g. topics or testing'),
  id: optionalText.describe('Tip id'),
  format,
});

// ============================================================================
// check_governance_zone
// ============================================================================

export const CheckGovernanceZoneInputSchema = z.object({
  feature: z.string().min(1).describe('Feature name, e.g. "http connector" or mcp-servers'),
  format,
});
