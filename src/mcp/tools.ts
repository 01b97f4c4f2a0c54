/**
 * MCP tools over the shared operation registry
 *
 * Provides the 5 tools:
 * - search_best_practices: text + category/difficulty search
 * - get_code_snippet: snippet by id, or text + language search
 * - troubleshoot_issue: guide by id, or issue text + category search
 * - get_tips_for_feature: tip by id, or tips for a feature area
 * - check_governance_zone: zone requirements for a feature
 *
 * Every tool resolves to exactly one registry operation, so a tool result carries
 * the same wire payload as the matching REST endpoint.
 */

import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { z, ZodError } from 'zod';

import { renderListMarkdown, renderRecordMarkdown } from '../content/markdown.js';
import { serializePayload, toWirePayload } from '../content/wire.js';
import type { OperationArgs, OperationName, OperationRegistry, OperationResult } from '../operations/registry.js';
import { KIND_LABELS } from '../types/content.js';
import {
  CheckGovernanceZoneInputSchema,
  GetCodeSnippetInputSchema,
  GetTipsForFeatureInputSchema,
  SearchBestPracticesInputSchema,
  TroubleshootIssueInputSchema,
  type OutputFormat,
} from '../types/mcp.js';
import { logToolCall } from '../utils/logger.js';
import { resourceUri } from './resources.js';

const formatProperty = {
  type: 'string',
  enum: ['json', 'markdown'],
  description: 'Response format: json (default) or markdown',
};

/**
 * Get tool definitions for ListTools response
 */
export function getToolDefinitions(): Tool[] {
  return [
    {
      name: 'search_best_practices',
      description:
        'Search best practices by free text, optionally filtered by category and difficulty. ' +
        'Returns every match with the total count.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          query: {
            type: 'string',
            description: 'Text to look for in title, description, rationale and tags',
          },
          category: {
            type: 'string',
            description:
              'Category: topics, connectors, security, error-handling, testing, knowledge, performance or governance',
          },
          difficulty: {
            type: 'string',
            description: 'Difficulty: beginner, intermediate or advanced',
          },
          format: formatProperty,
        },
      },
    },
    {
      name: 'get_code_snippet',
      description:
        'Get a code snippet by id, or search snippets by text and language when no id is given.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          id: {
            type: 'string',
            description: 'Snippet id, e.g. snip-001',
          },
          query: {
            type: 'string',
            description: 'Text to look for in title, description, code, use case and tags',
          },
          language: {
            type: 'string',
            description: 'Language: power-fx, yaml, json or any',
          },
          format: formatProperty,
        },
      },
    },
    {
      name: 'troubleshoot_issue',
      description:
        'Find troubleshooting guides whose title, symptoms or causes mention the issue, ' +
        'or get one guide by id.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          issue: {
            type: 'string',
            description: 'Description of the problem',
          },
          id: {
            type: 'string',
            description: 'Troubleshooting guide id',
          },
          category: {
            type: 'string',
            description: 'Category: authentication, connectors, publishing, knowledge, topics or performance',
          },
          format: formatProperty,
        },
      },
    },
    {
      name: 'get_tips_for_feature',
      description: 'List tips for a feature area, or get one tip by id. With no arguments, lists every tip.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          feature: {
            type: 'string',
            description: 'Feature area: topics, testing, authoring, variables, knowledge or publishing',
          },
          id: {
            type: 'string',
            description: 'Tip id',
          },
          format: formatProperty,
        },
      },
    },
    {
      name: 'check_governance_zone',
      description:
        'Check which governance zones allow a feature and what each zone requires. ' +
        'Feature names are matched case-insensitively; spaces and underscores count as hyphens.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          feature: {
            type: 'string',
            description: 'Feature name, e.g. "HTTP connector" or mcp-servers',
          },
          format: formatProperty,
        },
        required: ['feature'],
      },
    },
  ];
}

interface ToolPlan {
  operation: OperationName;
  args: OperationArgs;
  format: OutputFormat;
}

function summarizeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

class InvalidToolArguments extends Error {}

function parseArgs<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  args: Record<string, unknown> | undefined
): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new InvalidToolArguments(summarizeIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Map a tool call onto a registry operation. Returns null for unknown tools.
 */
export function planToolCall(toolName: string, args: Record<string, unknown> | undefined): ToolPlan | null {
  switch (toolName) {
    case 'search_best_practices': {
      const input = parseArgs(SearchBestPracticesInputSchema, args);
      return {
        operation: 'listBestPractices',
        args: { query: input.query, filters: { category: input.category, difficulty: input.difficulty } },
        format: input.format,
      };
    }
    case 'get_code_snippet': {
      const input = parseArgs(GetCodeSnippetInputSchema, args);
      if (input.id !== undefined) {
        return { operation: 'getSnippet', args: { key: input.id }, format: input.format };
      }
      return {
        operation: 'listSnippets',
        args: { query: input.query, filters: { language: input.language } },
        format: input.format,
      };
    }
    case 'troubleshoot_issue': {
      const input = parseArgs(TroubleshootIssueInputSchema, args);
      if (input.id !== undefined) {
        return { operation: 'getTroubleshootingGuide', args: { key: input.id }, format: input.format };
      }
      return {
        operation: 'listTroubleshooting',
        args: { query: input.issue, filters: { category: input.category } },
        format: input.format,
      };
    }
    case 'get_tips_for_feature': {
      const input = parseArgs(GetTipsForFeatureInputSchema, args);
      if (input.id !== undefined) {
        return { operation: 'getTip', args: { key: input.id }, format: input.format };
      }
      return { operation: 'listTips', args: { filters: { category: input.feature } }, format: input.format };
    }
    case 'check_governance_zone': {
      const input = parseArgs(CheckGovernanceZoneInputSchema, args);
      return { operation: 'getGovernance', args: { key: input.feature }, format: input.format };
    }
    default:
      return null;
  }
}

/**
 * Render an operation result as a tool result. The structured content is always the
 * wire payload; the text is that payload as JSON, or its markdown rendering.
 */
export function toToolResult(result: OperationResult, format: OutputFormat): CallToolResult {
  if (result.status === 'not_found') {
    return {
      content: [{ type: 'text', text: `Not found: ${KIND_LABELS[result.kind]} '${result.key}'` }],
      isError: true,
    };
  }

  const payload = toWirePayload(result);
  let text: string;
  if (format === 'markdown') {
    text =
      result.status === 'list'
        ? renderListMarkdown(result, result.total, resourceUri)
        : renderRecordMarkdown(result);
  } else {
    text = serializePayload(payload);
  }

  return {
    content: [{ type: 'text', text }],
    structuredContent: payload,
  };
}

/**
 * Handle tool invocation
 */
export function handleToolCall(
  registry: OperationRegistry,
  toolName: string,
  args: Record<string, unknown> | undefined
): CallToolResult {
  const startTime = Date.now();

  try {
    const plan = planToolCall(toolName, args);
    if (!plan) {
      logToolCall(toolName, Date.now() - startTime, false, { error: 'Unknown tool' });
      return {
        content: [{ type: 'text', text: `Unknown tool: ${toolName}` }],
        isError: true,
      };
    }

    const result = toToolResult(registry.invoke(plan.operation, plan.args), plan.format);
    logToolCall(toolName, Date.now() - startTime, result.isError !== true, { operation: plan.operation });
    return result;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logToolCall(toolName, Date.now() - startTime, false, { error: errorMessage });
    const prefix = error instanceof InvalidToolArguments ? 'Invalid arguments' : 'Error';
    return {
      content: [{ type: 'text', text: `${prefix}: ${errorMessage}` }],
      isError: true,
    };
  }
}
