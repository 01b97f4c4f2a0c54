/**
 * Capability document (OpenAPI 3.0.3) for the REST surface
 *
 * The tool-registration system that imports this document cannot extract parameters
 * from referenced or array-typed schemas. Every schema is therefore written inline,
 * the JsonSchema type below has no array or $ref form, and list-valued record fields
 * are described as the delimited strings the wire form actually carries.
 */

import type { FilterName } from '../content/engine.js';
import type { OperationDefinition, OperationRegistry } from '../operations/registry.js';
import {
  BestPracticeCategorySchema,
  DifficultySchema,
  GovernanceZoneSchema,
  SnippetCategorySchema,
  SnippetLanguageSchema,
  TipCategorySchema,
  TroubleshootingCategorySchema,
  KIND_LABELS,
  type ContentKind,
} from '../types/content.js';
import { REST_PREFIX } from './rest.js';

export type JsonSchema =
  | { type: 'string'; description?: string; enum?: string[] }
  | { type: 'integer' | 'number' | 'boolean'; description?: string }
  | { type: 'object'; description?: string; properties: Record<string, JsonSchema>; required?: string[] }
  // A value the document describes without committing to a type
  | { description: string };

export interface ParameterObject {
  name: string;
  in: 'query' | 'path';
  required: boolean;
  description: string;
  schema: JsonSchema;
}

export interface ResponseObject {
  description: string;
  content?: { 'application/json': { schema: JsonSchema } };
}

export interface OperationObject {
  operationId: string;
  summary: string;
  tags: string[];
  parameters: ParameterObject[];
  responses: Record<string, ResponseObject>;
  security?: Record<string, string[]>[];
}

export interface OpenApiDocument {
  openapi: '3.0.3';
  info: { title: string; version: string; description: string };
  paths: Record<string, { get: OperationObject }>;
  components: {
    securitySchemes: Record<string, { type: 'apiKey'; in: 'header'; name: string }>;
  };
  security: Record<string, string[]>[];
}

export interface OpenApiOptions {
  title: string;
  version: string;
  apiKeyHeader: string;
  healthPath: string;
}

const SECURITY_SCHEME = 'ApiKeyAuth';

const text = (description: string): JsonSchema => ({ type: 'string', description });
const oneOf = (values: readonly string[], description: string): JsonSchema => ({
  type: 'string',
  description,
  enum: [...values],
});

const TAGS_FIELD = text('Tags separated by ", "');

const zoneSchema: JsonSchema = {
  type: 'object',
  properties: {
    available: { type: 'boolean', description: 'Whether the feature may be used in this zone' },
    reason: text('Why the feature is or is not available'),
    requirements: text('Requirements separated by "; "'),
  },
  required: ['available', 'reason', 'requirements'],
};

const RECORD_SCHEMAS: Record<ContentKind, JsonSchema> = {
  'best-practices': {
    type: 'object',
    properties: {
      id: text('Record id'),
      title: text('Title'),
      category: oneOf(BestPracticeCategorySchema.options, 'Category'),
      description: text('What to do'),
      rationale: text('Why it matters'),
      example_good: text('Example following the practice'),
      example_bad: text('Example violating the practice'),
      difficulty: oneOf(DifficultySchema.options, 'Difficulty'),
      tags: TAGS_FIELD,
    },
    required: ['id', 'title', 'category', 'description', 'rationale', 'example_good', 'example_bad', 'difficulty', 'tags'],
  },
  snippets: {
    type: 'object',
    properties: {
      id: text('Record id'),
      title: text('Title'),
      language: oneOf(SnippetLanguageSchema.options, 'Language of the code'),
      category: oneOf(SnippetCategorySchema.options, 'Category'),
      description: text('What the snippet does'),
      code: text('The code'),
      explanation: text('How the code works'),
      use_case: text('When to use it'),
      tags: TAGS_FIELD,
    },
    required: ['id', 'title', 'language', 'category', 'description', 'code', 'explanation', 'use_case', 'tags'],
  },
  troubleshooting: {
    type: 'object',
    properties: {
      id: text('Record id'),
      title: text('Title'),
      category: oneOf(TroubleshootingCategorySchema.options, 'Category'),
      symptoms: text('Symptoms separated by "; "'),
      causes: text('Likely causes separated by "; "'),
      resolution_steps: text('Numbered steps, one per line, as "N. action: details"'),
      tags: TAGS_FIELD,
    },
    required: ['id', 'title', 'category', 'symptoms', 'causes', 'resolution_steps', 'tags'],
  },
  tips: {
    type: 'object',
    properties: {
      id: text('Record id'),
      title: text('Title'),
      category: oneOf(TipCategorySchema.options, 'Category'),
      tip: text('The tip'),
      why_it_matters: text('Why it matters'),
      tags: TAGS_FIELD,
    },
    required: ['id', 'title', 'category', 'tip', 'why_it_matters', 'tags'],
  },
  governance: {
    type: 'object',
    properties: {
      id: text('Record id'),
      feature: text('Feature key'),
      display_name: text('Feature name'),
      minimum_zone: oneOf(GovernanceZoneSchema.options, 'Lowest zone that allows the feature'),
      zones: {
        type: 'object',
        description: 'Availability per zone',
        properties: Object.fromEntries(GovernanceZoneSchema.options.map((zone) => [zone, zoneSchema] as const)),
      },
      justification_template: text('Template for justifying use of the feature'),
    },
    required: ['id', 'feature', 'display_name', 'minimum_zone', 'zones', 'justification_template'],
  },
};

const FILTER_VALUES: { [K in ContentKind]: Partial<Record<FilterName, readonly string[]>> } = {
  'best-practices': { category: BestPracticeCategorySchema.options, difficulty: DifficultySchema.options },
  snippets: { language: SnippetLanguageSchema.options, category: SnippetCategorySchema.options },
  troubleshooting: { category: TroubleshootingCategorySchema.options },
  tips: { category: TipCategorySchema.options },
  governance: {},
};

const errorBody = (description: string): ResponseObject => ({
  description,
  content: {
    'application/json': {
      schema: { type: 'object', properties: { detail: text('Error summary') }, required: ['detail'] },
    },
  },
});

/** "/snippets/:id" becomes "/api/v1/snippets/{id}" */
export function toOpenApiPath(expressPath: string): string {
  return `${REST_PREFIX}${expressPath.replace(/:([A-Za-z_]+)/g, '{$1}')}`;
}

function parametersFor(operation: OperationDefinition): ParameterObject[] {
  const parameters: ParameterObject[] = [];

  if (operation.keyParam) {
    parameters.push({
      name: operation.keyParam,
      in: 'path',
      required: true,
      description: operation.keyParam === 'feature' ? 'Feature name' : `${KIND_LABELS[operation.kind]} id`,
      schema: { type: 'string' },
    });
  }

  if (operation.acceptsQuery) {
    parameters.push({
      name: 'q',
      in: 'query',
      required: false,
      description: 'Case-insensitive text to search for',
      schema: { type: 'string' },
    });
  }

  for (const filter of operation.filters) {
    const values = FILTER_VALUES[operation.kind][filter];
    parameters.push({
      name: filter,
      in: 'query',
      required: false,
      description: `Exact ${filter} match`,
      schema: values ? oneOf(values, `Allowed ${filter} values`) : { type: 'string' },
    });
  }

  return parameters;
}

function responseSchemaFor(operation: OperationDefinition): JsonSchema {
  const record = RECORD_SCHEMAS[operation.kind];
  if (operation.mode === 'detail') {
    return record;
  }
  return {
    type: 'object',
    properties: {
      results: {
        description: `Every matching ${KIND_LABELS[operation.kind]} record, in collection order`,
      },
      total: { type: 'integer', description: 'Number of results' },
    },
    required: ['results', 'total'],
  };
}

function describeOperation(operation: OperationDefinition): OperationObject {
  const responses: Record<string, ResponseObject> = {
    '200': {
      description: 'Success',
      content: { 'application/json': { schema: responseSchemaFor(operation) } },
    },
    '401': errorBody('Missing or invalid API key'),
  };
  if (operation.mode === 'detail') {
    responses['404'] = errorBody('No such record');
  }

  return {
    operationId: operation.name,
    summary: operation.summary,
    tags: [operation.kind],
    parameters: parametersFor(operation),
    responses,
  };
}

export function buildOpenApiDocument(registry: OperationRegistry, options: OpenApiOptions): OpenApiDocument {
  const paths: Record<string, { get: OperationObject }> = {};

  paths[options.healthPath] = {
    get: {
      operationId: 'health',
      summary: 'Liveness probe',
      tags: ['health'],
      parameters: [],
      responses: {
        '200': {
          description: 'Service is up and the dataset is loaded',
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: {
                  status: text('Always "healthy"'),
                  data_loaded: { type: 'boolean', description: 'Whether the dataset is loaded' },
                },
              },
            },
          },
        },
      },
      security: [],
    },
  };

  for (const operation of registry.list()) {
    paths[toOpenApiPath(operation.path)] = { get: describeOperation(operation) };
  }

  return {
    openapi: '3.0.3',
    info: {
      title: options.title,
      version: options.version,
      description: 'Read-only knowledge base of best practices, snippets, troubleshooting guides, tips and governance rules.',
    },
    paths,
    components: {
      securitySchemes: {
        [SECURITY_SCHEME]: { type: 'apiKey', in: 'header', name: options.apiKeyHeader },
      },
    },
    security: [{ [SECURITY_SCHEME]: [] }],
  };
}
