/**
 * Operation registry shared by the REST and MCP surfaces
 *
 * Built once at startup from the search engine. Each operation names the collection
 * it reads, its REST route, the filters it accepts and the handler that runs it.
 * REST routes, MCP tools/resources and the capability document are all derived from
 * the same registry instance, so the two surfaces cannot drift apart.
 */

import type { FilterName, SearchEngine, SearchFilters } from '../content/engine.js';
import type { ContentKind, KindedList, KindedRecord } from '../types/content.js';

export type OperationName =
  | 'listBestPractices'
  | 'getBestPractice'
  | 'listSnippets'
  | 'getSnippet'
  | 'listTroubleshooting'
  | 'getTroubleshootingGuide'
  | 'listTips'
  | 'getTip'
  | 'getGovernance';

export interface OperationArgs {
  query?: string | undefined;
  filters?: SearchFilters | undefined;
  key?: string | undefined;
}

export type OperationResult =
  | ({ status: 'list'; total: number } & KindedList)
  | ({ status: 'record' } & KindedRecord)
  | { status: 'not_found'; kind: ContentKind; key: string };

export type FoundResult = Exclude<OperationResult, { status: 'not_found' }>;

export interface OperationDefinition {
  name: OperationName;
  kind: ContentKind;
  mode: 'list' | 'detail';
  /** Route below the REST prefix, in express syntax */
  path: string;
  summary: string;
  /** Whether a list operation takes the free-text `q` parameter */
  acceptsQuery: boolean;
  filters: readonly FilterName[];
  /** Path parameter that names the record (detail operations only) */
  keyParam?: 'id' | 'feature';
  handler: (args: OperationArgs) => OperationResult;
}

function notFound(kind: ContentKind, key: string): OperationResult {
  return { status: 'not_found', kind, key };
}

export class OperationRegistry {
  private readonly operations = new Map<OperationName, OperationDefinition>();

  register(operation: OperationDefinition): this {
    if (this.operations.has(operation.name)) {
      throw new Error(`Operation already registered: ${operation.name}`);
    }
    this.operations.set(operation.name, operation);
    return this;
  }

  has(name: OperationName): boolean {
    return this.operations.has(name);
  }

  get(name: OperationName): OperationDefinition {
    const operation = this.operations.get(name);
    if (!operation) {
      throw new Error(`Unknown operation: ${name}`);
    }
    return operation;
  }

  /**
   * All operations, in registration order.
   */
  list(): OperationDefinition[] {
    return [...this.operations.values()];
  }

  invoke(name: OperationName, args: OperationArgs = {}): OperationResult {
    return this.get(name).handler(args);
  }
}

/**
 * Build the registry for every read operation the service exposes.
 */
export function createOperationRegistry(engine: SearchEngine): OperationRegistry {
  const registry = new OperationRegistry();

  registry
    .register({
      name: 'listBestPractices',
      kind: 'best-practices',
      mode: 'list',
      path: '/best-practices',
      summary: 'Search best practices by text, category and difficulty',
      acceptsQuery: true,
      filters: ['category', 'difficulty'],
      handler: ({ query, filters }) => {
        const { results, total } = engine.search('best-practices', query, filters);
        return { status: 'list', kind: 'best-practices', records: results, total };
      },
    })
    .register({
      name: 'getBestPractice',
      kind: 'best-practices',
      mode: 'detail',
      path: '/best-practices/:id',
      summary: 'Get one best practice by id',
      acceptsQuery: false,
      filters: [],
      keyParam: 'id',
      handler: ({ key = '' }) => {
        const record = engine.lookup('best-practices', key);
        return record ? { status: 'record', kind: 'best-practices', record } : notFound('best-practices', key);
      },
    })
    .register({
      name: 'listSnippets',
      kind: 'snippets',
      mode: 'list',
      path: '/snippets',
      summary: 'Search code snippets by text, language and category',
      acceptsQuery: true,
      filters: ['language', 'category'],
      handler: ({ query, filters }) => {
        const { results, total } = engine.search('snippets', query, filters);
        return { status: 'list', kind: 'snippets', records: results, total };
      },
    })
    .register({
      name: 'getSnippet',
      kind: 'snippets',
      mode: 'detail',
      path: '/snippets/:id',
      summary: 'Get one code snippet by id',
      acceptsQuery: false,
      filters: [],
      keyParam: 'id',
      handler: ({ key = '' }) => {
        const record = engine.lookup('snippets', key);
        return record ? { status: 'record', kind: 'snippets', record } : notFound('snippets', key);
      },
    })
    .register({
      name: 'listTroubleshooting',
      kind: 'troubleshooting',
      mode: 'list',
      path: '/troubleshooting',
      summary: 'Search troubleshooting guides by text and category',
      acceptsQuery: true,
      filters: ['category'],
      handler: ({ query, filters }) => {
        const { results, total } = engine.search('troubleshooting', query, filters);
        return { status: 'list', kind: 'troubleshooting', records: results, total };
      },
    })
    .register({
      name: 'getTroubleshootingGuide',
      kind: 'troubleshooting',
      mode: 'detail',
      path: '/troubleshooting/:id',
      summary: 'Get one troubleshooting guide by id',
      acceptsQuery: false,
      filters: [],
      keyParam: 'id',
      handler: ({ key = '' }) => {
        const record = engine.lookup('troubleshooting', key);
        return record ? { status: 'record', kind: 'troubleshooting', record } : notFound('troubleshooting', key);
      },
    })
    .register({
      name: 'listTips',
      kind: 'tips',
      mode: 'list',
      path: '/tips',
      summary: 'List tips, optionally by category',
      acceptsQuery: true,
      filters: ['category'],
      handler: ({ query, filters }) => {
        const { results, total } = engine.search('tips', query, filters);
        return { status: 'list', kind: 'tips', records: results, total };
      },
    })
    .register({
      name: 'getTip',
      kind: 'tips',
      mode: 'detail',
      path: '/tips/:id',
      summary: 'Get one tip by id',
      acceptsQuery: false,
      filters: [],
      keyParam: 'id',
      handler: ({ key = '' }) => {
        const record = engine.lookup('tips', key);
        return record ? { status: 'record', kind: 'tips', record } : notFound('tips', key);
      },
    })
    .register({
      name: 'getGovernance',
      kind: 'governance',
      mode: 'detail',
      path: '/governance/:feature',
      summary: 'Get the governance zone requirements for a feature',
      acceptsQuery: false,
      filters: [],
      keyParam: 'feature',
      handler: ({ key = '' }) => {
        const record = engine.governanceFor(key);
        return record ? { status: 'record', kind: 'governance', record } : notFound('governance', key);
      },
    });

  return registry;
}
