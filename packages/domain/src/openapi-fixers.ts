import { parse, stringify } from 'yaml';

import { FixerContext, FixerOutput, StrategyFixer } from './strategies.js';

type SpecNode = Record<string, unknown>;
type SpecFormat = 'json' | 'yaml';

export function isRecord(value: unknown): value is SpecNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function detectFormat(content: string, filePath: string): SpecFormat {
  if (filePath.toLowerCase().endsWith('.json')) {
    return 'json';
  }
  return content.trimStart().startsWith('{') ? 'json' : 'yaml';
}

function dump(document: SpecNode, format: SpecFormat): string {
  return format === 'json' ? `${JSON.stringify(document, null, 2)}\n` : stringify(document);
}

/**
 * Parses an API description, lets `mutate` edit it in place and serializes it
 * back when `mutate` reports a change.
 */
function editSpec(content: string, context: FixerContext, mutate: (document: SpecNode) => boolean): FixerOutput | null {
  const format = detectFormat(content, context.filePath);
  const document: unknown = format === 'json' ? JSON.parse(content) : parse(content);

  if (!isRecord(document) || !mutate(document)) {
    return null;
  }

  return { content: dump(document, format), addedImports: [], removedImports: [] };
}

function walk(node: unknown, visit: (record: SpecNode, parentKey: string | null) => void, parentKey: string | null = null): void {
  if (Array.isArray(node)) {
    for (const item of node) {
      walk(item, visit, parentKey);
    }
    return;
  }

  if (!isRecord(node)) {
    return;
  }

  visit(node, parentKey);

  for (const [key, value] of Object.entries(node)) {
    walk(value, visit, key);
  }
}

/** Rebuilds `paths` with renamed keys, keeping order and skipping renames that would collide. */
function renamePaths(document: SpecNode, rename: (path: string) => string): boolean {
  const paths = document.paths;
  if (!isRecord(paths)) {
    return false;
  }

  const renamed: SpecNode = {};
  let modified = false;

  for (const [path, item] of Object.entries(paths)) {
    const candidate = rename(path);
    const target = candidate !== path && !(candidate in paths) && !(candidate in renamed) ? candidate : path;
    if (target !== path) {
      modified = true;
    }
    renamed[target] = item;
  }

  if (modified) {
    document.paths = renamed;
  }

  return modified;
}

function mapLiteralSegments(path: string, map: (segment: string, next: string | undefined) => string): string {
  const segments = path.split('/');
  const mapped = segments.map((segment, index) =>
    segment === '' || segment.startsWith('{') || /^v\d+$/.test(segment) ? segment : map(segment, segments[index + 1])
  );

  const joined = mapped.join('/').replace(/\/{2,}/g, '/');
  return joined.length > 1 && joined.endsWith('/') && !path.endsWith('/') ? joined.slice(0, -1) : joined || '/';
}

export function toKebabCase(segment: string): string {
  return segment
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/_/g, '-')
    .toLowerCase();
}

const irregularPlurals: Record<string, string> = {
  person: 'people',
  child: 'children'
};

export function pluralize(word: string): string {
  const lower = word.toLowerCase();
  const irregular = irregularPlurals[lower];
  if (irregular) {
    return irregular;
  }
  if (/(s|x|z|ch|sh)$/.test(lower)) {
    return lower.endsWith('s') ? word : `${word}es`;
  }
  if (/[^aeiou]y$/.test(lower)) {
    return `${word.slice(0, -1)}ies`;
  }
  return `${word}s`;
}

export function toCamelCase(name: string): string {
  const [head = '', ...rest] = name.split('_').filter(Boolean);
  return head + rest.map((part) => part.charAt(0).toUpperCase() + part.slice(1)).join('');
}

const pathVerbs = ['get', 'create', 'update', 'delete', 'fetch', 'retrieve', 'list', 'add', 'remove'];

function stripVerb(segment: string): string {
  for (const verb of pathVerbs) {
    if (segment === verb) {
      return '';
    }
    if (segment.startsWith(`${verb}-`)) {
      return segment.slice(verb.length + 1);
    }
    const camel = new RegExp(`^${verb}([A-Z])`).exec(segment);
    if (camel?.[1]) {
      return camel[1].toLowerCase() + segment.slice(verb.length + 1);
    }
  }
  return segment;
}

const httpMethods = ['get', 'put', 'post', 'delete', 'patch', 'options', 'head', 'trace'];

function operations(document: SpecNode): Array<{ method: string; operation: SpecNode }> {
  const paths = document.paths;
  if (!isRecord(paths)) {
    return [];
  }

  const found: Array<{ method: string; operation: SpecNode }> = [];
  for (const item of Object.values(paths)) {
    if (!isRecord(item)) {
      continue;
    }
    for (const method of httpMethods) {
      const operation = item[method];
      if (isRecord(operation)) {
        found.push({ method, operation });
      }
    }
  }
  return found;
}

export const kebabCasePaths: StrategyFixer = (content, context) =>
  editSpec(content, context, (document) => renamePaths(document, (path) => mapLiteralSegments(path, toKebabCase)));

export const pluralResources: StrategyFixer = (content, context) =>
  editSpec(content, context, (document) =>
    renamePaths(document, (path) =>
      mapLiteralSegments(path, (segment, next) => (next === undefined || next.startsWith('{') ? pluralize(segment) : segment))
    )
  );

export const standardHttpVerbs: StrategyFixer = (content, context) =>
  editSpec(content, context, (document) => renamePaths(document, (path) => mapLiteralSegments(path, stripVerb)));

function isIdentifierName(name: string): boolean {
  return /^id$/i.test(name) || /[a-z0-9]Id$/.test(name) || /[_-]id$/i.test(name) || /uuid/i.test(name);
}

export const uuidFormat: StrategyFixer = (content, context) =>
  editSpec(content, context, (document) => {
    let modified = false;

    walk(document, (node) => {
      if (node.type === 'string' && node.format === undefined) {
        const name = typeof node.name === 'string' ? node.name : '';
        const description = typeof node.description === 'string' ? node.description.toLowerCase() : '';
        if (isIdentifierName(name) || description.includes('uuid')) {
          node.format = 'uuid';
          modified = true;
        }
      }

      const schema = node.schema;
      if (typeof node.name === 'string' && isIdentifierName(node.name) && isRecord(schema)) {
        if (schema.type === 'string' && schema.format === undefined) {
          schema.format = 'uuid';
          modified = true;
        }
      }
    });

    return modified;
  });

export const camelCaseProperties: StrategyFixer = (content, context) =>
  editSpec(content, context, (document) => {
    let modified = false;

    walk(document, (node) => {
      const properties = node.properties;
      if (!isRecord(properties) || !Object.keys(properties).some((name) => name.includes('_'))) {
        return;
      }

      const renamed: SpecNode = {};
      for (const [name, value] of Object.entries(properties)) {
        renamed[name.includes('_') ? toCamelCase(name) : name] = value;
      }
      node.properties = renamed;

      if (Array.isArray(node.required)) {
        node.required = node.required.map((name: unknown) =>
          typeof name === 'string' && name.includes('_') ? toCamelCase(name) : name
        );
      }

      modified = true;
    });

    return modified;
  });

const paginationFields: SpecNode = {
  page: { type: 'integer', description: 'Current page number' },
  pageSize: { type: 'integer', description: 'Number of items per page' },
  totalItems: { type: 'integer', description: 'Total number of items' },
  totalPages: { type: 'integer', description: 'Total number of pages' }
};

export const paginationStructure: StrategyFixer = (content, context) =>
  editSpec(content, context, (document) => {
    let modified = false;

    walk(document, (node) => {
      const properties = node.properties;
      if (node.type !== 'object' || !isRecord(properties)) {
        return;
      }

      const listsItems = 'items' in properties || 'data' in properties || 'results' in properties;
      if (listsItems && !('page' in properties)) {
        for (const [name, field] of Object.entries(paginationFields)) {
          if (!(name in properties)) {
            properties[name] = structuredClone(field);
          }
        }
        modified = true;
      }
    });

    return modified;
  });

export const descriptionRequired: StrategyFixer = (content, context) =>
  editSpec(content, context, (document) => {
    let modified = false;

    const annotate = (node: unknown, scope: 'schema' | 'parameter' | null): void => {
      if (Array.isArray(node)) {
        for (const item of node) {
          annotate(item, scope);
        }
        return;
      }
      if (!isRecord(node)) {
        return;
      }

      const operationId = typeof node.operationId === 'string' ? node.operationId : null;
      if (node.description === undefined) {
        if (operationId) {
          node.description = `Pending description for ${operationId}`;
          modified = true;
        } else if (scope === 'schema' && node.type !== undefined) {
          node.description = 'Pending description for this schema';
          modified = true;
        } else if (scope === 'parameter' && typeof node.name === 'string') {
          node.description = `Pending description for parameter ${node.name}`;
          modified = true;
        }
      }
      if (operationId && node.summary === undefined) {
        node.summary = `Pending summary for ${operationId}`;
        modified = true;
      }

      for (const [key, value] of Object.entries(node)) {
        annotate(value, key === 'schemas' ? 'schema' : key === 'parameters' ? 'parameter' : scope);
      }
    };

    annotate(document, null);
    return modified;
  });

export const versioningRequired: StrategyFixer = (content, context) =>
  editSpec(content, context, (document) => renamePaths(document, (path) => (/^\/v\d+(\/|$)/.test(path) ? path : `/v1${path}`)));

export const createdReturnsResource: StrategyFixer = (content, context) =>
  editSpec(content, context, (document) => {
    let modified = false;

    for (const { method, operation } of operations(document)) {
      const created = isRecord(operation.responses) ? operation.responses['201'] : undefined;
      if (method === 'post' && isRecord(created) && created.content === undefined) {
        created.content = {
          'application/json': {
            schema: { type: 'object', description: 'The created resource' }
          }
        };
        modified = true;
      }
    }

    return modified;
  });

export const postReturns201: StrategyFixer = (content, context) =>
  editSpec(content, context, (document) => {
    let modified = false;

    for (const { method, operation } of operations(document)) {
      const responses = operation.responses;
      if (method !== 'post' || !isRecord(responses) || !('200' in responses) || '201' in responses) {
        continue;
      }

      const reordered: SpecNode = {};
      for (const [status, response] of Object.entries(responses)) {
        reordered[status === '200' ? '201' : status] = response;
      }
      operation.responses = reordered;
      modified = true;
    }

    return modified;
  });
