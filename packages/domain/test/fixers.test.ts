import { parse } from 'yaml';
import { describe, expect, it } from 'vitest';

import { TaxonomyError } from '../src/errors.js';
import { ensureImports, javaUtilLogging, secureRandom, stdStreams, transactionalLayer } from '../src/java-fixers.js';
import {
  camelCaseProperties,
  descriptionRequired,
  isRecord,
  kebabCasePaths,
  pluralResources,
  postReturns201,
  standardHttpVerbs,
  uuidFormat,
  versioningRequired
} from '../src/openapi-fixers.js';
import { FixerContext, StrategyCatalog, defaultStrategyCatalog, normalizeSafety } from '../src/strategies.js';
import { makeViolation } from './fixtures.js';

function context(filePath: string): FixerContext {
  return { violation: makeViolation({ file: filePath }), line: null, filePath };
}

function yamlPaths(content: string | undefined): string[] {
  const document: unknown = parse(content ?? '');
  if (!isRecord(document) || !isRecord(document.paths)) {
    return [];
  }
  return Object.keys(document.paths);
}

const javaContext = context('src/main/java/com/example/UserService.java');

describe('java fixers', () => {
  it('replaces standard streams with a logger field and imports', () => {
    const source = [
      'package com.example;',
      '',
      'import java.util.List;',
      '',
      'public class UserService {',
      '    public void run() {',
      '        System.out.println("hi");',
      '    }',
      '}',
      ''
    ].join('\n');

    const output = stdStreams(source, javaContext);

    expect(output?.content).toBe(
      [
        'package com.example;',
        '',
        'import java.util.List;',
        'import org.slf4j.Logger;',
        'import org.slf4j.LoggerFactory;',
        '',
        'public class UserService {',
        '    private static final Logger logger = LoggerFactory.getLogger(UserService.class);',
        '',
        '    public void run() {',
        '        logger.info("hi");',
        '    }',
        '}',
        ''
      ].join('\n')
    );
    expect(output?.addedImports).toEqual(['org.slf4j.Logger', 'org.slf4j.LoggerFactory']);
  });

  it('returns null when there is nothing to change', () => {
    expect(stdStreams('public class Quiet {}\n', javaContext)).toBeNull();
  });

  it('swaps Random for SecureRandom', () => {
    const source = 'import java.util.Random;\n\nclass Tokens {\n    Random rng = new Random();\n}\n';

    expect(secureRandom(source, javaContext)?.content).toBe(
      'import java.security.SecureRandom;\n\nclass Tokens {\n    SecureRandom rng = new SecureRandom();\n}\n'
    );
  });

  it('moves java.util.logging to slf4j', () => {
    const source = 'import java.util.logging.Logger;\n\npublic class Jobs {\n}\n';
    const output = javaUtilLogging(source, javaContext);

    expect(output?.content).toBe('import org.slf4j.Logger;\nimport org.slf4j.LoggerFactory;\n\npublic class Jobs {\n}\n');
    expect(output?.removedImports).toEqual(['java.util.logging.Logger']);
  });

  it('drops @Transactional and its import from controllers', () => {
    const source = [
      'import org.springframework.transaction.annotation.Transactional;',
      'public class UserController {',
      '    @Transactional',
      '    public void save() {}',
      '}'
    ].join('\n');

    expect(transactionalLayer(source, javaContext)?.content).toBe(
      ['public class UserController {', '    public void save() {}', '}'].join('\n')
    );
  });

  it('places imports after the package line when there are none', () => {
    expect(ensureImports('package a;\n\nclass X {}\n', ['b.C'])).toBe('package a;\n\nimport b.C;\n\nclass X {}\n');
    expect(ensureImports('import b.C;\nclass X {}\n', ['b.C'])).toBe('import b.C;\nclass X {}\n');
  });
});

describe('openapi fixers', () => {
  const specContext = context('api/users-api.yaml');

  it('kebab-cases literal path segments only', () => {
    const source = 'openapi: 3.0.0\npaths:\n  /userAccounts/{accountId}:\n    get:\n      summary: Get account\n';
    expect(yamlPaths(kebabCasePaths(source, specContext)?.content)).toEqual(['/user-accounts/{accountId}']);
  });

  it('pluralizes collection segments', () => {
    const source = 'paths:\n  /user/{id}:\n    get: {}\n  /category:\n    get: {}\n';
    expect(yamlPaths(pluralResources(source, specContext)?.content)).toEqual(['/users/{id}', '/categories']);
  });

  it('strips verbs from paths', () => {
    const source = 'paths:\n  /getUsers:\n    get: {}\n  /orders/create-order:\n    post: {}\n';
    expect(yamlPaths(standardHttpVerbs(source, specContext)?.content)).toEqual(['/users', '/orders/order']);
  });

  it('adds a version prefix', () => {
    const source = 'paths:\n  /users:\n    get: {}\n  /v2/orders:\n    get: {}\n';
    expect(yamlPaths(versioningRequired(source, specContext)?.content)).toEqual(['/v1/users', '/v2/orders']);
  });

  it('marks identifier parameters as uuid', () => {
    const source = [
      'paths:',
      '  /users/{userId}:',
      '    get:',
      '      parameters:',
      '        - name: userId',
      '          in: path',
      '          schema:',
      '            type: string',
      ''
    ].join('\n');

    const document: unknown = parse(uuidFormat(source, specContext)?.content ?? '');
    expect(document).toEqual({
      paths: {
        '/users/{userId}': {
          get: { parameters: [{ name: 'userId', in: 'path', schema: { type: 'string', format: 'uuid' } }] }
        }
      }
    });
  });

  it('camel-cases properties and their required list', () => {
    const source = [
      'components:',
      '  schemas:',
      '    User:',
      '      type: object',
      '      required: [first_name]',
      '      properties:',
      '        first_name:',
      '          type: string',
      '        email:',
      '          type: string',
      ''
    ].join('\n');

    const document: unknown = parse(camelCaseProperties(source, specContext)?.content ?? '');
    expect(document).toEqual({
      components: {
        schemas: {
          User: {
            type: 'object',
            required: ['firstName'],
            properties: { firstName: { type: 'string' }, email: { type: 'string' } }
          }
        }
      }
    });
  });

  it('renames a POST 200 response to 201 and keeps JSON output', () => {
    const source = JSON.stringify({ paths: { '/users': { post: { responses: { '200': { description: 'ok' } } } } } });
    const output = postReturns201(source, context('api/users-api.json'));

    expect(JSON.parse(output?.content ?? '{}')).toEqual({
      paths: { '/users': { post: { responses: { '201': { description: 'ok' } } } } }
    });
  });

  it('fills in placeholder descriptions for operations', () => {
    const source = 'paths:\n  /users:\n    get:\n      operationId: listUsers\n';
    const document: unknown = parse(descriptionRequired(source, specContext)?.content ?? '');

    expect(document).toEqual({
      paths: {
        '/users': {
          get: {
            operationId: 'listUsers',
            description: 'Pending description for listUsers',
            summary: 'Pending summary for listUsers'
          }
        }
      }
    });
  });

  it('returns null when the document already complies', () => {
    expect(kebabCasePaths('paths:\n  /users:\n    get: {}\n', specContext)).toBeNull();
  });
});

describe('StrategyCatalog', () => {
  it('loads the bundled catalog and wires fixers', () => {
    const catalog = defaultStrategyCatalog();

    expect(catalog.strategyFor('coding-no-std-streams')?.fixer).toBe(stdStreams);
    expect(catalog.strategyFor('coding-no-generic-exceptions')?.fixer).toBeNull();
    expect(catalog.strategyFor('kebab-case-paths')?.safety).toBe('safe');
    expect(catalog.strategyFor('no-such-rule')).toBeNull();
  });

  it('reads the legacy manual tier as review required', () => {
    expect(normalizeSafety('manual_only')).toBe('review_required');

    const catalog = new StrategyCatalog({
      version: 1,
      strategies: [
        {
          ruleId: 'legacy-rule',
          description: 'legacy',
          complexity: 'complex',
          safety: 'manual_only',
          fixer: null,
          explanation: 'Needs a person.'
        }
      ]
    });
    expect(catalog.strategyFor('legacy-rule')?.safety).toBe('review_required');
  });

  it('rejects a strategy naming an unknown fixer', () => {
    expect(
      () =>
        new StrategyCatalog({
          version: 1,
          strategies: [
            { ruleId: 'r', description: 'd', complexity: 'simple', safety: 'safe', fixer: 'doesNotExist', explanation: 'e' }
          ]
        })
    ).toThrow(TaxonomyError);
  });
});
