/**
 * Unit tests for tool registration and call handling
 */

import { describe, test, expect, beforeEach, jest } from '@jest/globals';

import { TokenProvider } from '../../src/services/auth/token-provider.js';
import { GraphQLClient } from '../../src/services/graphql/graphql-client.js';
import { formatOutput } from '../../src/services/tools/output-formatter.js';
import {
  ToolRegistrar,
  buildToolListing,
  collectVariables
} from '../../src/services/tools/tool-registrar.js';
import { ToolRegistry } from '../../src/services/tools/tool-registry.js';
import type { ServerSettings, ToolDefinition } from '../../src/types/config.js';
import { createCapturingLogger, WARN_LEVEL, type CapturedLogger } from '../helpers/capture-logger.js';

const ENDPOINT = 'https://api.example.test/graphql';

function makeSettings(overrides: Partial<ServerSettings> = {}): ServerSettings {
  return {
    name: 'test-forge',
    version: '1.0.0',
    url: ENDPOINT,
    env: {},
    envPassthrough: false,
    ...overrides
  };
}

function makeDefinition(overrides: Partial<ToolDefinition> = {}): ToolDefinition {
  return {
    name: 'listRepositories',
    description: 'List repositories of a user',
    query: 'query ($login: String!, $first: Int) { user(login: $login) { repositories(first: $first) { totalCount } } }',
    inputs: [
      { name: 'login', type: 'string', description: 'User login', required: true },
      { name: 'first', type: 'number', description: 'Page size', required: false }
    ],
    output: 'raw',
    sourceFile: '/config/listRepositories.yaml',
    ...overrides
  };
}

describe('ToolRegistrar', () => {
  const mockFetch = jest.fn<typeof fetch>();
  let captured: CapturedLogger;
  let registry: ToolRegistry;

  function createRegistrar(settings: ServerSettings = makeSettings()): ToolRegistrar {
    const tokenProvider = new TokenProvider(settings, captured.logger);
    const graphqlClient = new GraphQLClient({ logger: captured.logger, fetch: mockFetch });
    return new ToolRegistrar(settings, tokenProvider, graphqlClient, captured.logger);
  }

  function lastInit(): RequestInit | undefined {
    return mockFetch.mock.calls[mockFetch.mock.calls.length - 1][1];
  }

  beforeEach(() => {
    mockFetch.mockReset();
    mockFetch.mockImplementation(async () => new Response('{"data":{}}', { status: 200 }));
    captured = createCapturingLogger();
    registry = new ToolRegistry();
  });

  describe('register', () => {
    test('should register a tool with supported input types', () => {
      const registered = createRegistrar().register(registry, makeDefinition());

      expect(registered).toBe(true);
      expect(registry.getToolNames()).toEqual(['listRepositories']);
    });

    test('should skip a tool with an unsupported input type and warn', () => {
      const definition = makeDefinition({
        name: 'toggleFeature',
        inputs: [
          { name: 'feature', type: 'string', description: 'Feature key', required: true },
          { name: 'enabled', type: 'boolean', description: 'Target state', required: true }
        ]
      });

      const registered = createRegistrar().register(registry, definition);

      expect(registered).toBe(false);
      expect(registry.has('toggleFeature')).toBe(false);
      expect(registry.size).toBe(0);
      expect(captured.messages(WARN_LEVEL)).toEqual([
        'Unsupported input type "boolean" in tool toggleFeature, skipping'
      ]);
    });

    test('should keep the first of two tools with the same name', () => {
      const registrar = createRegistrar();
      const first = makeDefinition({ description: 'first' });
      const second = makeDefinition({ description: 'second', sourceFile: '/config/other.yaml' });

      expect(registrar.registerAll(registry, [first, second])).toBe(1);
      expect(registry.getTool('listRepositories')?.listing.description).toBe('first');
      expect(captured.messages(WARN_LEVEL)).toEqual(['Duplicate tool name listRepositories, skipping']);
    });
  });

  describe('buildToolListing', () => {
    test('should describe inputs as a JSON schema and copy annotations', () => {
      const listing = buildToolListing(
        makeDefinition({ annotations: { title: 'List Repositories', readOnlyHint: true } })
      );

      expect(listing).toEqual({
        name: 'listRepositories',
        description: 'List repositories of a user',
        inputSchema: {
          type: 'object',
          properties: {
            login: { type: 'string', description: 'User login' },
            first: { type: 'number', description: 'Page size' }
          },
          required: ['login']
        },
        annotations: { title: 'List Repositories', readOnlyHint: true }
      });
    });

    test('should leave out required and annotations when there are none', () => {
      const listing = buildToolListing(makeDefinition({ name: 'viewer', inputs: [] }));

      expect(listing.inputSchema).toEqual({ type: 'object', properties: {} });
      expect('annotations' in listing).toBe(false);
    });
  });

  describe('collectVariables', () => {
    const inputs = makeDefinition().inputs;

    test('should bind omitted optional inputs to null', () => {
      expect(collectVariables(inputs, { login: 'octocat' })).toEqual({ login: 'octocat', first: null });
    });

    test('should ignore undeclared arguments and keep values as supplied', () => {
      expect(collectVariables(inputs, { login: 'octocat', first: '5', extra: true })).toEqual({
        login: 'octocat',
        first: '5'
      });
    });

    test('should treat an explicit null as supplied', () => {
      expect(collectVariables(inputs, { login: null })).toEqual({ login: null, first: null });
    });

    test('should throw naming the missing required input', () => {
      expect(() => collectVariables(inputs, { first: 5 })).toThrow('missing required argument: login');
    });
  });

  describe('handler', () => {
    test('should return an error naming the missing argument without calling GraphQL', async () => {
      const handler = createRegistrar().createHandler(makeDefinition());

      const result = await handler({ first: 10 }, {});

      expect(result).toEqual({
        content: [{ type: 'text', text: 'Error: missing required argument: login' }],
        isError: true
      });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    test('should send exactly the declared variables', async () => {
      const handler = createRegistrar().createHandler(makeDefinition());

      await handler({ login: 'octocat', first: 5, ignored: 'x' }, {});

      expect(mockFetch).toHaveBeenCalledTimes(1);
      const payload = JSON.parse(String(lastInit()?.body));
      expect(payload).toEqual({
        query: makeDefinition().query,
        variables: { login: 'octocat', first: 5 }
      });
    });

    test('should send null for an omitted optional input', async () => {
      const handler = createRegistrar().createHandler(makeDefinition());

      await handler({ login: 'octocat' }, {});

      expect(JSON.parse(String(lastInit()?.body)).variables).toEqual({ login: 'octocat', first: null });
    });

    test('should send no Authorization header without token command or inbound credential', async () => {
      const handler = createRegistrar().createHandler(makeDefinition());

      await handler({ login: 'octocat' }, {});

      expect(lastInit()?.headers).toEqual({ 'Content-Type': 'application/json' });
    });

    test('should forward the inbound credential as a bearer token', async () => {
      const handler = createRegistrar().createHandler(makeDefinition());

      await handler({ login: 'octocat' }, { credential: 'inbound-token' });

      expect(lastInit()?.headers).toEqual({
        'Content-Type': 'application/json',
        Authorization: 'Bearer inbound-token'
      });
    });

    test('should forward a non-bearer inbound scheme unchanged', async () => {
      const handler = createRegistrar().createHandler(makeDefinition());

      await handler({ login: 'octocat' }, { credential: 'ghp_abc', scheme: 'token' });

      expect(lastInit()?.headers).toEqual({
        'Content-Type': 'application/json',
        Authorization: 'token ghp_abc'
      });
    });

    test('should return the response body exactly', async () => {
      const body = '{"data":{"user":{"id":"1"}}}';
      mockFetch.mockImplementation(async () => new Response(body, { status: 200 }));
      const handler = createRegistrar().createHandler(makeDefinition());

      const result = await handler({ login: 'octocat' }, {});

      expect(result).toEqual({ content: [{ type: 'text', text: body }] });
    });

    test('should pass GraphQL error envelopes through as successful results', async () => {
      const body = '{"errors":[{"message":"Could not resolve to a User"}]}';
      mockFetch.mockImplementation(async () => new Response(body, { status: 502 }));
      const handler = createRegistrar().createHandler(makeDefinition());

      const result = await handler({ login: 'ghost' }, {});

      expect(result.isError).toBeUndefined();
      expect(result.content).toEqual([{ type: 'text', text: body }]);
    });

    test('should report transport failures as error results', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));
      const handler = createRegistrar().createHandler(makeDefinition());

      const result = await handler({ login: 'octocat' }, {});

      expect(result).toEqual({
        content: [{ type: 'text', text: 'Error: execute request: TypeError: fetch failed' }],
        isError: true
      });
    });

    test('should re-indent JSON bodies for json output', async () => {
      mockFetch.mockImplementation(async () => new Response('{"data":{"id":"1"}}', { status: 200 }));
      const handler = createRegistrar().createHandler(makeDefinition({ output: 'json' }));

      const result = await handler({ login: 'octocat' }, {});

      expect(result.content).toEqual([{ type: 'text', text: '{\n  "data": {\n    "id": "1"\n  }\n}' }]);
    });
  });

  // The token command runs under /bin/sh
  if (process.platform !== 'win32') {
    describe('handler with token command', () => {
      test('should send the trimmed command output as a bearer token', async () => {
        const handler = createRegistrar(makeSettings({ tokenCommand: "printf '  abc123\\n'" })).createHandler(
          makeDefinition()
        );

        await handler({ login: 'octocat' }, {});

        expect(lastInit()?.headers).toEqual({
          'Content-Type': 'application/json',
          Authorization: 'Bearer abc123'
        });
      });

      test('should return the command stderr and skip GraphQL when the command fails', async () => {
        const handler = createRegistrar(makeSettings({ tokenCommand: 'echo denied >&2; exit 1' })).createHandler(
          makeDefinition()
        );

        const result = await handler({ login: 'octocat' }, {});

        expect(result).toEqual({
          content: [{ type: 'text', text: 'Error: token_command failed: exit status 1 Stderr: denied' }],
          isError: true
        });
        expect(mockFetch).not.toHaveBeenCalled();
      });
    });
  }
});

describe('formatOutput', () => {
  test('should leave raw bodies untouched', () => {
    expect(formatOutput('{"a":1}', 'raw')).toBe('{"a":1}');
  });

  test('should leave non-JSON bodies untouched for json output', () => {
    expect(formatOutput('<html>Bad Gateway</html>', 'json')).toBe('<html>Bad Gateway</html>');
  });
});
