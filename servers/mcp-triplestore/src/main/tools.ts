import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { TripleFormatError, requireArgument } from 'triple-core';
import type { Triple } from 'triple-core';
import type { TripleStore } from '../triple-store.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

type ToolArguments = Record<string, unknown>;

const queryInputSchema: Tool['inputSchema'] = {
  type: 'object',
  properties: {
    query: {
      type: 'string',
      description:
        'Clauses of three tokens separated by " . ", e.g. "?who likes ?what . ?what is sweet". Tokens starting with ? are variables.',
    },
  },
  required: ['query'],
};

export const TOOLS: Tool[] = [
  {
    name: 'add_fact',
    description: 'Store a single fact (id, predicate, object). Variables are not allowed.',
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'string', description: 'Subject of the fact' },
        predicate: { type: 'string', description: 'Relation between id and object' },
        object: { type: 'string', description: 'Value of the fact' },
      },
      required: ['id', 'predicate', 'object'],
    },
  },
  {
    name: 'query_facts',
    description:
      'Find every assignment of the query variables that satisfies all clauses of the query.',
    inputSchema: queryInputSchema,
  },
  {
    name: 'remove_facts',
    description: 'Remove every fact matched by the query and return the removed facts.',
    inputSchema: queryInputSchema,
  },
  {
    name: 'list_facts',
    description: 'List every stored fact.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'count_facts',
    description: 'Count the stored facts.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'clear_facts',
    description: 'Remove every stored fact.',
    inputSchema: { type: 'object', properties: {} },
  },
];

function stringArgument(args: ToolArguments, key: string): string {
  const value = args[key];
  requireArgument(value, key);
  if (typeof value !== 'string') {
    throw new TripleFormatError(`Argument ${key} must be a string`);
  }
  return value;
}

function factToJson(fact: Triple) {
  return { id: fact.id, predicate: fact.predicate, object: fact.object };
}

function textResult(result: unknown): ToolResult {
  return {
    content: [
      {
        type: 'text',
        text: typeof result === 'string' ? result : JSON.stringify(result, null, 2),
      },
    ],
  };
}

function errorResult(action: string, error: unknown): ToolResult {
  const message = error instanceof Error ? error.message : String(error);
  return { ...textResult(`Error ${action}: ${message}`), isError: true };
}

/**
 * Run one tool against the store. Failures of a known tool come back as an
 * error result; an unknown tool name throws.
 */
export async function handleToolCall(
  store: TripleStore,
  name: string,
  args: ToolArguments = {}
): Promise<ToolResult> {
  switch (name) {
    case 'add_fact':
      try {
        const added = await store.add(
          stringArgument(args, 'id'),
          stringArgument(args, 'predicate'),
          stringArgument(args, 'object')
        );
        return textResult({ added });
      } catch (error) {
        return errorResult('adding fact', error);
      }

    case 'query_facts':
      try {
        const answers = await store.query(stringArgument(args, 'query'));
        return textResult({
          count: answers.length,
          answers: answers.map((bindings) => bindings.toObject()),
        });
      } catch (error) {
        return errorResult('querying facts', error);
      }

    case 'remove_facts':
      try {
        const removed = await store.remove(stringArgument(args, 'query'));
        return textResult({ removed: removed.length, facts: removed.map(factToJson) });
      } catch (error) {
        return errorResult('removing facts', error);
      }

    case 'list_facts':
      try {
        const facts = await store.all();
        return textResult({ count: facts.length, facts: facts.map(factToJson) });
      } catch (error) {
        return errorResult('listing facts', error);
      }

    case 'count_facts':
      try {
        return textResult({ count: await store.count() });
      } catch (error) {
        return errorResult('counting facts', error);
      }

    case 'clear_facts':
      try {
        return textResult({ cleared: await store.clear() });
      } catch (error) {
        return errorResult('clearing facts', error);
      }

    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}

export function setupTools(server: Server, store: TripleStore): void {
  console.error('Setting up triple store tools');

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(store, name, args);
  });

  console.error('All tools have been registered successfully');
}
