/**
 * MCP Server Implementation for the Reference Store
 *
 * This module exposes the {@link ReferenceStoreContract} as MCP tools so that
 * tool-invoking clients can save, read and compose references.
 *
 * **Architecture:**
 * - Implements 7 MCP tools, one per store operation
 * - Uses stdio transport for MCP communication
 * - Delegates all persistence to the injected store
 * - Validates tool arguments with zod before they reach the store
 *
 * **Error Handling:**
 * - Store failures (invalid name, not found, I/O, format) are returned with
 *   their code and details so callers can guide the user
 * - System errors are sanitized to "Internal server error"
 *
 * @module server
 * @see {@link ReferenceServer} for main server class
 * @see {@link FileSystemReferenceStore} for persistence layer
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ValidationError, isUserError } from './errors.js';
import type { ReferenceStoreContract } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Load name and version from package.json.
 *
 * Looks beside the sources (`src/`) and beside the build output
 * (`dist/src/`), falling back to hardcoded values.
 */
function loadVersionInfo(): { version: string; name: string } {
  const candidates = [
    join(__dirname, '..', 'package.json'),
    join(__dirname, '..', '..', 'package.json')
  ];

  for (const candidate of candidates) {
    if (!existsSync(candidate)) {
      continue;
    }
    try {
      const packageJson: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      const parsed = z.object({ name: z.string(), version: z.string() }).safeParse(packageJson);
      if (parsed.success) {
        return parsed.data;
      }
    } catch (err: unknown) {
      console.error(`Ignoring unreadable ${candidate}:`, err);
    }
  }

  return { version: '0.1.0', name: 'refstore-mcp' };
}

const versionInfo = loadVersionInfo();

// Tool argument schemas

const RefArgs = z.object({
  ref: z.string()
});

const CreateRefArgs = z.object({
  ref: z.string(),
  content: z.string(),
  metadata: z.record(z.unknown()).optional()
});

const ListRefsArgs = z.object({
  prefix: z.string().optional()
});

const CleanupRefsArgs = z.object({
  prefix: z.string(),
  max_age_seconds: z.number().nonnegative().finite()
});

const ComposeInputArgs = z.object({
  ref: z.string().optional(),
  refs: z.array(z.string()).optional(),
  prompt_ref: z.string().optional(),
  prompt: z.string().optional()
});

/**
 * Validates tool arguments.
 *
 * @throws {ValidationError} INVALID_ARGUMENTS with one entry per zod issue
 */
function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown, toolName: string): T {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      argument: issue.path.join('.'),
      message: issue.message
    }));
    throw new ValidationError(
      `Invalid arguments for ${toolName}: ${issues.map(i => `${i.argument || '(root)'} ${i.message}`).join('; ')}`,
      'INVALID_ARGUMENTS',
      { tool: toolName, issues }
    );
  }
  return result.data;
}

function jsonResponse(payload: unknown) {
  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify(payload, null, 2)
    }]
  };
}

const TOOLS: Tool[] = [
  {
    name: 'create_ref',
    description: 'Create or overwrite a reference. The first write of a name produces version 1; each later write increments the version.',
    inputSchema: {
      type: 'object',
      properties: {
        ref: {
          type: 'string',
          description: 'Reference name, segments separated by "/" (e.g., "prompts/greeting")'
        },
        content: {
          type: 'string',
          description: 'Text to store (may be empty)'
        },
        metadata: {
          type: 'object',
          description: 'Optional attributes stored alongside the content (tags, source tool, ...)'
        }
      },
      required: ['ref', 'content']
    }
  },
  {
    name: 'read_ref',
    description: 'Read a reference with its metadata, version and timestamps.',
    inputSchema: {
      type: 'object',
      properties: {
        ref: {
          type: 'string',
          description: 'Reference name'
        }
      },
      required: ['ref']
    }
  },
  {
    name: 'update_ref',
    description: 'Replace the content of an existing reference. Fails if the reference does not exist; use create_ref to create it.',
    inputSchema: {
      type: 'object',
      properties: {
        ref: {
          type: 'string',
          description: 'Reference name'
        },
        content: {
          type: 'string',
          description: 'New content'
        },
        metadata: {
          type: 'object',
          description: 'Replacement metadata (previous metadata is kept when omitted)'
        }
      },
      required: ['ref', 'content']
    }
  },
  {
    name: 'delete_ref',
    description: 'Delete a reference. Its version history is discarded; recreating it starts again at version 1.',
    inputSchema: {
      type: 'object',
      properties: {
        ref: {
          type: 'string',
          description: 'Reference name'
        }
      },
      required: ['ref']
    }
  },
  {
    name: 'list_refs',
    description: 'List reference names, sorted. Use a prefix such as "pipeline/" to list one group.',
    inputSchema: {
      type: 'object',
      properties: {
        prefix: {
          type: 'string',
          description: 'Only names starting with this prefix'
        }
      }
    }
  },
  {
    name: 'cleanup_refs',
    description: 'Remove references under a prefix that were last written longer ago than max_age_seconds.',
    inputSchema: {
      type: 'object',
      properties: {
        prefix: {
          type: 'string',
          description: 'Name prefix to sweep (e.g., "pipeline/")'
        },
        max_age_seconds: {
          type: 'number',
          description: 'Age threshold in seconds (e.g., 86400 for one day)'
        }
      },
      required: ['prefix', 'max_age_seconds']
    }
  },
  {
    name: 'compose_input',
    description: 'Build input text from references. Priority: ref > refs (joined with "---") > prompt_ref > prompt.',
    inputSchema: {
      type: 'object',
      properties: {
        ref: {
          type: 'string',
          description: 'Single reference used as the whole input'
        },
        refs: {
          type: 'array',
          items: { type: 'string' },
          description: 'References to concatenate; missing ones are skipped'
        },
        prompt_ref: {
          type: 'string',
          description: 'Reference holding a prompt'
        },
        prompt: {
          type: 'string',
          description: 'Literal prompt text'
        }
      }
    }
  }
];

/**
 * MCP Server for the Reference Store
 *
 * **Architecture:**
 * - Uses MCP SDK's {@link Server} for protocol handling
 * - Delegates all persistence to the injected {@link ReferenceStoreContract}
 * - Communicates via stdio transport (stdin/stdout) in production, or any
 *   transport passed to {@link connect}
 *
 * @example
 * // Create and run the server
 * const store = new FileSystemReferenceStore('/Users/alice/.refstore');
 * await store.initialize();
 * const server = new ReferenceServer(store);
 * await server.run();
 */
export class ReferenceServer {
  /** MCP SDK server instance handling protocol communication */
  private server: Server;

  /** Reference store handling all persistence */
  private store: ReferenceStoreContract;

  constructor(store: ReferenceStoreContract) {
    this.store = store;

    this.server = new Server(
      {
        name: versionInfo.name,
        version: versionInfo.version
      },
      {
        capabilities: {
          tools: {}
        }
      }
    );

    this.setupHandlers();
  }

  /**
   * Centralized error handler that preserves UserError metadata and sanitizes system errors.
   *
   * **Error Flow:**
   * 1. Log full error server-side for debugging
   * 2. If UserError: return structured JSON with message, code, details
   * 3. If system error: return sanitized generic error
   */
  private formatError(error: unknown, toolName: string) {
    console.error(`Tool error [${toolName}]:`, error);

    if (isUserError(error)) {
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            error: error.message,
            code: error.code,
            details: error.details
          })
        }],
        isError: true
      };
    }

    return {
      content: [{
        type: 'text' as const,
        text: JSON.stringify({
          error: 'Internal server error',
          code: 'INTERNAL_ERROR'
        })
      }],
      isError: true
    };
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: TOOLS };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        switch (name) {
          case 'create_ref': {
            const { ref, content, metadata } = parseArgs(CreateRefArgs, args, name);
            const result = await this.store.createOrUpdate(ref, content, metadata);
            return jsonResponse({
              success: true,
              ...result,
              message: result.version === 1 ? 'Reference created.' : 'Reference updated.'
            });
          }

          case 'read_ref': {
            const { ref } = parseArgs(RefArgs, args, name);
            const snapshot = await this.store.read(ref);
            return jsonResponse(snapshot);
          }

          case 'update_ref': {
            const { ref, content, metadata } = parseArgs(CreateRefArgs, args, name);
            const result = await this.store.update(ref, content, metadata);
            return jsonResponse({ success: true, ...result });
          }

          case 'delete_ref': {
            const { ref } = parseArgs(RefArgs, args, name);
            const result = await this.store.delete(ref);
            return jsonResponse(result);
          }

          case 'list_refs': {
            const { prefix } = parseArgs(ListRefsArgs, args, name);
            const refs = await this.store.list(prefix);
            return jsonResponse({
              refs,
              count: refs.length,
              ...(prefix !== undefined ? { prefix } : {})
            });
          }

          case 'cleanup_refs': {
            const { prefix, max_age_seconds } = parseArgs(CleanupRefsArgs, args, name);
            const result = await this.store.cleanup(prefix, max_age_seconds);
            return jsonResponse({ ...result, prefix });
          }

          case 'compose_input': {
            const sources = parseArgs(ComposeInputArgs, args, name);
            const input = await this.store.composeInput({
              ref: sources.ref,
              refs: sources.refs,
              promptRef: sources.prompt_ref,
              prompt: sources.prompt
            });
            return jsonResponse({ input, length: input.length });
          }

          default:
            return {
              content: [{
                type: 'text' as const,
                text: JSON.stringify({ error: `Unknown tool: ${name}` })
              }],
              isError: true
            };
        }
      } catch (error: unknown) {
        return this.formatError(error, name);
      }
    });
  }

  /**
   * Registers process-level handlers for graceful shutdown.
   *
   * **Handlers Registered:**
   * - `stdin.end` / `stdin.close`: client disconnected (graceful exit)
   * - `SIGTERM` / `SIGINT`: termination signals (graceful shutdown)
   * - `uncaughtException` / `unhandledRejection`: log and exit with error code
   */
  private setupProcessHandlers(): void {
    process.stdin.on('end', () => {
      console.error('stdin closed - client disconnected, exiting...');
      process.exit(0);
    });

    process.stdin.on('close', () => {
      console.error('stdin stream closed - client disconnected, exiting...');
      process.exit(0);
    });

    process.on('SIGTERM', () => {
      console.error('Received SIGTERM, shutting down gracefully...');
      process.exit(0);
    });

    process.on('SIGINT', () => {
      console.error('Received SIGINT, shutting down gracefully...');
      process.exit(0);
    });

    process.on('uncaughtException', (error) => {
      console.error('Uncaught exception:', error);
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('Unhandled rejection:', reason);
      process.exit(1);
    });
  }

  /**
   * Connects the server to an arbitrary transport (used by tests with an
   * in-memory transport pair).
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  /**
   * Start the MCP server on stdio.
   *
   * stdout carries the protocol; all logging goes to stderr.
   *
   * @throws {Error} If the MCP connection fails
   */
  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.connect(transport);

    this.setupProcessHandlers();

    console.error(`${versionInfo.name} ${versionInfo.version} running on stdio`);
  }
}
