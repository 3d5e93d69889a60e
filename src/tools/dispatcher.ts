import { ZodError } from 'zod';
import { NuclideQuery } from '../data/nuclideQuery.js';
import { getDefaultRegistry } from '../data/registry.js';
import { resolveDefaultSource } from '../shared/config.js';
import { invalidParams, NuclideQueryError } from '../shared/index.js';
import type { ToolExposureMode, ToolHandlerContext } from './registry.js';
import { getToolSpec, isToolExposed } from './registry.js';

/** Overrides for the handler context; omitted fields use the process-wide query. */
export type ToolCallContext = Partial<ToolHandlerContext>;

let defaultContext: ToolHandlerContext | null = null;

function resolveContext(ctx: ToolCallContext | undefined): ToolHandlerContext {
  if (ctx?.query) {
    return { query: ctx.query, defaultSource: ctx.defaultSource ?? ctx.query.defaultSource };
  }
  if (!defaultContext) {
    const defaultSource = resolveDefaultSource();
    defaultContext = { query: new NuclideQuery(getDefaultRegistry(), defaultSource), defaultSource };
  }
  return ctx?.defaultSource ? { ...defaultContext, defaultSource: ctx.defaultSource } : defaultContext;
}

function parseToolArgs<T>(toolName: string, schema: { parse: (input: unknown) => T }, args: unknown): T {
  try {
    return schema.parse(args);
  } catch (err) {
    if (err instanceof ZodError) {
      throw invalidParams(`Invalid parameters for ${toolName}`, {
        issues: err.issues,
      });
    }
    throw err;
  }
}

type ToolResult = { content: { type: 'text'; text: string }[]; isError?: boolean };

interface ToolErrorPayload {
  error: { code: string; message: string; data?: Record<string, unknown> };
}

function errorPayload(err: unknown): ToolErrorPayload {
  if (!(err instanceof NuclideQueryError)) {
    return { error: { code: 'INTERNAL_ERROR', message: err instanceof Error ? err.message : String(err) } };
  }
  const hasData = err.data !== undefined && Object.keys(err.data).length > 0;
  return { error: { code: err.code, message: err.message, ...(hasData ? { data: err.data } : {}) } };
}

function textResult(value: unknown, isError = false): ToolResult {
  const content = [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }];
  return isError ? { content, isError } : { content };
}

export async function handleToolCall(
  name: string,
  args: Record<string, unknown>,
  mode: ToolExposureMode = 'standard',
  ctx?: ToolCallContext
): Promise<ToolResult> {
  try {
    const spec = getToolSpec(name);
    if (!spec) {
      throw invalidParams(`Unknown tool: ${name}`);
    }
    if (!isToolExposed(spec, mode)) {
      throw invalidParams(`Tool not exposed in ${mode} mode: ${name}`);
    }

    const parsedArgs = parseToolArgs(name, spec.zodSchema, args);
    const result = await spec.handler(parsedArgs, resolveContext(ctx));
    return textResult(result);
  } catch (err) {
    return textResult(errorPayload(err), true);
  }
}
