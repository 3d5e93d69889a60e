import { describe, it, expect } from 'vitest';
import { TOOL_SPECS, getTools } from '../src/tools/registry.js';

describe('nuclide-query tool contracts', () => {
  it('all tools have valid names', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.name).toMatch(/^nuq_/);
    }
  });

  it('all tools have descriptions', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.description.length).toBeGreaterThan(10);
    }
  });

  it('getTools returns valid MCP tool definitions', () => {
    const tools = getTools('standard');
    const standardCount = TOOL_SPECS.filter(spec => spec.exposure === 'standard').length;
    expect(tools.length).toBe(standardCount);
    for (const tool of tools) {
      expect(tool.name).toBeDefined();
      expect(tool.description).toBeDefined();
      expect(tool.inputSchema.type).toBe('object');
      expect(tool.inputSchema.$schema).toBeUndefined();
    }
  });

  it('all tool names are unique', () => {
    const names = TOOL_SPECS.map(s => s.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('region queries are exposed only in full mode', () => {
    expect(getTools('standard').some(t => t.name === 'nuq_query_region')).toBe(false);
    expect(getTools('full').some(t => t.name === 'nuq_query_region')).toBe(true);
  });

  it('expected tool counts', () => {
    expect(TOOL_SPECS.length).toBe(10);
    expect(getTools('standard').length).toBe(9);
  });

  it('documents nuclide identity arguments', () => {
    const tool = getTools('standard').find(t => t.name === 'nuq_get_nuclide');
    const properties = tool?.inputSchema.properties;
    expect(properties).toBeDefined();
    expect(Object.keys(properties ?? {})).toEqual(['nuclide', 'Z', 'N', 'A', 'source', 'include_levels']);
  });
});
