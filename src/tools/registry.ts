import { z } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import type { Nuclide } from '../data/nuclide.js';
import type { NuclideQuery } from '../data/nuclideQuery.js';
import type { QValueKind, SeparationKind } from '../data/derived.js';
import type { Measured, TabulatedKey } from '../data/record.js';
import { formatNuclideName, parseNuclideString } from '../shared/elements.js';
import { invalidParams, notFound } from '../shared/index.js';
import {
  NUQ_INFO,
  NUQ_LIST_SOURCES,
  NUQ_GET_NUCLIDE,
  NUQ_GET_SEPARATION_ENERGY,
  NUQ_GET_Q_VALUE,
  NUQ_GET_DECAY,
  NUQ_QUERY_CHAIN,
  NUQ_QUERY_REGION,
  NUQ_QUERY_LIST,
  NUQ_COMPARE_SOURCES,
  SERVER_NAME,
  SERVER_VERSION,
} from '../constants.js';

export type ToolExposureMode = 'standard' | 'full';
export type ToolExposure = 'standard' | 'full';

export interface ToolHandlerContext {
  query: NuclideQuery;
  /** Source used when a call names none. */
  defaultSource: string;
}

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler(params: z.output<TSchema>, ctx: ToolHandlerContext): Promise<unknown>;
}

function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec {
  return spec;
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

// ── Shared argument handling ──────────────────────────────────────────────

const SourceParam = z.string().min(1).optional()
  .describe('Data source: experiment (aliases exp, nndc), SKMS, UNEDF0, UNEDF1, SLY4, SKP, SV-MIN. Default: experiment');

const TargetShape = {
  nuclide: z.string().min(1).optional().describe('Nuclide as symbol and mass number, e.g. "Fe56", "fe-56", "56Fe"'),
  Z: z.number().int().min(0).optional().describe('Proton number'),
  N: z.number().int().min(0).optional().describe('Neutron number'),
  A: z.number().int().min(1).optional().describe('Mass number (alternative to N)'),
  source: SourceParam,
};

interface TargetParams {
  nuclide?: string;
  Z?: number;
  N?: number;
  A?: number;
  source?: string;
}

const TARGET_REQUIRED = { message: 'Provide nuclide, or Z together with N or A' };

function hasTarget(v: TargetParams): boolean {
  return v.nuclide !== undefined || (v.Z !== undefined && (v.N !== undefined || v.A !== undefined));
}

/** (Z, N) named by the arguments, without touching any source. */
function targetIdentity(params: TargetParams): { Z: number; N: number } {
  if (params.nuclide !== undefined) {
    const parsed = parseNuclideString(params.nuclide);
    const mismatches = (['Z', 'N', 'A'] as const).filter(key => params[key] !== undefined && params[key] !== parsed[key]);
    if (mismatches.length > 0) {
      const given = mismatches.map(key => `${key}=${params[key]}`).join(', ');
      throw invalidParams(`Conflicting parameters: nuclide ${params.nuclide} has Z=${parsed.Z}, N=${parsed.N}, A=${parsed.A}, but ${given} was provided.`);
    }
    return { Z: parsed.Z, N: parsed.N };
  }
  if (params.Z !== undefined && params.N !== undefined) {
    if (params.A !== undefined && params.A !== params.Z + params.N) {
      throw invalidParams(`Conflicting parameters: Z=${params.Z}, N=${params.N} gives A=${params.Z + params.N}, but A=${params.A} was provided.`);
    }
    return { Z: params.Z, N: params.N };
  }
  if (params.Z !== undefined && params.A !== undefined) {
    if (params.A < params.Z) {
      throw invalidParams(`Mass number A=${params.A} is smaller than Z=${params.Z}`);
    }
    return { Z: params.Z, N: params.A - params.Z };
  }
  throw invalidParams(TARGET_REQUIRED.message);
}

async function resolveTarget(params: TargetParams, ctx: ToolHandlerContext): Promise<Nuclide> {
  const { Z, N } = targetIdentity(params);
  const nuclide = await ctx.query.resolve(Z, N, params.source ?? ctx.defaultSource);
  if (!nuclide.exists) {
    throw notFound(`${nuclide.name} (Z=${nuclide.Z}, N=${nuclide.N}) not found in source ${nuclide.source}`, {
      Z: nuclide.Z,
      N: nuclide.N,
      source: nuclide.source,
    });
  }
  return nuclide;
}

function identity(n: Nuclide): { Z: number; N: number; A: number; name: string; source: string } {
  return { Z: n.Z, N: n.N, A: n.A, name: n.name, source: n.source };
}

function chainRow(n: Nuclide) {
  return {
    Z: n.Z,
    N: n.N,
    A: n.A,
    name: n.name,
    BE: n.BE,
    BE_A: n.BE_A,
    Sn: n.Sn,
    Sp: n.Sp,
    S2n: n.S2n,
    S2p: n.S2p,
    E_2plus: n.E_2plus,
  };
}

const SEPARATION_KINDS: readonly SeparationKind[] = ['Sn', 'Sp', 'S2n', 'S2p'];
const Q_VALUE_KINDS: readonly QValueKind[] = ['alpha', 'betaMinus', 'EC'];
const Q_VALUE_TABULATED: Record<QValueKind, TabulatedKey> = {
  alpha: 'Qalpha',
  betaMinus: 'QbetaMinus',
  EC: 'QEC',
};

// ── Tool Schemas ──────────────────────────────────────────────────────────

const NuqInfoSchema = z.object({});

const NuqListSourcesSchema = z.object({});

const NuqGetNuclideSchema = z.object({
  ...TargetShape,
  include_levels: z.boolean().optional().default(false).describe('Include every level (experiment only)'),
}).refine(hasTarget, TARGET_REQUIRED);

const NuqGetSeparationEnergySchema = z.object({
  ...TargetShape,
  type: z.enum(['Sn', 'Sp', 'S2n', 'S2p']).optional().describe('Separation energy type (omit for all)'),
}).refine(hasTarget, TARGET_REQUIRED);

const NuqGetQValueSchema = z.object({
  ...TargetShape,
  type: z.enum(['alpha', 'betaMinus', 'EC']).optional().describe('Q-value type (omit for all)'),
}).refine(hasTarget, TARGET_REQUIRED);

const NuqGetDecaySchema = z.object({
  ...TargetShape,
  include_chain: z.boolean().optional().default(false).describe('Follow the dominant decay mode to the end of the chain'),
}).refine(hasTarget, TARGET_REQUIRED);

const NuqQueryChainSchema = z.object({
  fixed: z.enum(['Z', 'N']).describe('Z for an isotope chain, N for an isotone chain'),
  value: z.number().int().min(0).describe('Value of the fixed number'),
  min: z.number().int().min(0).optional().describe('Lower bound of the ranging number (inclusive)'),
  max: z.number().int().min(0).optional().describe('Upper bound of the ranging number (inclusive)'),
  source: SourceParam,
});

const NuqQueryRegionSchema = z.object({
  Z_min: z.number().int().min(0).describe('Minimum proton number'),
  Z_max: z.number().int().min(0).describe('Maximum proton number'),
  N_min: z.number().int().min(0).describe('Minimum neutron number'),
  N_max: z.number().int().min(0).describe('Maximum neutron number'),
  source: SourceParam,
  limit: z.number().int().min(1).max(2000).optional().default(500).describe('Maximum results'),
}).refine(
  v => v.Z_min <= v.Z_max && v.N_min <= v.N_max,
  { message: 'Z_min must be <= Z_max and N_min must be <= N_max' }
);

const NuqQueryListSchema = z.object({
  nuclides: z.array(z.union([
    z.string().min(1),
    z.object({ Z: z.number().int().min(0), N: z.number().int().min(0) }),
  ])).min(1).max(500).describe('Nuclides as "Fe56" strings or {Z, N} objects'),
  source: SourceParam,
});

const NuqCompareSourcesSchema = z.object({
  ...TargetShape,
  sources: z.array(z.string().min(1)).min(1).optional().describe('Sources to compare (omit for all)'),
}).refine(hasTarget, TARGET_REQUIRED);

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: NUQ_INFO,
    description: 'Return server metadata: data directory, default source, and per-source load status and record counts.',
    exposure: 'standard',
    zodSchema: NuqInfoSchema,
    handler: async (_params, ctx) => {
      return {
        server: SERVER_NAME,
        version: SERVER_VERSION,
        data_dir: ctx.query.registry.dataDir,
        default_source: ctx.defaultSource,
        sources: ctx.query.registry.status(),
      };
    },
  }),
  defineTool({
    name: NUQ_LIST_SOURCES,
    description: 'List the known data sources (experimental and theoretical) and whether each file is present.',
    exposure: 'standard',
    zodSchema: NuqListSourcesSchema,
    handler: async (_params, ctx) => {
      const registry = ctx.query.registry;
      return ctx.query.listSources().map(info => ({
        ...info,
        available: registry.isAvailable(registry.resolve(info.name)),
      }));
    },
  }),
  defineTool({
    name: NUQ_GET_NUCLIDE,
    description: 'Get every property of one nuclide from one source: binding energy, separation energies, Q-values, excited states, decay, fission yields. Energies in MeV; absent values are null.',
    exposure: 'standard',
    zodSchema: NuqGetNuclideSchema,
    handler: async (params, ctx) => {
      const nuclide = await resolveTarget(params, ctx);
      const summary = nuclide.summary();
      return params.include_levels ? { ...summary, levels: nuclide.levels } : summary;
    },
  }),
  defineTool({
    name: NUQ_GET_SEPARATION_ENERGY,
    description: 'Get nucleon separation energies Sn, Sp, S2n, S2p (MeV), computed from binding energies, alongside the values the source tabulates.',
    exposure: 'standard',
    zodSchema: NuqGetSeparationEnergySchema,
    handler: async (params, ctx) => {
      const nuclide = await resolveTarget(params, ctx);
      const kinds = params.type ? [params.type] : SEPARATION_KINDS;
      const derived: Partial<Record<SeparationKind, number | null>> = {};
      const tabulated: Partial<Record<SeparationKind, Measured | null>> = {};
      const all = nuclide.separationEnergies();
      for (const kind of kinds) {
        derived[kind] = all[kind];
        tabulated[kind] = nuclide.tabulated(kind);
      }
      return { ...identity(nuclide), unit: 'MeV', derived, tabulated };
    },
  }),
  defineTool({
    name: NUQ_GET_Q_VALUE,
    description: 'Get decay Q-values for alpha, beta-minus and electron capture (MeV), computed from parent and daughter binding energies, alongside tabulated values.',
    exposure: 'standard',
    zodSchema: NuqGetQValueSchema,
    handler: async (params, ctx) => {
      const nuclide = await resolveTarget(params, ctx);
      const kinds = params.type ? [params.type] : Q_VALUE_KINDS;
      const derived: Partial<Record<QValueKind, number | null>> = {};
      const tabulated: Partial<Record<QValueKind, Measured | null>> = {};
      const all = nuclide.qValues();
      for (const kind of kinds) {
        derived[kind] = all[kind];
        tabulated[kind] = nuclide.tabulated(Q_VALUE_TABULATED[kind]);
      }
      return { ...identity(nuclide), unit: 'MeV', derived, tabulated };
    },
  }),
  defineTool({
    name: NUQ_GET_DECAY,
    description: 'Get ground-state half-life, spin-parity and decay modes (experiment only; null for theoretical sources), optionally with the decay chain.',
    exposure: 'standard',
    zodSchema: NuqGetDecaySchema,
    handler: async (params, ctx) => {
      const nuclide = await resolveTarget(params, ctx);
      const result = {
        ...identity(nuclide),
        supports_decay: nuclide.supportsDecay,
        half_life: nuclide.halfLife,
        half_life_seconds: nuclide.halfLifeSeconds,
        spin_parity: nuclide.spinParity,
        is_stable: nuclide.isStable,
        modes: nuclide.decayModes,
        predicted_modes: nuclide.predictedDecayModes,
      };
      if (!params.include_chain) return result;

      const chain = await ctx.query.decayChain(nuclide.Z, nuclide.N, nuclide.source);
      return {
        ...result,
        chain: {
          end: chain.end,
          steps: chain.steps.map(step => ({
            name: step.nuclide.name,
            Z: step.nuclide.Z,
            N: step.nuclide.N,
            mode: step.mode,
            branching: step.branching,
          })),
        },
      };
    },
  }),
  defineTool({
    name: NUQ_QUERY_CHAIN,
    description: 'Isotope chain (fixed Z) or isotone chain (fixed N) over a range of the other number, ascending. Nuclides missing from the source are omitted.',
    exposure: 'standard',
    zodSchema: NuqQueryChainSchema,
    handler: async (params, ctx) => {
      const source = params.source ?? ctx.defaultSource;
      const nuclides = await ctx.query.queryRange(
        { fixed: params.fixed, value: params.value },
        params.min ?? 0,
        params.max ?? Number.MAX_SAFE_INTEGER,
        source,
      );
      return { count: nuclides.length, nuclides: nuclides.map(chainRow) };
    },
  }),
  defineTool({
    name: NUQ_QUERY_REGION,
    description: 'All nuclides of a source inside a Z/N rectangle, ordered by Z then N.',
    exposure: 'full',
    zodSchema: NuqQueryRegionSchema,
    handler: async (params, ctx) => {
      const nuclides = await ctx.query.queryRegion(
        { Zmin: params.Z_min, Zmax: params.Z_max, Nmin: params.N_min, Nmax: params.N_max },
        params.source ?? ctx.defaultSource,
      );
      return {
        total: nuclides.length,
        truncated: nuclides.length > params.limit,
        nuclides: nuclides.slice(0, params.limit).map(chainRow),
      };
    },
  }),
  defineTool({
    name: NUQ_QUERY_LIST,
    description: 'Look up a list of nuclides in one source; entries missing from the source are listed separately.',
    exposure: 'standard',
    zodSchema: NuqQueryListSchema,
    handler: async (params, ctx) => {
      const found = await ctx.query.queryList(params.nuclides, params.source ?? ctx.defaultSource);
      return {
        count: found.length,
        missing: params.nuclides.length - found.length,
        nuclides: found.map(chainRow),
      };
    },
  }),
  defineTool({
    name: NUQ_COMPARE_SOURCES,
    description: 'Compare one nuclide across sources: binding energy, separation energies and alpha Q-value per source, or the reason a source is unusable.',
    exposure: 'standard',
    zodSchema: NuqCompareSourcesSchema,
    handler: async (params, ctx) => {
      const { Z, N } = targetIdentity(params);
      const comparisons = await ctx.query.compareSources(Z, N, params.sources);
      return {
        Z,
        N,
        A: Z + N,
        name: formatNuclideName(Z, Z + N),
        sources: comparisons.map(entry => {
          if (entry.error !== null) {
            return { source: entry.source, exists: false, error: { code: entry.error.code, message: entry.error.message } };
          }
          const n = entry.nuclide;
          if (!n.exists) return { source: entry.source, exists: false };
          return {
            source: entry.source,
            exists: true,
            BE: n.BE,
            BE_A: n.BE_A,
            Sn: n.Sn,
            Sp: n.Sp,
            S2n: n.S2n,
            S2p: n.S2p,
            Q_alpha: n.Q_alpha,
          };
        }),
      };
    },
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}
