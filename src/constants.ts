export const NUQ_INFO = 'nuq_info' as const;
export const NUQ_LIST_SOURCES = 'nuq_list_sources' as const;
export const NUQ_GET_NUCLIDE = 'nuq_get_nuclide' as const;
export const NUQ_GET_SEPARATION_ENERGY = 'nuq_get_separation_energy' as const;
export const NUQ_GET_Q_VALUE = 'nuq_get_q_value' as const;
export const NUQ_GET_DECAY = 'nuq_get_decay' as const;
export const NUQ_QUERY_CHAIN = 'nuq_query_chain' as const;
export const NUQ_QUERY_REGION = 'nuq_query_region' as const;
export const NUQ_QUERY_LIST = 'nuq_query_list' as const;
export const NUQ_COMPARE_SOURCES = 'nuq_compare_sources' as const;

export type NuqToolName =
  | typeof NUQ_INFO
  | typeof NUQ_LIST_SOURCES
  | typeof NUQ_GET_NUCLIDE
  | typeof NUQ_GET_SEPARATION_ENERGY
  | typeof NUQ_GET_Q_VALUE
  | typeof NUQ_GET_DECAY
  | typeof NUQ_QUERY_CHAIN
  | typeof NUQ_QUERY_REGION
  | typeof NUQ_QUERY_LIST
  | typeof NUQ_COMPARE_SOURCES;

export const SERVER_NAME = 'nuclide-query-mcp';
export const SERVER_VERSION = '0.1.0';
