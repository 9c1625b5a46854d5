export const SQL_SEPARATORS = Object.freeze({
  FIELD_LIST: ', ',
  CONDITION_AND: ' AND ',
  CONDITION_OR: ' OR ',
  ORDER_BY: ', ',
} as const)

export const ALIAS_FORBIDDEN_KEYWORDS = new Set([
  'select',
  'from',
  'where',
  'having',
  'order',
  'group',
  'limit',
  'offset',
  'join',
  'inner',
  'left',
  'right',
  'outer',
  'cross',
  'full',
  'and',
  'or',
  'not',
  'by',
  'as',
  'on',
  'union',
  'intersect',
  'except',
  'case',
  'when',
  'then',
  'else',
  'end',
  'over',
  'partition',
])

export const SQL_KEYWORDS = new Set([
  ...ALIAS_FORBIDDEN_KEYWORDS,
  'user',
  'users',
  'table',
  'column',
  'index',
  'values',
  'in',
  'like',
  'between',
  'is',
  'exists',
  'null',
  'true',
  'false',
  'all',
  'any',
  'some',
  'distinct',
  'count',
  'sum',
  'avg',
  'min',
  'max',
])

export const EMPTY_WHERE_CLAUSE = '0=1' as const

export const SQL_TEMPLATES = Object.freeze({
  PUBLIC_SCHEMA: 'public',
  WHERE: 'WHERE',
  SELECT: 'SELECT',
  SELECT_DISTINCT: 'SELECT DISTINCT',
  FROM: 'FROM',
  INNER_JOIN: 'INNER JOIN',
  ORDER_BY: 'ORDER BY',
  GROUP_BY: 'GROUP BY',
  LIMIT: 'LIMIT',
  OFFSET: 'OFFSET',
  COUNT_ALL: 'COUNT(*)',
  IS_NULL: 'IS NULL',
  IS_NOT_NULL: 'IS NOT NULL',
  LIKE: 'LIKE',
  EXISTS: 'EXISTS',
  NOT_EXISTS: 'NOT EXISTS',
  NOT: 'NOT',
} as const)

export const RESULT_COLUMNS = Object.freeze({
  KEY: 'k',
  VALUE: 'v',
  ROW_KEY: '__k',
  ROW_VALUE: '__v',
  ROW_NUMBER: '__rn',
  ROW_PK_PREFIX: '__pk',
  ROWS: '__rows',
  PAIRS: '__pairs',
} as const)

export const Ops = Object.freeze({
  EQUALS: 'equals',
  NOT: 'not',
  GT: 'gt',
  GTE: 'gte',
  LT: 'lt',
  LTE: 'lte',
  IN: 'in',
  NOT_IN: 'notIn',
  CONTAINS: 'contains',
  STARTS_WITH: 'startsWith',
  ENDS_WITH: 'endsWith',
} as const)

export const LogicalOps = Object.freeze({
  AND: 'AND',
  OR: 'OR',
  NOT: 'NOT',
} as const)

export const RelationFilters = Object.freeze({
  SOME: 'some',
  EVERY: 'every',
  NONE: 'none',
  IS: 'is',
  IS_NOT: 'isNot',
} as const)

export const Wildcards: Readonly<Record<string, (v: string) => string>> =
  Object.freeze({
    [Ops.CONTAINS]: (v: string) => `%${v}%`,
    [Ops.STARTS_WITH]: (v: string) => `${v}%`,
    [Ops.ENDS_WITH]: (v: string) => `%${v}`,
  })

export const REGEX_CACHE = {
  PARAM_PLACEHOLDER: /\$(\d+)/g,
  VALID_IDENTIFIER: /^[a-z_][a-z0-9_]*$/,
  NUMERIC_STRING: /^-?\d+(\.\d+)?$/,
} as const

export const LIMITS = Object.freeze({
  MAX_QUERY_DEPTH: 50,
  MAX_ARRAY_SIZE: 10000,
  SQLITE_INLINE_IN: 30,
  DEFAULT_BATCH_SIZE: 1000,
} as const)
