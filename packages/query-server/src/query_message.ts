import { z } from 'zod';
import type { QueryDescriptor, QueryFlag, QueryType } from '@tagstream/shared';
import { QueryError } from './errors';
import type { KeyOptions } from './location';

const QUERY_FLAGS = [
  'silent',
  'match-regex',
  'filter-system-includes',
  'containing-function',
  'cursor-kind',
  'display-name',
  'absolute-path',
] as const satisfies readonly QueryFlag[];

const QUERY_TYPES = ['find-symbols', 'list-symbols', 'symbol-info'] as const satisfies readonly QueryType[];

const bound = z.number().int().min(-1).default(-1);

export const querySchema = z
  .object({
    type: z.enum(QUERY_TYPES),
    query: z.string().default(''),
    max: bound,
    minLine: bound,
    maxLine: bound,
    pathFilters: z.array(z.string().min(1)).default([]),
    flags: z.array(z.enum(QUERY_FLAGS)).default([]),
  })
  .superRefine((q, ctx) => {
    if ((q.minLine === -1) !== (q.maxLine === -1)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maxLine'], message: 'minLine and maxLine must be given together' });
    } else if (q.minLine > q.maxLine) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['minLine'], message: 'minLine must not exceed maxLine' });
    }
  });

export class QueryMessage {
  readonly type: QueryType;
  readonly query: string;
  readonly max: number;
  readonly minLine: number;
  readonly maxLine: number;
  readonly pathFilters: readonly string[];
  private readonly flags: ReadonlySet<QueryFlag>;

  private constructor(d: QueryDescriptor) {
    this.type = d.type;
    this.query = d.query;
    this.max = d.max;
    this.minLine = d.minLine;
    this.maxLine = d.maxLine;
    this.pathFilters = d.pathFilters;
    this.flags = new Set(d.flags);
  }

  /** Throws QueryError listing every problem with `input`. */
  static parse(input: unknown): QueryMessage {
    const parsed = querySchema.safeParse(input);
    if (!parsed.success) {
      throw new QueryError(parsed.error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)));
    }
    return new QueryMessage(parsed.data);
  }

  static create(fields: Partial<QueryDescriptor> & Pick<QueryDescriptor, 'type'>): QueryMessage {
    return QueryMessage.parse(fields);
  }

  hasFlag(flag: QueryFlag): boolean {
    return this.flags.has(flag);
  }

  keyOptions(root?: string): KeyOptions {
    return { root, absolute: this.hasFlag('absolute-path') };
  }

  toJSON(): QueryDescriptor {
    return {
      type: this.type,
      query: this.query,
      max: this.max,
      minLine: this.minLine,
      maxLine: this.maxLine,
      pathFilters: [...this.pathFilters],
      flags: [...this.flags],
    };
  }
}
