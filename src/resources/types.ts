// src/resources/types.ts

import { z } from 'zod';
import type { QueryValue } from '../core/http/types';

export const PageSchema = z.object({
  count: z.number().int().nonnegative().optional(),
  next: z.string().nullable().optional(),
  previous: z.string().nullable().optional(),
  results: z.array(z.record(z.unknown())),
});

export type Page = z.infer<typeof PageSchema>;

export type ResourceItem = Page['results'][number];

export type QueryParams = Record<string, QueryValue>;

export interface PageOptions {
  page?: number;
  pageSize?: number;
  params?: QueryParams;
}
