import { z } from 'zod';
import { USER_PAGE_MAX, USER_SEARCH_LIMIT } from '@parley/domain';

export const ListUsersQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(USER_PAGE_MAX).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export const SearchUsersQuerySchema = z.object({
  q: z.string().trim().min(1).max(100),
  limit: z.coerce.number().int().min(1).max(USER_PAGE_MAX).default(USER_SEARCH_LIMIT),
});

export type ListUsersQuery = z.infer<typeof ListUsersQuerySchema>;
export type SearchUsersQuery = z.infer<typeof SearchUsersQuerySchema>;
